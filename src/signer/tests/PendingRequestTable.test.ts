import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { PendingRequestTable } from "../PendingRequestTable";
import {
  InvalidResponseError,
  NotConnectedError,
  RemoteSignerRemoteError,
  RequestAbortedError,
  TimeoutError,
} from "../errors";

describe("PendingRequestTable", () => {
  let table: PendingRequestTable;

  beforeEach(() => {
    vi.useFakeTimers();
    table = new PendingRequestTable();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve a waiter with its result", async () => {
    const waiter = table.add("1", "ping", 1_000);

    expect(table.resolve({ id: "1", result: "pong" })).toBe(true);

    await expect(waiter).resolves.toBe("pong");
    expect(table.size).toBe(0);
  });

  it("should reject with the remote error", async () => {
    const waiter = table.add("1", "sign_event", 1_000);

    table.resolve({ id: "1", error: "denied" });

    await expect(waiter).rejects.toBeInstanceOf(RemoteSignerRemoteError);
    await expect(waiter).rejects.toThrow("sign_event failed: denied");
  });

  it("should reject responses without result or error", async () => {
    const waiter = table.add("1", "ping", 1_000);

    table.resolve({ id: "1" });

    await expect(waiter).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it("should prefer the error when a response carries both", async () => {
    const waiter = table.add("1", "ping", 1_000);

    table.resolve({ id: "1", result: "pong", error: "broken" });

    await expect(waiter).rejects.toBeInstanceOf(RemoteSignerRemoteError);
  });

  it("should ignore a response that arrives after the timeout", async () => {
    const waiter = table.add("1", "ping", 1_000);
    const assertion = expect(waiter).rejects.toBeInstanceOf(TimeoutError);

    vi.advanceTimersByTime(1_000);

    expect(table.resolve({ id: "1", result: "pong" })).toBe(false);
    await assertion;
    expect(table.size).toBe(0);
  });

  it("should not time out a waiter that was already answered", async () => {
    const waiter = table.add("1", "ping", 1_000);
    table.resolve({ id: "1", result: "pong" });

    vi.advanceTimersByTime(5_000);

    await expect(waiter).resolves.toBe("pong");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should settle on abort and drop the listener", async () => {
    const controller = new AbortController();
    const waiter = table.add("1", "ping", 1_000, controller.signal);

    controller.abort();

    await expect(waiter).rejects.toBeInstanceOf(RequestAbortedError);
    expect(table.has("1")).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should refuse already aborted signals", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(table.add("1", "ping", 1_000, controller.signal)).rejects.toBeInstanceOf(
      RequestAbortedError,
    );
    expect(table.size).toBe(0);
  });

  it("should refuse duplicate ids", async () => {
    const first = table.add("1", "ping", 1_000);

    await expect(table.add("1", "ping", 1_000)).rejects.toThrow("Duplicate request id 1");
    expect(table.methodOf("1")).toBe("ping");
    table.resolve({ id: "1", result: "pong" });
    await expect(first).resolves.toBe("pong");
  });

  it("should reject every waiter at once", async () => {
    const first = table.add("1", "ping", 1_000);
    const second = table.add("2", "sign_event", 1_000);

    expect(table.rejectAll(new NotConnectedError())).toBe(2);

    await expect(first).rejects.toBeInstanceOf(NotConnectedError);
    await expect(second).rejects.toBeInstanceOf(NotConnectedError);
    expect(table.size).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });
});
