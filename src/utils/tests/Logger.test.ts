import { describe, it, expect, vi } from "vitest";
import { Logger, LogLevel, parseLogLevel } from "../Logger";
import { LivestrError } from "../../types";

describe("Logger", () => {
  it("should format service, level and arguments", () => {
    const logger = new Logger({ service: "pool", timestamp: false });

    expect(logger.format("INFO", "connected", { relays: 2 }, "done")).toBe(
      '[pool][INFO] connected {"relays":2} done',
    );
  });

  it("should serialize errors with their code", () => {
    const logger = new Logger({ service: "svc", level: LogLevel.INFO, timestamp: false });

    expect(logger.format("ERROR", "failed", new LivestrError("boom", "E_BOOM"))).toBe(
      '[svc][ERROR] failed {"name":"LivestrError","message":"boom","code":"E_BOOM"}',
    );
  });

  it("should skip messages below its level", () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new Logger({ level: LogLevel.WARN });

    logger.info("hidden");
    logger.warn("shown");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should prefix child services", () => {
    const child = new Logger({ service: "Livestr", timestamp: false }).child("signer");
    expect(child.format("DEBUG", "hi")).toBe("[Livestr:signer][DEBUG] hi");
  });

  it("should parse level names", () => {
    expect(parseLogLevel(" Debug ")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
