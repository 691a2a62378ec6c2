import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { npubEncode } from "nostr-tools/nip19";
import { queueScheduler } from "rxjs";
import { z } from "zod";
import { createLivestrClient } from "../ClientFactory";
import type { LivestrClient } from "../LivestrClient";
import type { ActivityItem } from "../../activity/ActivityRouter";
import { LocalSigner } from "../../signer/LocalSigner";
import { ConfigurationError, LivestrError, ValidationError, type LiveStream } from "../../types";
import { FakeRelayNetwork, flushRelayTasks } from "../../tests/helpers/fakeRelay";
import {
  coordinateFor,
  createKeypair,
  signTestEvent,
  toWire,
} from "../../tests/helpers/events";

const RELAY = "wss://a.relay.test";

const SentEventSchema = z.object({ id: z.string() });

describe("LivestrClient", () => {
  let network: FakeRelayNetwork;
  let client: LivestrClient;

  beforeEach(() => {
    vi.useFakeTimers();
    network = new FakeRelayNetwork();
    client = createLivestrClient(
      { relays: [RELAY], logLevel: "error" },
      { relayFactory: network.factory, scheduler: queueScheduler },
    );
  });

  afterEach(() => {
    client.shutdown();
    vi.useRealTimers();
  });

  it("should reject invalid configuration", () => {
    expect(() => createLivestrClient({ relays: ["https://not-a-relay.test"] })).toThrow(
      ConfigurationError,
    );
    expect(() =>
      createLivestrClient({ relays: [RELAY], backoffInitialMs: 5_000, backoffMaxMs: 1_000 }),
    ).toThrow(ConfigurationError);
  });

  it("should refuse requests before start", () => {
    expect(() => client.requestLiveStreams()).toThrow(LivestrError);
  });

  it("should stream live events and look up their hosts", async () => {
    const host = createKeypair();
    const streams: LiveStream[] = [];
    client.events.streams$.subscribe((stream) => streams.push(stream));
    client.start();
    await flushRelayTasks();

    const id = client.requestLiveStreams(10);
    await flushRelayTasks();
    expect(network.framesOfType(RELAY, "REQ")).toEqual([
      ["REQ", id, { kinds: [30311], limit: 10 }],
    ]);

    const stream = signTestEvent(host, {
      kind: 30311,
      tags: [
        ["d", "show"],
        ["title", "Test Stream"],
        ["status", "live"],
        ["streaming", "https://cdn.test/show.m3u8"],
      ],
    });
    network.latest(RELAY).receive(["EVENT", id, toWire(stream)]);
    await flushRelayTasks();

    expect(streams.map((item) => item.coordinate)).toEqual([coordinateFor(host.pubkey, "show")]);
    expect(network.framesOfType(RELAY, "REQ")[1]).toEqual([
      "REQ",
      "profiles:2",
      { kinds: [0], authors: [host.pubkey], limit: 1 },
    ]);

    const metadata = signTestEvent(host, {
      kind: 0,
      content: JSON.stringify({ name: "host" }),
    });
    network.latest(RELAY).receive(["EVENT", "profiles:2", toWire(metadata)]);
    network.latest(RELAY).receive(["EOSE", "profiles:2"]);
    await flushRelayTasks();

    expect(client.getProfile(host.pubkey)?.name).toBe("host");
    expect(network.framesOfType(RELAY, "CLOSE")).toEqual([["CLOSE", "profiles:2"]]);
  });

  it("should fetch user data for an npub", async () => {
    const user = createKeypair();
    client.start();
    await flushRelayTasks();

    const id = client.requestUserData(npubEncode(user.pubkey));
    await flushRelayTasks();

    expect(network.framesOfType(RELAY, "REQ")).toEqual([
      ["REQ", id, { kinds: [0, 3, 10002], authors: [user.pubkey] }],
    ]);
    expect(() => client.requestUserData("not-a-key")).toThrow(ValidationError);
  });

  it("should deliver stream chat to the watcher", async () => {
    const host = createKeypair();
    const viewer = createKeypair();
    const coordinate = coordinateFor(host.pubkey, "show");
    const items: ActivityItem[] = [];
    client.start();
    await flushRelayTasks();

    client.watchActivity(coordinate, (item) => items.push(item));
    await flushRelayTasks();
    const [request] = network.framesOfType(RELAY, "REQ");
    expect(request?.[2]).toEqual({ kinds: [1311, 9735], "#a": [coordinate], limit: 50 });

    const message = signTestEvent(viewer, {
      kind: 1311,
      content: "hello",
      tags: [["a", coordinate]],
    });
    network.latest(RELAY).receive(["EVENT", request?.[1], toWire(message)]);

    expect(items).toEqual([
      {
        type: "chat",
        message: {
          id: message.id,
          senderPubkey: viewer.pubkey,
          content: "hello",
          coordinate,
          createdAt: message.created_at,
        },
      },
    ]);
  });

  it("should publish chat through the chosen signer", async () => {
    const host = createKeypair();
    const viewer = createKeypair();
    client.start();
    await flushRelayTasks();
    client.useSigner(new LocalSigner(viewer.secretKey));

    const sending = client.publisher.sendChatMessage(coordinateFor(host.pubkey, "show"), "hi");
    await vi.waitFor(() => expect(network.framesOfType(RELAY, "EVENT")).toHaveLength(1));

    const sent = SentEventSchema.parse(network.framesOfType(RELAY, "EVENT")[0]?.[1]);
    network.latest(RELAY).receive(["OK", sent.id, true, ""]);

    const result = await sending;
    expect(result.event.pubkey).toBe(viewer.pubkey);
    expect(result.acks).toEqual([{ relay: RELAY, accepted: true, message: "" }]);
  });

  it("should close everything on shutdown", async () => {
    client.start();
    await flushRelayTasks();
    client.requestLiveStreams();

    client.shutdown();

    expect(network.latest(RELAY).closed).toBe(true);
    expect(client.isRunning()).toBe(false);
    expect(client.getStats().pool.subscriptions).toBe(0);
    expect(() => client.start()).toThrow("Client was shut down");
  });
});
