import { describe, it, expect } from "vitest";
import {
  parseChatMessage,
  parseFollowList,
  parseLiveStream,
  parseProfile,
  parseRelayList,
  parseZapReceipt,
} from "../parsers";
import { createKeypair, signTestEvent } from "../../tests/helpers/events";

const keys = createKeypair();
const HOST = "cd".repeat(32);
const UPPER_HOST = "CD".repeat(32);

/** Invoice-shaped string; only the human-readable part carries meaning here. */
function invoice(hrp: string): string {
  return `${hrp}1${"q".repeat(60)}`;
}

const INVOICE_21_SATS = invoice("lnbc210n");

describe("parseProfile", () => {
  it("should read known fields and drop empty ones", () => {
    const event = signTestEvent(keys, {
      kind: 0,
      created_at: 1_700_000_000,
      content: JSON.stringify({
        name: "alice",
        display_name: "Alice",
        about: "",
        picture: null,
        lud16: "alice@wallet.test",
        unknown: 42,
      }),
    });

    expect(parseProfile(event)).toEqual({
      pubkey: keys.pubkey,
      createdAt: 1_700_000_000,
      name: "alice",
      displayName: "Alice",
      lud16: "alice@wallet.test",
    });
  });

  it("should accept camelCase displayName", () => {
    const event = signTestEvent(keys, {
      kind: 0,
      content: JSON.stringify({ displayName: "Bob" }),
    });
    expect(parseProfile(event)?.displayName).toBe("Bob");
  });

  it("should reject fields of the wrong type", () => {
    const event = signTestEvent(keys, {
      kind: 0,
      content: JSON.stringify({ name: 7 }),
    });
    expect(parseProfile(event)).toBeNull();
  });
});

describe("parseLiveStream", () => {
  it("should map stream tags", () => {
    const event = signTestEvent(keys, {
      kind: 30311,
      created_at: 1_700_000_100,
      tags: [
        ["d", "show-1"],
        ["title", "Friday Jam"],
        ["summary", "Live music"],
        ["streaming", "https://cdn.test/show.m3u8"],
        ["image", "https://cdn.test/show.png"],
        ["status", "live"],
        ["p", UPPER_HOST, "", "host"],
        ["t", "music"],
        ["g", "u4pruy"],
        ["current_participants", "17"],
      ],
    });

    expect(parseLiveStream(event)).toEqual({
      streamId: "show-1",
      eventId: event.id,
      coordinate: `30311:${keys.pubkey}:show-1`,
      title: "Friday Jam - Live music",
      summary: "Live music",
      streamingUrl: "https://cdn.test/show.m3u8",
      imageUrl: "https://cdn.test/show.png",
      hostPubkey: HOST,
      authorPubkey: keys.pubkey,
      status: "live",
      hashtags: ["music", "u4pruy"],
      viewerCount: 17,
      createdAt: 1_700_000_100,
    });
  });

  it("should fall back to the author as host and streaming_url", () => {
    const event = signTestEvent(keys, {
      kind: 30311,
      tags: [
        ["d", "show-2"],
        ["streaming_url", "https://cdn.test/2.m3u8"],
      ],
    });

    const stream = parseLiveStream(event);

    expect(stream?.hostPubkey).toBe(keys.pubkey);
    expect(stream?.streamingUrl).toBe("https://cdn.test/2.m3u8");
    expect(stream?.title).toBe("show-2");
    expect(stream?.viewerCount).toBe(0);
  });

  it("should give ended streams a placeholder URL", () => {
    const event = signTestEvent(keys, {
      kind: 30311,
      tags: [
        ["d", "old-show"],
        ["status", "ended"],
      ],
    });
    expect(parseLiveStream(event)?.streamingUrl).toBe("ended://old-show");
  });

  it("should drop live streams without a URL", () => {
    const event = signTestEvent(keys, {
      kind: 30311,
      tags: [
        ["d", "x"],
        ["status", "live"],
      ],
    });
    expect(parseLiveStream(event)).toBeNull();
  });
});

describe("parseChatMessage", () => {
  it("should normalize the coordinate", () => {
    const event = signTestEvent(keys, {
      kind: 1311,
      content: "gm",
      created_at: 1_700_000_200,
      tags: [["a", `30311:${UPPER_HOST}:Show`]],
    });

    expect(parseChatMessage(event)).toEqual({
      id: event.id,
      senderPubkey: keys.pubkey,
      content: "gm",
      coordinate: `30311:${HOST}:Show`,
      createdAt: 1_700_000_200,
    });
  });
});

describe("parseZapReceipt", () => {
  const sender = "ef".repeat(32);

  it("should take sender, comment and coordinate from the zap request", () => {
    const request = {
      kind: 9734,
      pubkey: sender,
      content: "great show",
      tags: [["a", `30311:${UPPER_HOST}:Show`]],
    };
    const event = signTestEvent(keys, {
      kind: 9735,
      created_at: 1_700_000_300,
      tags: [
        ["bolt11", INVOICE_21_SATS],
        ["description", JSON.stringify(request)],
        ["p", HOST],
        ["e", "aa".repeat(32)],
        ["a", `30311:${HOST}:Other`],
      ],
    });

    expect(parseZapReceipt(event)).toEqual({
      id: event.id,
      amountMsats: 21_000,
      senderPubkey: sender,
      recipientPubkey: HOST,
      comment: "great show",
      coordinate: `30311:${HOST}:Show`,
      zappedEventId: "aa".repeat(32),
      bolt11: INVOICE_21_SATS,
      createdAt: 1_700_000_300,
    });
  });

  it("should fall back to the receipt's a tag", () => {
    const event = signTestEvent(keys, {
      kind: 9735,
      tags: [
        ["bolt11", invoice("lnbc")],
        ["description", JSON.stringify({ pubkey: sender })],
        ["a", `30311:${HOST}:Other`],
      ],
    });

    const zap = parseZapReceipt(event);

    expect(zap?.coordinate).toBe(`30311:${HOST}:Other`);
    expect(zap?.amountMsats).toBeNull();
    expect(zap?.comment).toBe("");
  });

  it("should convert invoice amounts to millisats", () => {
    const amountOf = (bolt11: string) =>
      parseZapReceipt(
        signTestEvent(keys, {
          kind: 9735,
          tags: [
            ["bolt11", bolt11],
            ["description", JSON.stringify({ pubkey: sender })],
          ],
        }),
      )?.amountMsats;

    expect(amountOf(invoice("lnbc2500u"))).toBe(250_000_000);
    expect(amountOf(invoice("lnbc1m"))).toBe(100_000_000);
    expect(amountOf(invoice("LNBC10U"))).toBe(1_000_000);
    expect(amountOf(invoice("lnbc25p"))).toBe(2);
    expect(amountOf("lnbc210n1short")).toBeNull();
  });
});

describe("parseFollowList", () => {
  it("should collect unique follows and relay hints", () => {
    const event = signTestEvent(keys, {
      kind: 3,
      tags: [
        ["p", UPPER_HOST],
        ["p", HOST],
        ["p", "ab".repeat(32)],
      ],
      content: JSON.stringify({ "wss://relay.test": { read: true, write: false } }),
    });

    const followList = parseFollowList(event);

    expect(followList?.follows).toEqual([HOST, "ab".repeat(32)]);
    expect(followList?.relayHints).toEqual({
      "wss://relay.test": { read: true, write: false },
    });
  });

  it("should ignore free-form content", () => {
    const event = signTestEvent(keys, { kind: 3, content: "hello" });
    expect(parseFollowList(event)?.relayHints).toEqual({});
  });
});

describe("parseRelayList", () => {
  it("should read r tags with markers", () => {
    const event = signTestEvent(keys, {
      kind: 10002,
      tags: [
        ["r", "wss://both.test"],
        ["r", "wss://read.test", "read"],
        ["r", "wss://write.test", "write"],
        ["r", "https://not-a-relay.test"],
      ],
    });

    expect(parseRelayList(event)?.relays).toEqual([
      { url: "wss://both.test", read: true, write: true },
      { url: "wss://read.test", read: true, write: false },
      { url: "wss://write.test", read: false, write: true },
    ]);
  });
});
