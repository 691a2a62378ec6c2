export const DEFAULT_RELAYS = [
  "wss://relay.damus.io",
  "wss://nos.lol",
  "wss://relay.primal.net",
  "wss://relay.snort.social",
];

export const EventKind = {
  Metadata: 0,
  FollowList: 3,
  LiveChatMessage: 1311,
  ZapRequest: 9734,
  ZapReceipt: 9735,
  RelayList: 10002,
  RoomPresence: 10312,
  NostrConnect: 24133,
  LiveStream: 30311,
} as const;

export type EventKindName = keyof typeof EventKind;

export const ADDRESSABLE_KIND_MIN = 30000;
export const ADDRESSABLE_KIND_MAX = 39999;

export const LIVE_STREAM_STATUSES = ["live", "ended", "planned"] as const;
export type LiveStreamStatus = (typeof LIVE_STREAM_STATUSES)[number];

/** Acknowledgement token a remote signer may return instead of the secret. */
export const NIP46_ACK = "ack";

/** Prefix used for the placeholder URL of streams that have ended. */
export const ENDED_STREAM_SCHEME = "ended://";
