import type { NostrEvent } from "nostr-tools";
import { getSatoshisAmountFromBolt11 } from "nostr-tools/nip57";
import { z } from "zod";
import {
  ENDED_STREAM_SCHEME,
  EventKind,
  LIVE_STREAM_STATUSES,
  type LiveStreamStatus,
} from "../constants/nostr";
import type {
  ChatMessage,
  FollowList,
  LiveStream,
  Profile,
  RelayList,
  RelayListEntry,
  ZapReceipt,
} from "../types";
import { logger as baseLogger } from "../utils/Logger";
import {
  buildCoordinate,
  getTagValue,
  getTagValues,
  normalizeCoordinate,
} from "../utils/utils.nostr";

const logger = baseLogger.child("parsers");

const optionalText = z
  .string()
  .optional()
  .nullable()
  .transform((val) => val || undefined);

/**
 * Metadata content as found in the wild: every field optional, nulls and
 * empty strings read as absent, unknown fields ignored.
 */
const ProfileContentSchema = z
  .object({
    name: optionalText,
    display_name: optionalText,
    displayName: optionalText,
    about: optionalText,
    picture: optionalText,
    banner: optionalText,
    website: optionalText,
    nip05: optionalText,
    lud06: optionalText,
    lud16: optionalText,
  })
  .passthrough();

export function parseProfile(event: NostrEvent): Profile | null {
  if (event.kind !== EventKind.Metadata) return null;

  let content: unknown = {};
  if (event.content.trim() !== "") {
    try {
      content = JSON.parse(event.content);
    } catch {
      logger.debug(`👤 Unparseable metadata for ${event.pubkey}`);
      return null;
    }
  }

  const parsed = ProfileContentSchema.safeParse(content);
  if (!parsed.success) {
    logger.debug(
      `⚠️ Invalid metadata for ${event.pubkey}: ${parsed.error.errors[0]?.message}`,
    );
    return null;
  }

  const data = parsed.data;
  const profile: Profile = { pubkey: event.pubkey, createdAt: event.created_at };
  if (data.name) profile.name = data.name;
  const displayName = data.display_name ?? data.displayName;
  if (displayName) profile.displayName = displayName;
  if (data.about) profile.about = data.about;
  if (data.picture) profile.picture = data.picture;
  if (data.banner) profile.banner = data.banner;
  if (data.website) profile.website = data.website;
  if (data.nip05) profile.nip05 = data.nip05;
  if (data.lud06) profile.lud06 = data.lud06;
  if (data.lud16) profile.lud16 = data.lud16;
  return profile;
}

function isStreamStatus(value: string): value is LiveStreamStatus {
  return LIVE_STREAM_STATUSES.some((status) => status === value);
}

function parseCount(value: string | undefined): number {
  if (value === undefined) return 0;
  const count = parseInt(value, 10);
  return Number.isFinite(count) && count > 0 ? count : 0;
}

/**
 * Live stream announcement. Ended streams carry a placeholder URL so
 * they can still be listed; streams with no URL otherwise are dropped.
 */
export function parseLiveStream(event: NostrEvent): LiveStream | null {
  if (event.kind !== EventKind.LiveStream) return null;

  const streamId = getTagValue(event.tags, "d");
  if (!streamId) return null;

  const rawStatus = getTagValue(event.tags, "status");
  const status =
    rawStatus !== undefined && isStreamStatus(rawStatus) ? rawStatus : undefined;

  const url =
    getTagValue(event.tags, "streaming") ??
    getTagValue(event.tags, "streaming_url");
  const streamingUrl =
    url ?? (status === "ended" ? `${ENDED_STREAM_SCHEME}${streamId}` : null);
  if (!streamingUrl) {
    logger.debug(`Stream ${streamId} has no streaming URL`);
    return null;
  }

  const summary = getTagValue(event.tags, "summary");
  const title = getTagValue(event.tags, "title");
  const hashtags = [
    ...getTagValues(event.tags, "t"),
    ...getTagValues(event.tags, "g"),
  ];

  return {
    streamId,
    eventId: event.id,
    coordinate: buildCoordinate(event.kind, event.pubkey, streamId),
    title: [title, summary].filter(Boolean).join(" - ") || streamId,
    summary,
    streamingUrl,
    imageUrl: getTagValue(event.tags, "image"),
    hostPubkey: getTagValue(event.tags, "p")?.toLowerCase() ?? event.pubkey,
    authorPubkey: event.pubkey,
    status,
    hashtags,
    viewerCount: parseCount(getTagValue(event.tags, "current_participants")),
    createdAt: event.created_at,
  };
}

export function parseChatMessage(event: NostrEvent): ChatMessage | null {
  if (event.kind !== EventKind.LiveChatMessage) return null;
  const coordinate = getTagValue(event.tags, "a");
  if (!coordinate) return null;

  return {
    id: event.id,
    senderPubkey: event.pubkey,
    content: event.content,
    coordinate: normalizeCoordinate(coordinate),
    createdAt: event.created_at,
  };
}

const ZapRequestSchema = z
  .object({
    pubkey: z.string(),
    content: z.string().default(""),
    tags: z.array(z.array(z.string())).default([]),
  })
  .passthrough();

/** Invoice amount in millisats; nip57 reports 0 for invoices without one. */
function invoiceAmountMsats(bolt11: string): number | null {
  const sats = getSatoshisAmountFromBolt11(bolt11.trim().toLowerCase());
  return sats > 0 ? Math.floor(sats * 1000) : null;
}

/**
 * Zap receipt. Sender and comment come from the embedded zap request;
 * the stream coordinate prefers the request's `a` tag over the receipt's.
 */
export function parseZapReceipt(event: NostrEvent): ZapReceipt | null {
  if (event.kind !== EventKind.ZapReceipt) return null;

  const bolt11 = getTagValue(event.tags, "bolt11");
  const description = getTagValue(event.tags, "description");
  if (!bolt11 || description === undefined) return null;

  let request: z.infer<typeof ZapRequestSchema>;
  try {
    request = ZapRequestSchema.parse(JSON.parse(description));
  } catch {
    return null;
  }

  const coordinate =
    getTagValue(request.tags, "a") ?? getTagValue(event.tags, "a") ?? null;

  return {
    id: event.id,
    amountMsats: invoiceAmountMsats(bolt11),
    senderPubkey: request.pubkey.toLowerCase(),
    recipientPubkey: getTagValue(event.tags, "p"),
    comment: request.content,
    coordinate: coordinate ? normalizeCoordinate(coordinate) : null,
    zappedEventId: getTagValue(event.tags, "e"),
    bolt11,
    createdAt: event.created_at,
  };
}

const FollowContentSchema = z.record(
  z.object({ read: z.boolean().default(true), write: z.boolean().default(true) }),
);

export function parseFollowList(event: NostrEvent): FollowList | null {
  if (event.kind !== EventKind.FollowList) return null;

  const follows = [...new Set(getTagValues(event.tags, "p").map((p) => p.toLowerCase()))];

  let relayHints: FollowList["relayHints"] = {};
  if (event.content.trim() !== "") {
    try {
      const parsed = FollowContentSchema.safeParse(JSON.parse(event.content));
      if (parsed.success) relayHints = parsed.data;
    } catch {
      logger.debug(`Ignoring non-JSON follow list content from ${event.pubkey}`);
    }
  }

  return {
    pubkey: event.pubkey,
    follows,
    relayHints,
    createdAt: event.created_at,
  };
}

export function parseRelayList(event: NostrEvent): RelayList | null {
  if (event.kind !== EventKind.RelayList) return null;

  const relays: RelayListEntry[] = [];
  for (const tag of event.tags) {
    const [name, url, marker] = tag;
    if (name !== "r" || !url || !/^wss?:\/\//i.test(url)) continue;
    relays.push({
      url,
      read: marker === undefined || marker === "read",
      write: marker === undefined || marker === "write",
    });
  }

  return { pubkey: event.pubkey, relays, createdAt: event.created_at };
}
