import type { LiveStreamStatus } from "./constants/nostr";

// Profile types
export interface Profile {
  pubkey: string;
  name?: string;
  displayName?: string;
  about?: string;
  picture?: string;
  banner?: string;
  website?: string;
  nip05?: string;
  lud06?: string;
  lud16?: string;
  /** created_at of the metadata event the profile was read from */
  createdAt: number;
}

export interface ProfileCacheEntry {
  profile: Profile;
  insertedAt: number;
  lastAccessedAt: number;
}

export interface ProfileCacheStats {
  size: number;
  capacity: number;
  pending: number;
  hits: number;
  misses: number;
  evictions: number;
}

// Live streaming types
export interface LiveStream {
  streamId: string;
  eventId: string;
  coordinate: string;
  title: string;
  summary?: string;
  streamingUrl: string;
  imageUrl?: string;
  hostPubkey: string;
  authorPubkey: string;
  status?: LiveStreamStatus;
  hashtags: string[];
  viewerCount: number;
  createdAt: number;
}

export interface ChatMessage {
  id: string;
  senderPubkey: string;
  content: string;
  coordinate: string;
  createdAt: number;
}

export interface ZapReceipt {
  id: string;
  /** Amount decoded from the invoice, null when the invoice carries none */
  amountMsats: number | null;
  senderPubkey: string;
  recipientPubkey?: string;
  comment: string;
  coordinate: string | null;
  zappedEventId?: string;
  bolt11: string;
  createdAt: number;
}

// Social types
export interface FollowList {
  pubkey: string;
  follows: string[];
  relayHints: Record<string, { read: boolean; write: boolean }>;
  createdAt: number;
}

export interface RelayListEntry {
  url: string;
  read: boolean;
  write: boolean;
}

export interface RelayList {
  pubkey: string;
  relays: RelayListEntry[];
  createdAt: number;
}

// Error types
export class LivestrError extends Error {
  constructor(
    message: string,
    public code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LivestrError";
  }
}

export class ValidationError extends LivestrError {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class ConfigurationError extends LivestrError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export class RelayError extends LivestrError {
  constructor(
    message: string,
    public relay?: string,
  ) {
    super(message, "RELAY_ERROR");
    this.name = "RelayError";
  }
}
