import type { Profile, ProfileCacheEntry, ProfileCacheStats } from "../types";
import { Logger } from "../utils/Logger";
import { chunk, nowMs } from "../utils/utils";
import { RateLimiter } from "./RateLimiter";

/**
 * Sends one metadata request for a batch of pubkeys. The factory wires
 * this to a one-shot relay subscription.
 */
export type ProfileLookupTransport = (pubkeys: string[]) => void;

export interface ProfileCacheOptions {
  ttlMs?: number;
  capacity?: number;
  /** Share of capacity evicted when the cache overflows */
  evictionFraction?: number;
  /** How long a requested pubkey is considered in flight */
  pendingWindowMs?: number;
  batchSize?: number;
  batchDelayMs?: number;
  rateLimiter?: RateLimiter;
  transport?: ProfileLookupTransport;
  logger?: Logger;
}

/**
 * Bounded profile metadata cache with TTL expiry, least-recently-accessed
 * eviction and de-duplicated, rate-limited lookups for missing entries.
 */
export class ProfileCache {
  private readonly entries = new Map<string, ProfileCacheEntry>();
  private readonly pending = new Map<string, number>();
  private readonly batchTimers = new Set<NodeJS.Timeout>();

  private readonly ttlMs: number;
  private readonly capacity: number;
  private readonly evictionCount: number;
  private readonly pendingWindowMs: number;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;
  private readonly limiter: RateLimiter;
  private readonly logger: Logger;
  private transport: ProfileLookupTransport | null;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ProfileCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 24 * 60 * 60 * 1000;
    this.capacity = options.capacity ?? 500;
    this.evictionCount = Math.max(
      1,
      Math.floor(this.capacity * (options.evictionFraction ?? 0.2)),
    );
    this.pendingWindowMs = options.pendingWindowMs ?? 30_000;
    this.batchSize = options.batchSize ?? 30;
    this.batchDelayMs = options.batchDelayMs ?? 250;
    this.limiter = options.rateLimiter ?? new RateLimiter(10, 1_000);
    this.transport = options.transport ?? null;
    this.logger = options.logger ?? new Logger({ service: "profiles" });
  }

  setLookupTransport(transport: ProfileLookupTransport): void {
    this.transport = transport;
  }

  /**
   * Cached profile, or null when absent or expired. A hit refreshes the
   * entry's access time.
   */
  get(pubkey: string): Profile | null {
    const key = pubkey.toLowerCase();
    const entry = this.entries.get(key);
    const now = nowMs();

    if (!entry) {
      this.misses += 1;
      return null;
    }
    if (this.isExpired(entry, now)) {
      this.entries.delete(key);
      this.misses += 1;
      return null;
    }

    entry.lastAccessedAt = now;
    this.hits += 1;
    return entry.profile;
  }

  /** Whether a fresh entry exists; does not touch access time or stats. */
  has(pubkey: string): boolean {
    const entry = this.entries.get(pubkey.toLowerCase());
    return entry !== undefined && !this.isExpired(entry, nowMs());
  }

  /**
   * Insert or overwrite, then evict expired entries and, if still over
   * capacity, the least recently accessed ones.
   */
  put(pubkey: string, profile: Profile): void {
    const key = pubkey.toLowerCase();
    const now = nowMs();
    this.entries.delete(key);
    this.entries.set(key, { profile, insertedAt: now, lastAccessedAt: now });
    this.evict(now);
  }

  /**
   * Current entry's created_at, for callers that only want to replace
   * older metadata.
   */
  getCreatedAt(pubkey: string): number | null {
    const entry = this.entries.get(pubkey.toLowerCase());
    if (!entry || this.isExpired(entry, nowMs())) return null;
    return entry.profile.createdAt;
  }

  /**
   * Ask relays for a profile unless it is cached or already requested.
   * @returns true when a lookup was scheduled
   */
  requestLookup(pubkey: string): boolean {
    return this.requestLookups([pubkey]) > 0;
  }

  /**
   * Request many profiles in batches of `batchSize`, spaced `batchDelayMs`
   * apart, each batch going through the rate limiter.
   * @returns number of pubkeys scheduled
   */
  requestLookups(pubkeys: readonly string[]): number {
    const transport = this.transport;
    if (!transport) {
      this.logger.warn("⚠️ No lookup transport configured, skipping lookup");
      return 0;
    }

    const now = nowMs();
    this.sweepPending(now);
    const wanted: string[] = [];
    for (const pubkey of pubkeys) {
      const key = pubkey.toLowerCase();
      if (wanted.includes(key) || this.has(key) || this.isPending(key, now)) {
        continue;
      }
      wanted.push(key);
      this.pending.set(key, now + this.pendingWindowMs);
    }
    if (wanted.length === 0) return 0;

    chunk(wanted, this.batchSize).forEach((batch, index) => {
      const send = () => this.limiter.schedule(() => transport(batch));
      if (index === 0) {
        send();
        return;
      }
      const timer = setTimeout(() => {
        this.batchTimers.delete(timer);
        send();
      }, index * this.batchDelayMs);
      this.batchTimers.add(timer);
    });

    this.logger.debug(`👤 Requested ${wanted.length} profiles`);
    return wanted.length;
  }

  isPending(pubkey: string, now: number = nowMs()): boolean {
    const key = pubkey.toLowerCase();
    const expiresAt = this.pending.get(key);
    if (expiresAt === undefined) return false;
    if (expiresAt <= now) {
      this.pending.delete(key);
      return false;
    }
    return true;
  }

  /** Remove every expired entry. */
  evictExpired(now: number = nowMs()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    this.evictions += removed;
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): ProfileCacheStats {
    this.sweepPending(nowMs());
    return {
      size: this.entries.size,
      capacity: this.capacity,
      pending: this.pending.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  clear(): void {
    this.entries.clear();
    this.pending.clear();
  }

  /** Cancel queued batches and rate-limited lookups. */
  dispose(): void {
    for (const timer of this.batchTimers) clearTimeout(timer);
    this.batchTimers.clear();
    this.limiter.clear();
  }

  /** Drop in-flight marks whose window has passed. */
  private sweepPending(now: number): void {
    for (const [key, expiresAt] of this.pending) {
      if (expiresAt <= now) this.pending.delete(key);
    }
  }

  private isExpired(entry: ProfileCacheEntry, now: number): boolean {
    return now - entry.insertedAt >= this.ttlMs;
  }

  private evict(now: number): void {
    this.evictExpired(now);
    if (this.entries.size <= this.capacity) return;

    // Stable sort keeps insertion order among equal access times
    const byAccess = [...this.entries].sort(
      ([, a], [, b]) => a.lastAccessedAt - b.lastAccessedAt,
    );
    const victims = byAccess.slice(0, this.evictionCount);
    for (const [key] of victims) this.entries.delete(key);
    this.evictions += victims.length;
    this.logger.debug(`🧹 Evicted ${victims.length} profiles over capacity`);
  }
}
