import type { Filter } from "nostr-tools";
import { merge, map, type Observable, type Subscription as RxSubscription } from "rxjs";
import { EventKind } from "../constants/nostr";
import { ExponentialBackoff } from "../relay/Backoff";
import type { ConnectionPool } from "../relay/ConnectionPool";
import type { ChatMessage, ZapReceipt } from "../types";
import { Logger } from "../utils/Logger";
import { normalizeCoordinate } from "../utils/utils.nostr";
import { nowMs } from "../utils/utils";

export type ActivityItem =
  | { type: "chat"; message: ChatMessage }
  | { type: "zap"; zap: ZapReceipt };

export type ActivityHandler = (item: ActivityItem) => void;

export type ActivityHealth = "idle" | "healthy" | "unhealthy";

export interface ActivitySubscription {
  /** Normalized coordinate the handler is registered under */
  readonly coordinate: string;
  /** False once disposed or replaced by a newer registration */
  readonly active: boolean;
  dispose(): void;
}

export interface ActivitySources {
  chatMessages$: Observable<ChatMessage>;
  zapReceipts$: Observable<ZapReceipt>;
}

export type ActivityTransport = Pick<
  ConnectionPool,
  "subscribe" | "unsubscribe" | "ensureConnected"
>;

export interface ActivityRouterOptions {
  heartbeatIntervalMs?: number;
  silenceThresholdMs?: number;
  backoffInitialMs?: number;
  backoffMaxMs?: number;
  /** `limit` of each activity filter */
  historyLimit?: number;
  logger?: Logger;
}

interface Registration {
  token: number;
  handler: ActivityHandler;
  subscriptionId: string;
}

/**
 * Delivers chat messages and zaps to one handler per stream coordinate.
 * A heartbeat watches for silence and reissues every filter with backoff
 * until activity comes back.
 */
export class ActivityRouter {
  private readonly registrations = new Map<string, Registration>();
  private readonly heartbeatIntervalMs: number;
  private readonly silenceThresholdMs: number;
  private readonly historyLimit: number;
  private readonly backoff: ExponentialBackoff;
  private readonly logger: Logger;

  private _health: ActivityHealth = "idle";
  private tokenCounter = 0;
  private lastActivityAt = 0;
  private reconnectAttempts = 0;
  private listener: RxSubscription | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly pool: ActivityTransport,
    private readonly sources: ActivitySources,
    options: ActivityRouterOptions = {},
  ) {
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 5_000;
    this.silenceThresholdMs = options.silenceThresholdMs ?? 15_000;
    this.historyLimit = options.historyLimit ?? 50;
    this.backoff = new ExponentialBackoff(
      options.backoffInitialMs ?? 1_000,
      options.backoffMaxMs ?? 30_000,
    );
    this.logger = options.logger ?? new Logger({ service: "activity" });
  }

  get health(): ActivityHealth {
    return this._health;
  }

  get isRunning(): boolean {
    return this.listener !== null;
  }

  /** Normalized coordinates that currently have a handler. */
  get coordinates(): string[] {
    return [...this.registrations.keys()];
  }

  start(): void {
    if (this.listener) return;

    this.listener = merge(
      this.sources.chatMessages$.pipe(
        map((message): ActivityItem => ({ type: "chat", message })),
      ),
      this.sources.zapReceipts$.pipe(map((zap): ActivityItem => ({ type: "zap", zap }))),
    ).subscribe((item) => this.route(item));

    this.heartbeatTimer = setInterval(() => this.checkHeartbeat(), this.heartbeatIntervalMs);
    this.logger.debug("Activity router started");
  }

  stop(): void {
    this.listener?.unsubscribe();
    this.listener = null;
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.clearReconnectTimer();
  }

  /**
   * Register the handler for a stream. A later registration for the same
   * coordinate replaces this one and its relay subscription.
   */
  subscribe(coordinate: string, handler: ActivityHandler): ActivitySubscription {
    const key = normalizeCoordinate(coordinate);

    const previous = this.registrations.get(key);
    if (previous) {
      this.pool.unsubscribe(previous.subscriptionId);
      this.logger.debug(`Replacing activity handler for ${key}`);
    }

    const token = ++this.tokenCounter;
    this.registrations.set(key, {
      token,
      handler,
      subscriptionId: this.pool.subscribe(this.filterFor(key), "activity"),
    });
    this.lastActivityAt = nowMs();
    if (this._health === "idle") this._health = "healthy";

    const registrations = this.registrations;
    let disposed = false;
    return {
      coordinate: key,
      get active(): boolean {
        return !disposed && registrations.get(key)?.token === token;
      },
      dispose: () => {
        if (disposed) return;
        disposed = true;
        this.release(key, token);
      },
    };
  }

  /**
   * Hand an item to the handler of its coordinate.
   * @returns false when no handler is registered for it
   */
  route(item: ActivityItem): boolean {
    this.lastActivityAt = nowMs();
    if (this._health === "unhealthy") this.markHealthy();

    const coordinate = item.type === "chat" ? item.message.coordinate : item.zap.coordinate;
    if (!coordinate) return false;

    const registration = this.registrations.get(normalizeCoordinate(coordinate));
    if (!registration) return false;

    try {
      registration.handler(item);
    } catch (error) {
      this.logger.error(`Activity handler for ${coordinate} failed`, error);
    }
    return true;
  }

  getStats(): {
    health: ActivityHealth;
    subscriptions: number;
    reconnectAttempts: number;
  } {
    return {
      health: this._health,
      subscriptions: this.registrations.size,
      reconnectAttempts: this.reconnectAttempts,
    };
  }

  /** Stop timers and release every registration. */
  dispose(): void {
    this.stop();
    for (const registration of this.registrations.values()) {
      this.pool.unsubscribe(registration.subscriptionId);
    }
    this.registrations.clear();
    this._health = "idle";
    this.backoff.reset();
  }

  private release(key: string, token: number): void {
    const registration = this.registrations.get(key);
    // Replaced by a newer registration, which stays untouched
    if (!registration || registration.token !== token) return;

    this.pool.unsubscribe(registration.subscriptionId);
    this.registrations.delete(key);

    if (this.registrations.size === 0) {
      this.clearReconnectTimer();
      this.backoff.reset();
      this._health = "idle";
    }
  }

  private filterFor(coordinate: string): Filter {
    return {
      kinds: [EventKind.LiveChatMessage, EventKind.ZapReceipt],
      "#a": [coordinate],
      limit: this.historyLimit,
    };
  }

  private checkHeartbeat(): void {
    if (this._health !== "healthy" || this.registrations.size === 0) return;

    const silence = nowMs() - this.lastActivityAt;
    if (silence > this.silenceThresholdMs) {
      this.logger.warn(
        `⚠️ No stream activity for ${Math.round(silence / 1000)}s, resubscribing`,
      );
      this._health = "unhealthy";
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    this.clearReconnectTimer();
    const delay = this.backoff.nextDelay();
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.resubscribeAll();
    }, delay);
  }

  private resubscribeAll(): void {
    if (this._health !== "unhealthy") return;
    this.reconnectAttempts += 1;

    const reopened = this.pool.ensureConnected();
    for (const [coordinate, registration] of this.registrations) {
      this.pool.unsubscribe(registration.subscriptionId);
      registration.subscriptionId = this.pool.subscribe(
        this.filterFor(coordinate),
        "activity",
      );
    }
    this.logger.info(
      `🔁 Reissued ${this.registrations.size} activity filters (${reopened} relays reopened)`,
    );

    this.scheduleReconnect();
  }

  private markHealthy(): void {
    this.clearReconnectTimer();
    this.backoff.reset();
    this._health = "healthy";
    this.logger.info("✅ Stream activity resumed");
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}

/**
 * Run `body` with a registration that is disposed however `body` exits.
 */
export async function withActivitySubscription<T>(
  router: ActivityRouter,
  coordinate: string,
  handler: ActivityHandler,
  body: (subscription: ActivitySubscription) => Promise<T> | T,
): Promise<T> {
  const subscription = router.subscribe(coordinate, handler);
  try {
    return await body(subscription);
  } finally {
    subscription.dispose();
  }
}
