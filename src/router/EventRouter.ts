import type { NostrEvent } from "nostr-tools";
import {
  asapScheduler,
  observeOn,
  type Observable,
  type SchedulerLike,
  type Subscription,
} from "rxjs";
import type { PoolEvent } from "../relay/ConnectionPool";
import { Logger } from "../utils/Logger";
import type { EventValidator } from "../validation/EventValidator";

/**
 * Where a dispatched event came from
 */
export interface RouteContext {
  relay: string;
  subscriptionId: string;
}

export type KindHandler = (event: NostrEvent, context: RouteContext) => void;

export interface HandlerOptions {
  /** Verify the Schnorr signature before dispatch (default true) */
  verifySignature?: boolean;
}

export type RouteResult =
  | "dispatched"
  | "unhandled"
  | "duplicate"
  | "invalid"
  | "failed";

interface Registration {
  handler: KindHandler;
  verifySignature: boolean;
}

export interface EventRouterOptions {
  /** Scheduler that decouples socket ingestion from validation and handlers */
  scheduler?: SchedulerLike;
  /** How many (subscription, event id) pairs to remember for de-duplication */
  seenCacheSize?: number;
  logger?: Logger;
}

/**
 * Kind-keyed dispatch table over the pool's merged event stream. Unknown
 * kinds are dropped, duplicates from other relays are dropped, and only
 * events that pass validation reach their single handler.
 */
export class EventRouter {
  private readonly handlers = new Map<number, Registration>();
  private readonly seen = new Set<string>();
  private readonly scheduler: SchedulerLike;
  private readonly seenCacheSize: number;
  private readonly logger: Logger;
  private subscription: Subscription | null = null;
  private readonly counters: Record<RouteResult, number> = {
    dispatched: 0,
    unhandled: 0,
    duplicate: 0,
    invalid: 0,
    failed: 0,
  };

  constructor(
    private readonly source: Observable<PoolEvent>,
    private readonly validator: EventValidator,
    options: EventRouterOptions = {},
  ) {
    this.scheduler = options.scheduler ?? asapScheduler;
    this.seenCacheSize = options.seenCacheSize ?? 10_000;
    this.logger = options.logger ?? new Logger({ service: "router" });
  }

  /**
   * Register the handler for a kind, replacing any previous one.
   */
  register(kind: number, handler: KindHandler, options: HandlerOptions = {}): void {
    if (this.handlers.has(kind)) {
      this.logger.debug(`Replacing handler for kind ${kind}`);
    }
    this.handlers.set(kind, {
      handler,
      verifySignature: options.verifySignature ?? true,
    });
  }

  unregister(kind: number): boolean {
    return this.handlers.delete(kind);
  }

  has(kind: number): boolean {
    return this.handlers.has(kind);
  }

  getRegisteredKinds(): number[] {
    return [...this.handlers.keys()].sort((a, b) => a - b);
  }

  get isRunning(): boolean {
    return this.subscription !== null;
  }

  start(): void {
    if (this.subscription) return;
    this.subscription = this.source.pipe(observeOn(this.scheduler)).subscribe({
      next: (poolEvent) => {
        this.route(poolEvent);
      },
      error: (error: unknown) => {
        this.logger.error("❌ Event stream failed:", error);
        this.subscription = null;
      },
    });
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  /**
   * Validate and dispatch one event. Exposed so callers holding events
   * from elsewhere (caches, tests) can feed the same path.
   */
  route(poolEvent: PoolEvent): RouteResult {
    const result = this.routeEvent(poolEvent);
    this.counters[result] += 1;
    return result;
  }

  getStats(): Record<RouteResult, number> {
    return { ...this.counters };
  }

  private routeEvent({ relay, subscriptionId, event: raw }: PoolEvent): RouteResult {
    const registration = this.handlers.get(raw.kind);
    if (!registration) return "unhandled";

    const seenKey = raw.id ? `${subscriptionId}:${raw.id}` : null;
    if (seenKey && this.seen.has(seenKey)) return "duplicate";

    const outcome = registration.verifySignature
      ? this.validator.validate(raw)
      : this.validator.validateWithoutSignature(raw);

    if (!outcome.valid) {
      this.logger.debug(
        `Discarding kind ${raw.kind} event from ${relay}: ${outcome.reason} (${outcome.message})`,
      );
      return "invalid";
    }

    if (seenKey) this.remember(seenKey);

    try {
      registration.handler(outcome.event, { relay, subscriptionId });
      return "dispatched";
    } catch (error) {
      this.logger.error(`❌ Handler for kind ${raw.kind} threw:`, error);
      return "failed";
    }
  }

  private remember(key: string): void {
    this.seen.add(key);
    if (this.seen.size <= this.seenCacheSize) return;
    const oldest = this.seen.values().next();
    if (!oldest.done) this.seen.delete(oldest.value);
  }
}
