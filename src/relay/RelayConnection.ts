import type { Filter, NostrEvent } from "nostr-tools";
import type { Relay, Subscription as RelaySubscription } from "nostr-tools/relay";
import { Logger } from "../utils/Logger";
import { errorMessage } from "../utils/utils";
import { ExponentialBackoff } from "./Backoff";
import type { RelayFactory } from "./relayFactory";

export type RelayConnectionStatus = "idle" | "connecting" | "open" | "closed";

export interface RelayConnectionEvents {
  onOpen(url: string): void;
  onClose(url: string): void;
  /** Any inbound frame, before nostr-tools decodes it */
  onTraffic(url: string): void;
}

export interface RelaySubscriptionHandlers {
  onEvent(event: NostrEvent): void;
  /** EOSE, or the EOSE timeout passing without one */
  onEose(): void;
  /** The relay ended the subscription with CLOSED */
  onClosed(reason: string): void;
}

export interface PublishAck {
  relay: string;
  accepted: boolean;
  message: string;
}

export interface RelayConnectionOptions {
  connectTimeoutMs?: number;
  publishTimeoutMs?: number;
  eoseTimeoutMs?: number;
  backoffInitialMs?: number;
  backoffMaxMs?: number;
  logger?: Logger;
}

/**
 * One nostr-tools relay, replaced by a fresh instance on every open.
 * Nothing is buffered while the relay is not open: the pool issues its
 * subscriptions again from onOpen.
 */
export class RelayConnection {
  /** Delay between reopen attempts after this relay drops */
  readonly backoff: ExponentialBackoff;

  private relay: Relay | null = null;
  private opened: Promise<boolean> = Promise.resolve(false);
  private readonly subscriptions = new Map<string, RelaySubscription>();
  private generation = 0;
  private _status: RelayConnectionStatus = "idle";
  private readonly connectTimeoutMs: number;
  private readonly publishTimeoutMs: number;
  private readonly eoseTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    readonly url: string,
    private readonly relayFactory: RelayFactory,
    private readonly events: RelayConnectionEvents,
    options: RelayConnectionOptions = {},
  ) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.publishTimeoutMs = options.publishTimeoutMs ?? 10_000;
    this.eoseTimeoutMs = options.eoseTimeoutMs ?? 10_000;
    this.backoff = new ExponentialBackoff(
      options.backoffInitialMs ?? 1_000,
      options.backoffMaxMs ?? 30_000,
    );
    this.logger = options.logger ?? new Logger({ service: "relay" });
  }

  get status(): RelayConnectionStatus {
    return this._status;
  }

  get openSubscriptions(): number {
    return this.subscriptions.size;
  }

  open(): void {
    if (this._status === "open" || this._status === "connecting") return;

    const generation = ++this.generation;
    const isCurrent = () => generation === this.generation;
    this._status = "connecting";

    let relay: Relay;
    try {
      relay = this.relayFactory(this.url);
    } catch (error) {
      this.logger.warn(`⚠️ Failed to create relay ${this.url}:`, errorMessage(error));
      this.handleClosed();
      return;
    }
    this.relay = relay;
    relay.publishTimeout = this.publishTimeoutMs;

    const deliver = relay._onmessage.bind(relay);
    relay._onmessage = (message) => {
      if (isCurrent()) this.events.onTraffic(this.url);
      deliver(message);
    };
    relay.onnotice = (notice) => {
      if (isCurrent()) this.logger.warn(`📢 NOTICE from ${this.url}: ${notice}`);
    };
    relay.onclose = () => {
      if (isCurrent()) this.handleClosed();
    };

    this.opened = relay.connect({ timeout: this.connectTimeoutMs }).then(
      () => {
        if (!isCurrent()) return false;
        this._status = "open";
        this.logger.debug(`🔌 Connected to ${this.url}`);
        this.events.onOpen(this.url);
        return true;
      },
      (reason: unknown) => {
        if (isCurrent()) {
          this.logger.warn(`⚠️ Could not connect to ${this.url}: ${errorMessage(reason)}`);
          this.handleClosed();
        }
        return false;
      },
    );
  }

  /**
   * Issue a REQ under the pool's subscription id.
   * @returns false when the relay is not open; the pool retries on open
   */
  subscribe(id: string, filter: Filter, handlers: RelaySubscriptionHandlers): boolean {
    const relay = this.relay;
    if (this._status !== "open" || !relay) return false;

    this.closeSubscription(id);
    // nostr-tools keeps the EOSE timer of a closed subscription running
    const isLive = () => this.subscriptions.get(id) === subscription;
    const subscription = relay.subscribe([filter], {
      id,
      eoseTimeout: this.eoseTimeoutMs,
      onevent: (event) => {
        if (isLive()) handlers.onEvent(event);
      },
      oneose: () => {
        if (isLive()) handlers.onEose();
      },
      onclose: (reason) => {
        // Only relay-initiated closes; ours are removed from the map first
        if (!isLive()) return;
        this.subscriptions.delete(id);
        handlers.onClosed(reason);
      },
    });
    this.subscriptions.set(id, subscription);
    return true;
  }

  /** Send CLOSE for one subscription if it is open on this relay. */
  closeSubscription(id: string): boolean {
    const subscription = this.subscriptions.get(id);
    if (!subscription) return false;
    this.subscriptions.delete(id);
    subscription.close();
    return true;
  }

  /**
   * Publish and wait for the relay's OK. A relay that is still connecting
   * is waited for; a closed one answers with a rejected ack.
   */
  async publish(event: NostrEvent): Promise<PublishAck> {
    if (this._status === "connecting") await this.opened;

    const relay = this.relay;
    if (this._status !== "open" || !relay) {
      return { relay: this.url, accepted: false, message: "not connected" };
    }

    try {
      const message = await relay.publish(event);
      return { relay: this.url, accepted: true, message };
    } catch (error) {
      return { relay: this.url, accepted: false, message: errorMessage(error) };
    }
  }

  close(): void {
    this.generation += 1;
    this.subscriptions.clear();
    const relay = this.relay;
    this.relay = null;
    if (this._status !== "idle") this._status = "closed";
    if (!relay) return;

    try {
      relay.close();
    } catch (error) {
      this.logger.debug(`Error while closing ${this.url}:`, error);
    }
  }

  private handleClosed(): void {
    if (this._status === "closed") return;
    this._status = "closed";
    this.relay = null;
    this.subscriptions.clear();
    this.logger.debug(`Connection to ${this.url} closed`);
    this.events.onClose(this.url);
  }
}
