import type { Filter, NostrEvent } from "nostr-tools";
import { Subject, type Observable } from "rxjs";
import { Logger } from "../utils/Logger";
import { errorMessage, nowMs } from "../utils/utils";
import { ExponentialBackoff } from "./Backoff";
import { defaultRelayFactory, type RelayFactory } from "./relayFactory";
import {
  RelayConnection,
  type PublishAck,
  type RelayConnectionStatus,
} from "./RelayConnection";

export type { PublishAck } from "./RelayConnection";

export type ResubscribePolicy = "auto" | "manual";

export interface SubscribeOptions {
  /** Close the subscription on each relay as it sends EOSE; done once every relay has */
  closeOnEose?: boolean;
  /** `auto` subscriptions are reissued after a reconnect, `manual` ones are dropped and reported */
  resubscribe?: ResubscribePolicy;
}

export interface Subscription {
  id: string;
  filter: Filter;
  purpose: string;
  closeOnEose: boolean;
  resubscribe: ResubscribePolicy;
  createdAt: number;
  /** Relays that still owe EOSE; only tracked for closeOnEose */
  awaitingEose: Set<string>;
}

export interface PoolEvent {
  relay: string;
  subscriptionId: string;
  event: NostrEvent;
}

export interface PoolEose {
  relay: string;
  subscriptionId: string;
}

export interface RetriggerRequest {
  subscriptionId: string;
  purpose: string;
  filter: Filter;
}

export type PoolHealth = "idle" | "healthy" | "reconnecting";

export interface ConnectionPoolOptions {
  relays: string[];
  relayFactory?: RelayFactory;
  healthCheckIntervalMs?: number;
  silenceThresholdMs?: number;
  backoffInitialMs?: number;
  backoffMaxMs?: number;
  publishTimeoutMs?: number;
  connectTimeoutMs?: number;
  eoseTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Owns one nostr-tools relay per URL and the subscription table above them.
 * Events from every relay merge into `events$`. A relay that drops is
 * reopened on its own backoff; a periodic health check reconnects the whole
 * pool when it goes silent while subscriptions are active.
 */
export class ConnectionPool {
  private readonly connections = new Map<string, RelayConnection>();
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly pendingPublishes = new Set<(acks: PublishAck[]) => void>();
  private readonly relayTimers = new Map<string, NodeJS.Timeout>();

  private readonly eventsSubject = new Subject<PoolEvent>();
  private readonly eoseSubject = new Subject<PoolEose>();
  private readonly retriggerSubject = new Subject<RetriggerRequest[]>();

  private readonly relayFactory: RelayFactory;
  private readonly healthCheckIntervalMs: number;
  private readonly silenceThresholdMs: number;
  private readonly backoffInitialMs: number;
  private readonly backoffMaxMs: number;
  private readonly publishTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly eoseTimeoutMs: number;
  private readonly backoff: ExponentialBackoff;
  private readonly logger: Logger;

  private connected = false;
  private _health: PoolHealth = "idle";
  private lastMessageAt = 0;
  private subscriptionCounter = 0;
  private reconnectAttempts = 0;
  private healthTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;

  constructor(options: ConnectionPoolOptions) {
    this.relayFactory = options.relayFactory ?? defaultRelayFactory;
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 10_000;
    this.silenceThresholdMs = options.silenceThresholdMs ?? 60_000;
    this.backoffInitialMs = options.backoffInitialMs ?? 1_000;
    this.backoffMaxMs = options.backoffMaxMs ?? 30_000;
    this.publishTimeoutMs = options.publishTimeoutMs ?? 10_000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.eoseTimeoutMs = options.eoseTimeoutMs ?? 10_000;
    this.backoff = new ExponentialBackoff(this.backoffInitialMs, this.backoffMaxMs);
    this.logger = options.logger ?? new Logger({ service: "pool" });

    for (const url of options.relays) this.addConnection(url.trim());
  }

  /** Every inbound event of every live subscription, from every relay. */
  get events$(): Observable<PoolEvent> {
    return this.eventsSubject.asObservable();
  }

  get eose$(): Observable<PoolEose> {
    return this.eoseSubject.asObservable();
  }

  /** Manual subscriptions dropped during a reconnect; callers re-trigger them. */
  get retriggerRequired$(): Observable<RetriggerRequest[]> {
    return this.retriggerSubject.asObservable();
  }

  get health(): PoolHealth {
    return this._health;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get relays(): string[] {
    return [...this.connections.keys()];
  }

  connect(): void {
    if (this.connected) return;
    this.connected = true;
    this._health = "healthy";
    this.lastMessageAt = nowMs();
    this.backoff.reset();

    for (const connection of this.connections.values()) connection.open();

    this.healthTimer = setInterval(
      () => this.checkHealth(),
      this.healthCheckIntervalMs,
    );
    this.logger.info(`🚀 Connecting to ${this.connections.size} relays`);
  }

  disconnect(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
    this.clearReconnectTimer();
    this.clearRelayTimers();

    this.connected = false;
    this._health = "idle";
    for (const connection of this.connections.values()) connection.close();
    this.subscriptions.clear();

    for (const settle of [...this.pendingPublishes]) settle([]);
    this.logger.info("🛑 Disconnected from all relays");
  }

  /**
   * Add a relay to the pool. Active subscriptions are issued on it once
   * it opens.
   * @returns false when the relay was already in the pool
   */
  addRelay(url: string): boolean {
    const key = url.trim();
    if (this.connections.has(key)) return false;

    const connection = this.addConnection(key);
    if (this.connected) connection.open();
    this.logger.debug(`➕ Added relay ${key}`);
    return true;
  }

  /**
   * Close a relay and forget it. Subscriptions stay on the other relays.
   * @returns false when the relay is not in the pool
   */
  removeRelay(url: string): boolean {
    const key = url.trim();
    const connection = this.connections.get(key);
    if (!connection) return false;

    this.clearRelayTimer(key);
    this.connections.delete(key);
    connection.close();
    for (const subscription of [...this.subscriptions.values()]) {
      this.settleEose(subscription, key);
    }
    this.logger.debug(`➖ Removed relay ${key}`);
    return true;
  }

  /**
   * Open every connection that is not open or opening right away, without
   * waiting for its backoff. Used by watchdogs above the pool.
   */
  ensureConnected(): number {
    if (!this.connected) return 0;
    let reopened = 0;
    for (const connection of this.connections.values()) {
      if (connection.status === "open" || connection.status === "connecting") {
        continue;
      }
      this.clearRelayTimer(connection.url);
      connection.open();
      reopened += 1;
    }
    return reopened;
  }

  subscribe(
    filter: Filter,
    purpose: string,
    options: SubscribeOptions = {},
  ): string {
    const id = `${purpose.slice(0, 40)}:${(++this.subscriptionCounter).toString(36)}`;
    const closeOnEose = options.closeOnEose ?? false;
    const subscription: Subscription = {
      id,
      filter,
      purpose,
      closeOnEose,
      resubscribe: options.resubscribe ?? "auto",
      createdAt: nowMs(),
      awaitingEose: new Set(closeOnEose ? this.connections.keys() : []),
    };
    this.subscriptions.set(id, subscription);

    for (const connection of this.connections.values()) {
      this.issue(connection, subscription);
    }

    this.logger.debug(`📡 Subscribed ${id}`, filter);
    return id;
  }

  unsubscribe(subscriptionId: string): boolean {
    if (!this.subscriptions.delete(subscriptionId)) return false;

    for (const connection of this.connections.values()) {
      connection.closeSubscription(subscriptionId);
    }
    return true;
  }

  getSubscription(subscriptionId: string): Subscription | undefined {
    return this.subscriptions.get(subscriptionId);
  }

  get activeSubscriptions(): number {
    return this.subscriptions.size;
  }

  /**
   * Send an event to every relay and collect their OK answers. Relays that
   * do not answer within the publish timeout report a rejected ack;
   * disconnect() settles outstanding publishes with no acks. Never rejects.
   */
  publish(event: NostrEvent): Promise<PublishAck[]> {
    const connections = [...this.connections.values()];
    if (connections.length === 0) return Promise.resolve([]);

    return new Promise((resolve) => {
      const settle = (acks: PublishAck[]) => {
        if (!this.pendingPublishes.delete(settle)) return;
        resolve(acks);
      };
      this.pendingPublishes.add(settle);

      Promise.all(connections.map((connection) => connection.publish(event)))
        .then((acks) => {
          for (const ack of acks) {
            if (!ack.accepted) {
              this.logger.warn(`⚠️ ${ack.relay} rejected ${event.id}: ${ack.message}`);
            }
          }
          settle(acks);
        })
        .catch((error: unknown) => {
          this.logger.error(`Publishing ${event.id} failed:`, errorMessage(error));
          settle([]);
        });
    });
  }

  getStats(): {
    health: PoolHealth;
    subscriptions: number;
    reconnectAttempts: number;
    relays: Record<string, RelayConnectionStatus>;
  } {
    const relays: Record<string, RelayConnectionStatus> = {};
    for (const [url, connection] of this.connections) {
      relays[url] = connection.status;
    }
    return {
      health: this._health,
      subscriptions: this.subscriptions.size,
      reconnectAttempts: this.reconnectAttempts,
      relays,
    };
  }

  private addConnection(url: string): RelayConnection {
    const connection = new RelayConnection(
      url,
      this.relayFactory,
      {
        onOpen: (relay) => this.handleOpen(relay),
        onClose: (relay) => this.handleClose(relay),
        onTraffic: () => this.handleTraffic(),
      },
      {
        connectTimeoutMs: this.connectTimeoutMs,
        publishTimeoutMs: this.publishTimeoutMs,
        eoseTimeoutMs: this.eoseTimeoutMs,
        backoffInitialMs: this.backoffInitialMs,
        backoffMaxMs: this.backoffMaxMs,
        logger: this.logger,
      },
    );
    this.connections.set(url, connection);
    return connection;
  }

  private issue(connection: RelayConnection, subscription: Subscription): void {
    if (subscription.closeOnEose && !subscription.awaitingEose.has(connection.url)) {
      return;
    }

    const relay = connection.url;
    const { id } = subscription;
    connection.subscribe(id, subscription.filter, {
      onEvent: (event) => {
        if (!this.subscriptions.has(id)) return;
        this.eventsSubject.next({ relay, subscriptionId: id, event });
      },
      onEose: () => {
        if (!this.subscriptions.has(id)) return;
        this.eoseSubject.next({ relay, subscriptionId: id });
        if (subscription.closeOnEose) {
          connection.closeSubscription(id);
          this.settleEose(subscription, relay);
        }
      },
      onClosed: (reason) => {
        this.logger.warn(`Relay ${relay} closed subscription ${id}: ${reason}`);
        this.settleEose(subscription, relay);
      },
    });
  }

  /** A relay owes nothing more to a closeOnEose subscription. */
  private settleEose(subscription: Subscription, relay: string): void {
    if (!subscription.closeOnEose) return;
    subscription.awaitingEose.delete(relay);
    if (subscription.awaitingEose.size === 0) {
      this.subscriptions.delete(subscription.id);
    }
  }

  private handleOpen(relay: string): void {
    const connection = this.connections.get(relay);
    if (!connection) return;
    connection.backoff.reset();
    for (const subscription of this.subscriptions.values()) {
      this.issue(connection, subscription);
    }
  }

  private handleClose(relay: string): void {
    const connection = this.connections.get(relay);
    if (!connection || !this.connected) return;

    for (const subscription of [...this.subscriptions.values()]) {
      this.settleEose(subscription, relay);
    }
    // A pool-wide reconnect is already reopening every relay
    if (this._health === "reconnecting") return;
    this.scheduleReopen(connection);
  }

  private scheduleReopen(connection: RelayConnection): void {
    const relay = connection.url;
    this.clearRelayTimer(relay);
    const delay = connection.backoff.nextDelay();
    this.logger.warn(`⚠️ Lost ${relay}, reopening in ${delay}ms`);
    this.relayTimers.set(
      relay,
      setTimeout(() => {
        this.relayTimers.delete(relay);
        if (this.connected && this._health !== "reconnecting") connection.open();
      }, delay),
    );
  }

  private handleTraffic(): void {
    this.lastMessageAt = nowMs();
    if (this._health === "reconnecting") this.markHealthy();
  }

  private checkHealth(): void {
    if (!this.connected || this._health !== "healthy") return;
    if (this.subscriptions.size === 0) return;

    const silence = nowMs() - this.lastMessageAt;
    if (silence > this.silenceThresholdMs) {
      this.logger.warn(
        `⚠️ No relay traffic for ${Math.round(silence / 1000)}s, reconnecting`,
      );
      this.beginReconnect();
    }
  }

  private beginReconnect(): void {
    this._health = "reconnecting";
    this.clearRelayTimers();
    for (const connection of this.connections.values()) connection.close();
    this.scheduleReconnectAttempt();
  }

  private scheduleReconnectAttempt(): void {
    this.clearReconnectTimer();
    const delay = this.backoff.nextDelay();
    this.logger.debug(`Next reconnect attempt in ${delay}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.attemptReconnect();
    }, delay);
  }

  private attemptReconnect(): void {
    if (!this.connected || this._health !== "reconnecting") return;
    this.reconnectAttempts += 1;

    const dropped: RetriggerRequest[] = [];
    for (const subscription of [...this.subscriptions.values()]) {
      if (subscription.resubscribe === "manual") {
        this.subscriptions.delete(subscription.id);
        dropped.push({
          subscriptionId: subscription.id,
          purpose: subscription.purpose,
          filter: subscription.filter,
        });
      }
    }

    // Subscriptions are reissued by handleOpen as each relay comes back
    for (const connection of this.connections.values()) {
      connection.close();
      connection.open();
    }

    if (dropped.length > 0) {
      this.logger.info(
        `🔁 ${dropped.length} subscriptions need to be re-triggered: ${dropped
          .map((request) => request.purpose)
          .join(", ")}`,
      );
      this.retriggerSubject.next(dropped);
    }

    this.scheduleReconnectAttempt();
  }

  private markHealthy(): void {
    this.clearReconnectTimer();
    this.backoff.reset();
    this._health = "healthy";
    this.logger.info("✅ Relay traffic resumed");

    for (const connection of this.connections.values()) {
      if (connection.status === "closed") this.scheduleReopen(connection);
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private clearRelayTimer(relay: string): void {
    const timer = this.relayTimers.get(relay);
    if (timer) {
      clearTimeout(timer);
      this.relayTimers.delete(relay);
    }
  }

  private clearRelayTimers(): void {
    for (const timer of this.relayTimers.values()) clearTimeout(timer);
    this.relayTimers.clear();
  }
}
