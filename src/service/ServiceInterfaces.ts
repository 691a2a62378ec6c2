/**
 * Service boundaries of the client facade.
 */

import type { LivestrConfig } from "../config";
import type {
  ActivityHandler,
  ActivityHealth,
  ActivityRouter,
  ActivitySubscription,
} from "../activity/ActivityRouter";
import type { LiveActivityPublisher } from "../activity/LiveActivityPublisher";
import type { ProfileCache } from "../profiles/ProfileCache";
import type { ConnectionPool, PoolHealth } from "../relay/ConnectionPool";
import type { RelayConnectionStatus } from "../relay/RelayConnection";
import type { ClientEvents } from "../router/ClientEvents";
import type { EventRouter, RouteResult } from "../router/EventRouter";
import type { EventSigner } from "../signer/LocalSigner";
import type { RemoteSignerClient, RemoteSignerState } from "../signer/RemoteSignerClient";
import type { EventValidator } from "../validation/EventValidator";
import type { Profile, ProfileCacheStats } from "../types";
import type { Logger } from "../utils/Logger";

export interface LivestrClientDependencies {
  config: LivestrConfig;
  pool: ConnectionPool;
  validator: EventValidator;
  router: EventRouter;
  events: ClientEvents;
  profiles: ProfileCache;
  activity: ActivityRouter;
  signer: RemoteSignerClient;
  publisher: LiveActivityPublisher;
  logger: Logger;
}

export interface LivestrStats {
  pool: {
    health: PoolHealth;
    subscriptions: number;
    reconnectAttempts: number;
    relays: Record<string, RelayConnectionStatus>;
  };
  router: Record<RouteResult, number>;
  profiles: ProfileCacheStats;
  activity: {
    health: ActivityHealth;
    subscriptions: number;
    reconnectAttempts: number;
  };
  signer: RemoteSignerState["status"];
}

export interface ILivestrClient {
  start(): void;
  shutdown(): void;
  requestLiveStreams(limit?: number): string;
  requestUserData(pubkeyOrNpub: string): string;
  getProfile(pubkey: string): Profile | null;
  watchActivity(coordinate: string, handler: ActivityHandler): ActivitySubscription;
  useSigner(signer: EventSigner | null): void;
  getStats(): LivestrStats;
  isRunning(): boolean;
}
