export { createLivestrClient, ClientFactory, type ClientOverrides } from "./service/ClientFactory";
export { LivestrClient } from "./service/LivestrClient";
export type { ILivestrClient, LivestrStats } from "./service/ServiceInterfaces";

export {
  LivestrConfigSchema,
  loadConfig,
  parseConfig,
  type LivestrConfig,
  type LivestrConfigInput,
} from "./config";
export * from "./types";
export * from "./constants/nostr";

export {
  EventValidator,
  type ValidationFailureReason,
  type ValidationOutcome,
} from "./validation/EventValidator";

export {
  ConnectionPool,
  type ConnectionPoolOptions,
  type PoolEvent,
  type PoolHealth,
  type PublishAck,
  type RetriggerRequest,
  type SubscribeOptions,
} from "./relay/ConnectionPool";
export { defaultRelayFactory, type RelayFactory } from "./relay/relayFactory";

export { EventRouter, type KindHandler, type RouteResult } from "./router/EventRouter";
export { ClientEvents } from "./router/ClientEvents";
export { registerDefaultHandlers } from "./router/registerDefaultHandlers";

export { ProfileCache, type ProfileLookupTransport } from "./profiles/ProfileCache";
export { RateLimiter } from "./profiles/RateLimiter";

export {
  RemoteSignerClient,
  type BunkerSession,
  type RemoteSignerState,
} from "./signer/RemoteSignerClient";
export { LocalSigner, type EventSigner } from "./signer/LocalSigner";
export { parseBunkerUri, parseNostrConnectUri, createNostrConnectUri } from "./signer/bunkerUri";
export * from "./signer/errors";

export {
  ActivityRouter,
  withActivitySubscription,
  type ActivityHandler,
  type ActivityItem,
  type ActivitySubscription,
} from "./activity/ActivityRouter";
export { LiveActivityPublisher, type ZapRequestParams } from "./activity/LiveActivityPublisher";

export { Logger, LogLevel, logger } from "./utils/Logger";
export {
  normalizeCoordinate,
  parseCoordinate,
  validateAndDecodePubkey,
} from "./utils/utils.nostr";
