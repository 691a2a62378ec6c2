import type { SchedulerLike } from "rxjs";
import { ActivityRouter } from "../activity/ActivityRouter";
import { LiveActivityPublisher } from "../activity/LiveActivityPublisher";
import { parseConfig, type LivestrConfigInput } from "../config";
import { EventKind } from "../constants/nostr";
import { ProfileCache } from "../profiles/ProfileCache";
import { RateLimiter } from "../profiles/RateLimiter";
import { ConnectionPool } from "../relay/ConnectionPool";
import type { RelayFactory } from "../relay/relayFactory";
import { ClientEvents } from "../router/ClientEvents";
import { EventRouter } from "../router/EventRouter";
import { registerDefaultHandlers } from "../router/registerDefaultHandlers";
import type { EventSigner } from "../signer/LocalSigner";
import { RemoteSignerClient } from "../signer/RemoteSignerClient";
import { LivestrError } from "../types";
import { Logger, parseLogLevel } from "../utils/Logger";
import { errorMessage } from "../utils/utils";
import { EventValidator } from "../validation/EventValidator";
import { LivestrClient } from "./LivestrClient";

export interface ClientOverrides {
  /** Replaces the ws transport, e.g. with an in-process fake */
  relayFactory?: RelayFactory;
  /** Scheduler the router processes events on */
  scheduler?: SchedulerLike;
  /** Signer for publishing before (or instead of) a remote signer */
  signer?: EventSigner;
  /** Client key of a stored remote signer session */
  clientSecretKey?: Uint8Array | string;
  logger?: Logger;
}

export class ClientFactory {
  /**
   * Build every component of the client from one configuration and wire
   * them together. Nothing connects until `start()`.
   * @throws ConfigurationError when the configuration is invalid
   */
  static createLivestrClient(
    input: LivestrConfigInput = {},
    overrides: ClientOverrides = {},
  ): LivestrClient {
    const config = parseConfig(input);
    const logger =
      overrides.logger ??
      new Logger({ level: parseLogLevel(config.logLevel), service: config.appName });

    try {
      logger.debug("Starting client factory initialization...");

      // Step 1: relay transport and validation
      const pool = new ConnectionPool({
        relays: config.relays,
        relayFactory: overrides.relayFactory,
        healthCheckIntervalMs: config.healthCheckIntervalMs,
        silenceThresholdMs: config.silenceThresholdMs,
        backoffInitialMs: config.backoffInitialMs,
        backoffMaxMs: config.backoffMaxMs,
        publishTimeoutMs: config.publishTimeoutMs,
        logger: logger.child("pool"),
      });
      const validator = new EventValidator({
        futureToleranceSeconds: config.futureToleranceSeconds,
      });

      // Step 2: profile cache, looking profiles up through the pool
      const profiles = new ProfileCache({
        ttlMs: config.profileCacheTtlMs,
        capacity: config.profileCacheCapacity,
        evictionFraction: config.profileEvictionFraction,
        pendingWindowMs: config.profilePendingWindowMs,
        batchSize: config.lookupBatchSize,
        batchDelayMs: config.lookupBatchDelayMs,
        rateLimiter: new RateLimiter(
          config.lookupRateLimit,
          config.lookupRateWindowMs,
          logger.child("rate-limiter"),
        ),
        transport: (pubkeys) => {
          pool.subscribe(
            { kinds: [EventKind.Metadata], authors: pubkeys, limit: pubkeys.length },
            "profiles",
            { closeOnEose: true, resubscribe: "manual" },
          );
        },
        logger: logger.child("profiles"),
      });

      // Step 3: routing
      const events = new ClientEvents();
      const router = new EventRouter(pool.events$, validator, {
        scheduler: overrides.scheduler,
        logger: logger.child("router"),
      });
      registerDefaultHandlers(router, {
        events,
        profiles,
        logger: logger.child("handlers"),
      });

      // Step 4: live activity and signing
      const activity = new ActivityRouter(pool, events, {
        heartbeatIntervalMs: config.activityHeartbeatIntervalMs,
        silenceThresholdMs: config.activitySilenceThresholdMs,
        backoffInitialMs: config.backoffInitialMs,
        backoffMaxMs: config.backoffMaxMs,
        historyLimit: config.activityHistoryLimit,
        logger: logger.child("activity"),
      });
      const signer = new RemoteSignerClient(pool, events.signerMessages$, validator, {
        rpcTimeoutMs: config.rpcTimeoutMs,
        handshakeTimeoutMs: config.signerHandshakeTimeoutMs,
        clientSecretKey: overrides.clientSecretKey,
        logger: logger.child("signer"),
      });
      const publisher = new LiveActivityPublisher(
        pool,
        overrides.signer ?? null,
        logger.child("publisher"),
      );

      logger.debug("Client factory initialization completed");
      return new LivestrClient({
        config,
        pool,
        validator,
        router,
        events,
        profiles,
        activity,
        signer,
        publisher,
        logger,
      });
    } catch (error) {
      logger.error("Client factory initialization failed:", errorMessage(error));
      if (error instanceof LivestrError) throw error;
      throw new LivestrError(
        `Client factory initialization failed: ${errorMessage(error)}`,
        "FACTORY_INIT",
        { cause: error },
      );
    }
  }
}

export function createLivestrClient(
  input?: LivestrConfigInput,
  overrides?: ClientOverrides,
): LivestrClient {
  return ClientFactory.createLivestrClient(input, overrides);
}
