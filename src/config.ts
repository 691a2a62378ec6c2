import { z } from "zod";
import { DEFAULT_RELAYS } from "./constants/nostr";
import { ConfigurationError } from "./types";

const relayUrl = z
  .string()
  .trim()
  .regex(/^wss?:\/\/\S+$/i, "Relay URL must start with ws:// or wss://");

const positiveMs = z.number().int().positive();

/**
 * Zod schema for configuration validation
 */
export const LivestrConfigSchema = z.object({
  relays: z
    .array(relayUrl)
    .min(1, "At least one relay is required")
    .default(DEFAULT_RELAYS),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  appName: z.string().min(1).default("Livestr"),

  // Validation
  futureToleranceSeconds: z.number().int().nonnegative().default(300),

  // Connection pool
  healthCheckIntervalMs: positiveMs.default(10_000),
  silenceThresholdMs: positiveMs.default(60_000),
  backoffInitialMs: positiveMs.default(1_000),
  backoffMaxMs: positiveMs.default(30_000),
  publishTimeoutMs: positiveMs.default(10_000),

  // Profile cache
  profileCacheTtlMs: positiveMs.default(24 * 60 * 60 * 1000),
  profileCacheCapacity: z.number().int().positive().default(500),
  profileEvictionFraction: z.number().gt(0).max(1).default(0.2),
  profilePendingWindowMs: positiveMs.default(30_000),
  lookupRateLimit: z.number().int().positive().default(10),
  lookupRateWindowMs: positiveMs.default(1_000),
  lookupBatchSize: z.number().int().positive().default(30),
  lookupBatchDelayMs: z.number().int().nonnegative().default(250),

  // Live activity
  activityHeartbeatIntervalMs: positiveMs.default(5_000),
  activitySilenceThresholdMs: positiveMs.default(15_000),
  activityHistoryLimit: z.number().int().positive().default(50),

  // Remote signer
  rpcTimeoutMs: positiveMs.default(30_000),
  signerHandshakeTimeoutMs: positiveMs.default(180_000),
}).superRefine((config, ctx) => {
  if (config.backoffMaxMs < config.backoffInitialMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["backoffMaxMs"],
      message: "Must not be less than backoffInitialMs",
    });
  }
});

export type LivestrConfig = z.output<typeof LivestrConfigSchema>;
export type LivestrConfigInput = z.input<typeof LivestrConfigSchema>;

/**
 * Validate a partial configuration and fill in defaults.
 * @throws ConfigurationError listing every invalid field
 */
export function parseConfig(input: LivestrConfigInput = {}): LivestrConfig {
  return validateConfig(input);
}

function validateConfig(input: unknown): LivestrConfig {
  const result = LivestrConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.errors.map(
      (err) => `${err.path.join(".")}: ${err.message}`,
    );
    throw new ConfigurationError(
      `Configuration validation failed: ${issues.join(", ")}`,
      issues,
    );
  }

  return result.data;
}

function intFromEnv(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Load configuration from environment variables
 * @throws ConfigurationError if a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LivestrConfig {
  const configData = {
    relays: env.NOSTR_RELAYS?.split(",")
      .map((relay) => relay.trim())
      .filter((relay) => relay.length > 0),
    logLevel: env.LOG_LEVEL?.trim().toLowerCase() || undefined,
    appName: env.APP_NAME,
    futureToleranceSeconds: intFromEnv(env.FUTURE_TOLERANCE_SECONDS),
    healthCheckIntervalMs: intFromEnv(env.HEALTH_CHECK_INTERVAL_MS),
    silenceThresholdMs: intFromEnv(env.SILENCE_THRESHOLD_MS),
    backoffInitialMs: intFromEnv(env.BACKOFF_INITIAL_MS),
    backoffMaxMs: intFromEnv(env.BACKOFF_MAX_MS),
    publishTimeoutMs: intFromEnv(env.PUBLISH_TIMEOUT_MS),
    profileCacheTtlMs: intFromEnv(env.PROFILE_CACHE_TTL_MS),
    profileCacheCapacity: intFromEnv(env.PROFILE_CACHE_CAPACITY),
    profileEvictionFraction: env.PROFILE_EVICTION_FRACTION
      ? parseFloat(env.PROFILE_EVICTION_FRACTION)
      : undefined,
    profilePendingWindowMs: intFromEnv(env.PROFILE_PENDING_WINDOW_MS),
    lookupRateLimit: intFromEnv(env.LOOKUP_RATE_LIMIT),
    lookupRateWindowMs: intFromEnv(env.LOOKUP_RATE_WINDOW_MS),
    lookupBatchSize: intFromEnv(env.LOOKUP_BATCH_SIZE),
    lookupBatchDelayMs: intFromEnv(env.LOOKUP_BATCH_DELAY_MS),
    activityHeartbeatIntervalMs: intFromEnv(env.ACTIVITY_HEARTBEAT_INTERVAL_MS),
    activitySilenceThresholdMs: intFromEnv(env.ACTIVITY_SILENCE_THRESHOLD_MS),
    activityHistoryLimit: intFromEnv(env.ACTIVITY_HISTORY_LIMIT),
    rpcTimeoutMs: intFromEnv(env.RPC_TIMEOUT_MS),
    signerHandshakeTimeoutMs: intFromEnv(env.SIGNER_HANDSHAKE_TIMEOUT_MS),
  };

  return validateConfig(configData);
}
