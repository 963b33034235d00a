import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export type TracingMode = "remote" | "print" | "none";

export const TRACING_MODES: readonly TracingMode[] = ["remote", "print", "none"];

/** Behaviour shared by every trace manager. */
export interface TraceManagerConfig {
  /** When false, every producer call resolves to the shared no-op trace. */
  enabled: boolean;
  /** Maximum deliveries queued by the remote backend before events are dropped. */
  batchSize: number;
  /** Upper bound (ms) on how long flush()/shutdown() wait for queued deliveries. */
  flushIntervalMs: number;
  /** Extra attempts for a failed delivery. */
  maxRetries: number;
  /** Consecutive failed deliveries that open the circuit breaker. */
  circuitBreakerThreshold: number;
  environment: string;
  release: string;
  version: string;
}

/** Connection settings for the remote ingestion API. */
export interface RemoteConfig {
  host: string;
  publicKey: string;
  secretKey: string;
  /** Per-request timeout in ms. */
  timeoutMs: number;
}

export interface ResolvedConfig {
  /** Lower-cased TRACING_MODE. Not checked here; the factory decides what an unknown mode means. */
  mode: string;
  manager: TraceManagerConfig;
  remote: RemoteConfig;
  logLevel: LogLevel;
}

export const DEFAULT_TRACE_MANAGER_CONFIG: TraceManagerConfig = {
  enabled:                 true,
  batchSize:               100,
  flushIntervalMs:         5000,
  maxRetries:              3,
  circuitBreakerThreshold: 5,
  environment:             "production",
  release:                 "1.0.0",
  version:                 "1.0.0",
};

const booleanString = z
  .enum(["true", "false", "1", "0", "TRUE", "FALSE"])
  .transform((v) => v === "true" || v === "TRUE" || v === "1");

const positiveInt    = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
  TRACING_MODE:                      z.string().default("none"),
  TRACING_ENABLED:                   booleanString.default("true"),
  TRACING_BATCH_SIZE:                positiveInt.default(100),
  TRACING_FLUSH_INTERVAL_MS:         nonNegativeInt.default(5000),
  TRACING_MAX_RETRIES:               nonNegativeInt.default(3),
  TRACING_CIRCUIT_BREAKER_THRESHOLD: positiveInt.default(5),
  TRACING_LOG_LEVEL:                 z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  TRACEKIT_HOST:                     z.string().default("http://localhost:3000"),
  TRACEKIT_PUBLIC_KEY:               z.string().default(""),
  TRACEKIT_SECRET_KEY:               z.string().default(""),
  TRACEKIT_ENV:                      z.string().default("production"),
  TRACEKIT_RELEASE:                  z.string().default("1.0.0"),
  TRACEKIT_VERSION:                  z.string().default("1.0.0"),
  TRACEKIT_TIMEOUT_MS:               positiveInt.default(30000),
});

/**
 * Validates tracing settings from an environment map.
 * Pure: does not read .env files. Throws ConfigurationError on bad values.
 */
export function resolveConfig(env: Record<string, string | undefined> = process.env): ResolvedConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new ConfigurationError(`invalid tracing configuration: ${fields}`, { cause: parsed.error });
  }

  const e = parsed.data;
  return {
    mode: e.TRACING_MODE.trim().toLowerCase(),
    manager: {
      enabled:                 e.TRACING_ENABLED,
      batchSize:               e.TRACING_BATCH_SIZE,
      flushIntervalMs:         e.TRACING_FLUSH_INTERVAL_MS,
      maxRetries:              e.TRACING_MAX_RETRIES,
      circuitBreakerThreshold: e.TRACING_CIRCUIT_BREAKER_THRESHOLD,
      environment:             e.TRACEKIT_ENV,
      release:                 e.TRACEKIT_RELEASE,
      version:                 e.TRACEKIT_VERSION,
    },
    remote: {
      host:      e.TRACEKIT_HOST.replace(/\/$/, ""),
      publicKey: e.TRACEKIT_PUBLIC_KEY,
      secretKey: e.TRACEKIT_SECRET_KEY,
      timeoutMs: e.TRACEKIT_TIMEOUT_MS,
    },
    logLevel: e.TRACING_LOG_LEVEL,
  };
}

/**
 * Loads a .env file (if present) into process.env, then resolves the
 * tracing configuration. Variables already set in the environment win.
 */
export function loadConfig(opts: { path?: string } = {}): ResolvedConfig {
  loadDotenv({ path: opts.path });
  return resolveConfig(process.env);
}

export function isRemoteConfigValid(remote: RemoteConfig): boolean {
  return remote.host.length > 0 && remote.publicKey.length > 0 && remote.secretKey.length > 0;
}
