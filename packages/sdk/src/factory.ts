import {
  ConfigurationError,
  TRACING_MODES,
  createConsoleLogger,
  loadConfig,
  resolveConfig,
} from "@tracekit/core";
import type { Logger, RemoteConfig, ResolvedConfig, TraceManagerConfig } from "@tracekit/core";
import type { TraceManager } from "./manager.js";
import { NOOP_TRACE_MANAGER } from "./noop.js";
import { PrintTraceManager } from "./print.js";
import { RemoteTraceManager } from "./remote.js";

export interface CreateTraceManagerOptions {
  config?: Partial<TraceManagerConfig>;
  /** Required for "remote". */
  remote?: RemoteConfig;
  /** Default: console logger at "warn". */
  logger?: Logger;
  /** Line sink for "print". Default: console.log */
  write?: (line: string) => void;
}

/**
 * Builds the backend for `mode` ("remote", "print" or "none", any case).
 *
 * Never throws for bad settings: an unknown mode, or a remote backend
 * without a host and keys, falls back to the no-op manager with a warning.
 */
export function createTraceManager(mode: string, opts: CreateTraceManagerOptions = {}): TraceManager {
  const logger = opts.logger ?? createConsoleLogger();

  switch (mode.trim().toLowerCase()) {
    case "remote": {
      if (!opts.remote) {
        logger.warn("remote tracing requested without remote settings, tracing disabled");
        return NOOP_TRACE_MANAGER;
      }
      try {
        return new RemoteTraceManager({ config: opts.config, remote: opts.remote, logger });
      } catch (err) {
        if (err instanceof ConfigurationError) {
          logger.warn(`${err.message}, tracing disabled`);
          return NOOP_TRACE_MANAGER;
        }
        throw err;
      }
    }

    case "print":
      return new PrintTraceManager({ config: opts.config, logger, write: opts.write });

    case "none":
      return NOOP_TRACE_MANAGER;

    default:
      logger.warn(`unknown tracing mode '${mode}' (expected one of: ${TRACING_MODES.join(", ")}), tracing disabled`);
      return NOOP_TRACE_MANAGER;
  }
}

export interface TraceManagerFromEnvOptions {
  /** Environment to read. When set, no .env file is loaded. */
  env?: Record<string, string | undefined>;
  /** .env file to load into process.env first. Default: ./.env */
  dotenvPath?: string;
  /** Default: console logger at TRACING_LOG_LEVEL. */
  logger?: Logger;
  write?: (line: string) => void;
}

/**
 * Builds the backend named by TRACING_MODE, configured from the
 * environment. Invalid settings log a warning and yield the no-op manager.
 */
export function createTraceManagerFromEnv(opts: TraceManagerFromEnvOptions = {}): TraceManager {
  let resolved: ResolvedConfig;
  try {
    resolved = opts.env ? resolveConfig(opts.env) : loadConfig({ path: opts.dotenvPath });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      (opts.logger ?? createConsoleLogger()).warn(`${err.message}, tracing disabled`);
      return NOOP_TRACE_MANAGER;
    }
    throw err;
  }

  return createTraceManager(resolved.mode, {
    config: resolved.manager,
    remote: resolved.remote,
    logger: opts.logger ?? createConsoleLogger({ level: resolved.logLevel }),
    write:  opts.write,
  });
}
