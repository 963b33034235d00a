export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Default: "warn" */
  level?: LogLevel;
  /** Default: "[tracekit]" */
  prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug:  10,
  info:   20,
  warn:   30,
  error:  40,
  silent: 100,
};

/**
 * Logger writing to the global console, each line prefixed so tracing
 * output is easy to tell apart from the application's own.
 */
export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[opts.level ?? "warn"];
  const prefix    = opts.prefix ?? "[tracekit]";

  const enabled = (level: Exclude<LogLevel, "silent">) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (message, ...args) => { if (enabled("debug")) console.debug(`${prefix} ${message}`, ...args); },
    info:  (message, ...args) => { if (enabled("info"))  console.info(`${prefix} ${message}`, ...args); },
    warn:  (message, ...args) => { if (enabled("warn"))  console.warn(`${prefix} ${message}`, ...args); },
    error: (message, ...args) => { if (enabled("error")) console.error(`${prefix} ${message}`, ...args); },
  };
}

/** Drops everything. Handy in tests. */
export const silentLogger: Logger = createConsoleLogger({ level: "silent" });
