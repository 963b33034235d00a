export class TracekitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid configuration (remote credentials, host, env values).
 * Never fatal: the backend factory catches it and falls back to NoOp.
 */
export class ConfigurationError extends TracekitError {}

/**
 * A failed delivery to the ingestion API. Logged and counted by the circuit
 * breaker; instrumented code never sees it.
 */
export class DeliveryError extends TracekitError {
  readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
  }
}

/** Normalises anything thrown into an Error so it can be recorded. */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  if (typeof thrown === "string") return new Error(thrown);
  try {
    return new Error(JSON.stringify(thrown) ?? String(thrown));
  } catch {
    return new Error(String(thrown));
  }
}
