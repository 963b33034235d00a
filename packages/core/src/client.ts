import { CircuitBreaker } from "./circuit-breaker.js";
import type { CircuitState } from "./circuit-breaker.js";
import { DeliveryError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { IngestionBatch, IngestionEnvelope } from "./wire.js";

export interface IngestClientOptions {
  /**
   * Base URL of the ingestion API, without a trailing path.
   * Defaults to http://localhost:3000 for local development.
   */
  host?: string;
  /** Sent as the Basic Auth username. */
  publicKey: string;
  /** Sent as the Basic Auth password. */
  secretKey: string;
  /** Consecutive failed sends that open the circuit breaker. Default: 5 */
  failureThreshold?: number;
  /** Circuit breaker cool-down in ms. Default: 60000 */
  resetTimeout?: number;
  /**
   * Extra attempts for a send that failed on the transport or with a
   * retryable status (429, 5xx) before it counts as one failure. Default: 0
   */
  maxRetries?: number;
  /** Delay before the first retry in ms, doubled on each further retry. Default: 500 */
  retryDelay?: number;
  /** Upper bound for a single retry delay in ms. Default: 10000 */
  maxRetryDelay?: number;
  /** Per-request timeout in ms. Default: 30000 */
  timeout?: number;
  /** Default: console logger at "warn". */
  logger?: Logger;
  /** Clock for the circuit breaker. Default: Date.now */
  now?: () => number;
  /** Waits between retries. Default: a timer */
  sleep?: (ms: number) => Promise<void>;
}

const INGESTION_PATH = "/api/public/ingestion";

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Transport errors carry no status and are always worth another attempt. */
export function isRetryable(err: DeliveryError): boolean {
  return err.status === undefined || RETRYABLE_STATUSES.has(err.status);
}

/**
 * HTTP client for the ingestion API.
 *
 * Each call to send() is one POST of `{"batch": [...]}` authenticated with
 * HTTP Basic Auth. A 207 or any 2xx is a success; anything else, or a
 * transport error, is a failure counted by the circuit breaker. While the
 * breaker is open send() returns false without touching the network.
 *
 * send() never throws: delivery problems are logged and reported through
 * the boolean result, so tracing can never break the caller.
 *
 * Uses the native `fetch` API (Node.js >= 18).
 */
export class IngestClient {
  readonly #url: string;
  readonly #publicKey: string;
  readonly #secretKey: string;
  readonly #maxRetries: number;
  readonly #retryDelay: number;
  readonly #maxRetryDelay: number;
  readonly #sleep: (ms: number) => Promise<void>;
  readonly #timeout: number;
  readonly #logger: Logger;
  readonly #breaker: CircuitBreaker;

  constructor(opts: IngestClientOptions) {
    const host        = (opts.host ?? "http://localhost:3000").replace(/\/$/, "");
    this.#url         = `${host}${INGESTION_PATH}`;
    this.#publicKey   = opts.publicKey;
    this.#secretKey   = opts.secretKey;
    this.#maxRetries    = opts.maxRetries    ?? 0;
    this.#retryDelay    = opts.retryDelay    ?? 500;
    this.#maxRetryDelay = opts.maxRetryDelay ?? 10_000;
    this.#sleep         = opts.sleep         ?? delay;
    this.#timeout       = opts.timeout       ?? 30_000;
    this.#logger        = opts.logger        ?? createConsoleLogger();
    this.#breaker     = new CircuitBreaker({
      failureThreshold: opts.failureThreshold,
      resetTimeout:     opts.resetTimeout,
      now:              opts.now,
    });
  }

  get url(): string {
    return this.#url;
  }

  /** False when either key is empty; sends are then skipped. */
  get isConfigured(): boolean {
    return this.#publicKey.length > 0 && this.#secretKey.length > 0;
  }

  get circuitState(): CircuitState {
    return this.#breaker.state;
  }

  /** Sends one batch request. Resolves to true on success. */
  async send(envelopes: IngestionEnvelope[]): Promise<boolean> {
    if (!this.isConfigured) {
      this.#logger.warn("public or secret key not set, skipping export");
      return false;
    }

    if (!this.#breaker.canRequest()) {
      this.#logger.debug(`circuit breaker open, skipping ${envelopes.length} event(s)`);
      return false;
    }

    const body: IngestionBatch = { batch: envelopes };

    let lastError: DeliveryError | undefined;
    for (let attempt = 0; attempt <= this.#maxRetries; attempt++) {
      if (attempt > 0) await this.#sleep(this.#backoff(attempt));
      try {
        await this.#post(body);
        this.#breaker.recordSuccess();
        return true;
      } catch (err) {
        lastError = err instanceof DeliveryError
          ? err
          : new DeliveryError(`ingest request failed: ${String(err)}`, { cause: err });
        this.#logger.debug(`ingest attempt ${attempt + 1} failed: ${lastError.message}`);
        if (!isRetryable(lastError)) break;
      }
    }

    this.#logger.error(`ingest export failed: ${lastError?.message ?? "unknown error"}`);
    if (this.#breaker.recordFailure()) {
      this.#logger.warn(`circuit breaker opened after ${this.#breaker.failures} consecutive failures`);
    }
    return false;
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  #backoff(attempt: number): number {
    return Math.min(this.#retryDelay * 2 ** (attempt - 1), this.#maxRetryDelay);
  }

  #authorization(): string {
    const credentials = Buffer.from(`${this.#publicKey}:${this.#secretKey}`).toString("base64");
    return `Basic ${credentials}`;
  }

  async #post(body: IngestionBatch): Promise<void> {
    let res: Response;
    try {
      res = await fetch(this.#url, {
        method: "POST",
        headers: {
          "Content-Type":  "application/json",
          "Authorization": this.#authorization(),
        },
        body:   JSON.stringify(body),
        signal: AbortSignal.timeout(this.#timeout),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DeliveryError(`ingest request failed: ${reason}`, { cause: err });
    }

    if (res.status === 207) {
      this.#logger.debug(`ingest partial success: ${await res.text().catch(() => "")}`);
      return;
    }

    if (res.status < 200 || res.status >= 300) {
      const text = await res.text().catch(() => "");
      throw new DeliveryError(`ingest error ${res.status}: ${text}`, { status: res.status });
    }
  }
}
