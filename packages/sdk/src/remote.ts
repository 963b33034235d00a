import {
  ConfigurationError,
  IngestClient,
  encodeEvent,
  isRemoteConfigValid,
} from "@tracekit/core";
import type { EncodeOptions, RemoteConfig, TraceEvent } from "@tracekit/core";
import { BaseTraceManager } from "./manager.js";
import type { BaseTraceManagerOptions } from "./manager.js";

export interface RemoteTraceManagerOptions extends BaseTraceManagerOptions {
  remote: RemoteConfig;
  /** Circuit breaker cool-down in ms. Default: 60000 */
  resetTimeout?: number;
  /** Clock for the circuit breaker. Default: Date.now */
  now?: () => number;
  /** Delay before the first retry in ms. Default: 500 */
  retryDelay?: number;
}

/**
 * Backend that ships every event to the remote ingestion API.
 *
 * emitEvent() only encodes and enqueues; deliveries go out one at a time,
 * in emission order, off the caller's path. At most `batchSize` deliveries
 * wait in the queue; events beyond that are dropped with a warning.
 *
 * Throws ConfigurationError when host or keys are missing.
 */
export class RemoteTraceManager extends BaseTraceManager {
  readonly #client: IngestClient;
  readonly #encodeOptions: EncodeOptions;

  #queue: Promise<void> = Promise.resolve();
  #pending = 0;
  #closed = false;
  #shutdown: Promise<void> | undefined;

  constructor(opts: RemoteTraceManagerOptions) {
    super(opts);

    if (!isRemoteConfigValid(opts.remote)) {
      throw new ConfigurationError("remote tracing needs a host, a public key and a secret key");
    }

    this.#client = new IngestClient({
      host:             opts.remote.host,
      publicKey:        opts.remote.publicKey,
      secretKey:        opts.remote.secretKey,
      timeout:          opts.remote.timeoutMs,
      failureThreshold: this.config.circuitBreakerThreshold,
      maxRetries:       this.config.maxRetries,
      resetTimeout:     opts.resetTimeout,
      retryDelay:       opts.retryDelay,
      now:              opts.now,
      logger:           this.logger,
    });

    this.#encodeOptions = {
      release:     this.config.release,
      version:     this.config.version,
      environment: this.config.environment,
    };
  }

  /** Deliveries queued or in flight. */
  get pendingDeliveries(): number {
    return this.#pending;
  }

  get client(): IngestClient {
    return this.#client;
  }

  protected emitEventImpl(event: TraceEvent): void {
    if (this.#closed) {
      this.logger.debug(`manager shut down, dropping ${event.type} event ${event.id}`);
      return;
    }
    if (this.#pending >= this.config.batchSize) {
      this.logger.warn(`delivery queue full (${this.config.batchSize}), dropping ${event.type} event ${event.id}`);
      return;
    }

    const envelopes = encodeEvent(event, this.#encodeOptions);
    this.logger.debug(`queued ${event.type} event ${event.id}`);

    this.#pending += 1;
    this.#queue = this.#queue
      .then(async () => {
        const delivered = await this.#client.send(envelopes);
        if (!delivered) this.logger.debug(`${event.type} event ${event.id} not delivered`);
      })
      .catch((err: unknown) => {
        this.logger.error(`delivery of ${event.type} event ${event.id} failed:`, err);
      })
      .finally(() => {
        this.#pending -= 1;
      });
  }

  /**
   * Waits for the deliveries queued so far, at most `flushIntervalMs`
   * (0 waits without bound).
   */
  protected async flushImpl(): Promise<void> {
    const drained = this.#queue;
    const limit = this.config.flushIntervalMs;
    if (limit <= 0) {
      await drained;
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), limit);
      timer.unref();
    });

    const expired = await Promise.race([drained.then(() => false), timedOut]);
    clearTimeout(timer);

    if (expired) {
      this.logger.warn(`flush timed out after ${limit}ms with ${this.#pending} deliveries pending`);
    }
  }

  /**
   * Finishes active traces, delivers what is queued, then stops accepting
   * events. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    this.#shutdown ??= super.shutdown().finally(() => {
      this.#closed = true;
    });
    return this.#shutdown;
  }
}
