export type CircuitState = "closed" | "open";

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit. Default: 5 */
  failureThreshold?: number;
  /** Cool-down (ms) after the last failure before the next attempt is let through. Default: 60000 */
  resetTimeout?: number;
  /** Clock, injectable for tests. Default: Date.now */
  now?: () => number;
}

/**
 * Two-state circuit breaker guarding the ingestion API.
 *
 *   closed ──(failureThreshold consecutive failures)──▶ open
 *   open   ──(resetTimeout elapsed since last failure, on next canRequest())──▶ closed
 *
 * There is no half-open probe: once the cool-down has passed the breaker
 * closes with a fresh failure count and the next attempt's own outcome is
 * what counts.
 */
export class CircuitBreaker {
  readonly #failureThreshold: number;
  readonly #resetTimeout: number;
  readonly #now: () => number;

  #state: CircuitState = "closed";
  #failures = 0;
  #lastFailureAt = 0;

  constructor(opts: CircuitBreakerOptions = {}) {
    this.#failureThreshold = opts.failureThreshold ?? 5;
    this.#resetTimeout     = opts.resetTimeout     ?? 60_000;
    this.#now              = opts.now              ?? Date.now;
  }

  get state(): CircuitState {
    return this.#state;
  }

  get failures(): number {
    return this.#failures;
  }

  /**
   * Whether a request may go out now. Closes an open breaker whose
   * cool-down has elapsed.
   */
  canRequest(): boolean {
    if (this.#state === "closed") return true;

    if (this.#now() - this.#lastFailureAt >= this.#resetTimeout) {
      this.#state    = "closed";
      this.#failures = 0;
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    this.#failures = 0;
  }

  /** Returns true when this failure opened the circuit. */
  recordFailure(): boolean {
    this.#failures += 1;
    this.#lastFailureAt = this.#now();

    if (this.#state === "closed" && this.#failures >= this.#failureThreshold) {
      this.#state = "open";
      return true;
    }
    return false;
  }
}
