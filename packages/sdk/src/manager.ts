import {
  DEFAULT_TRACE_MANAGER_CONFIG,
  createConsoleLogger,
  generateEventId,
  generateSpanId,
  generateTraceId,
} from "@tracekit/core";
import type {
  EventId,
  Logger,
  SpanId,
  TraceEvent,
  TraceId,
  TraceManagerConfig,
} from "@tracekit/core";
import { ContextScope } from "./context.js";
import { NOOP_TRACE } from "./noop.js";
import { SpanHandle } from "./span.js";
import { TraceHandle } from "./trace.js";
import type { TraceHost } from "./trace.js";
import type { Context, Span, Trace, TraceOptions } from "./types.js";

/**
 * Creates traces and hands their events to a backend.
 *
 * Every method is safe to call with tracing disabled or misconfigured;
 * backend faults are logged, never thrown into instrumented code.
 */
export interface TraceManager {
  readonly isEnabled: boolean;

  /** Starts a trace the caller must finish(). Not made active. */
  createTrace(name: string, opts?: TraceOptions): Trace;
  /**
   * Runs fn inside a new trace that is active for its duration, then
   * finishes it. A thrown error is recorded on the trace and rethrown.
   */
  withTrace<T>(name: string, fn: (trace: Trace) => T, opts?: TraceOptions): T;
  /** Like withTrace(), finishing the trace when the promise settles. */
  withTraceAsync<T>(name: string, fn: (trace: Trace) => Promise<T>, opts?: TraceOptions): Promise<T>;

  currentTrace(): Trace | undefined;
  currentSpan(): Span | undefined;
  /** Snapshot of the active trace and span, for crossing a boundary. */
  captureContext(): Context | undefined;
  /** Runs fn with a captured context active again. */
  withContext<T>(ctx: Context, fn: () => T): T;

  emitEvent(event: TraceEvent): void;
  /** Resolves once queued events have been handed off. */
  flush(): Promise<void>;
  /** Finishes every active trace, then flushes. Later traces are no-ops. */
  shutdown(): Promise<void>;
}

export interface BaseTraceManagerOptions {
  /** Merged over DEFAULT_TRACE_MANAGER_CONFIG. */
  config?: Partial<TraceManagerConfig>;
  /** Default: console logger at "warn". */
  logger?: Logger;
}

/**
 * Trace bookkeeping shared by every backend: the active-trace registry,
 * the async context scope and id generation. Subclasses only decide what
 * happens to each event.
 */
export abstract class BaseTraceManager implements TraceManager, TraceHost {
  readonly config: TraceManagerConfig;
  /** @internal */
  readonly scope = new ContextScope();

  protected readonly logger: Logger;

  readonly #activeTraces = new Map<TraceId, TraceHandle>();
  #closed = false;

  constructor(opts: BaseTraceManagerOptions = {}) {
    this.config = { ...DEFAULT_TRACE_MANAGER_CONFIG, ...opts.config };
    this.logger = opts.logger ?? createConsoleLogger();
  }

  protected abstract emitEventImpl(event: TraceEvent): void;

  protected flushImpl(): Promise<void> {
    return Promise.resolve();
  }

  get isEnabled(): boolean {
    return this.config.enabled;
  }

  get activeTraceCount(): number {
    return this.#activeTraces.size;
  }

  /** True once shutdown() has been called; new traces are no-ops from then on. */
  get isClosed(): boolean {
    return this.#closed;
  }

  createTrace(name: string, opts: TraceOptions = {}): Trace {
    return this.#startTrace(name, opts) ?? NOOP_TRACE;
  }

  withTrace<T>(name: string, fn: (trace: Trace) => T, opts: TraceOptions = {}): T {
    const trace = this.#startTrace(name, opts);
    if (!trace) return fn(NOOP_TRACE);

    try {
      const result = this.scope.run({ trace, span: undefined }, () => fn(trace));
      trace.finish();
      return result;
    } catch (err) {
      trace.recordError(err);
      trace.finish();
      throw err;
    }
  }

  withTraceAsync<T>(name: string, fn: (trace: Trace) => Promise<T>, opts: TraceOptions = {}): Promise<T> {
    const trace = this.#startTrace(name, opts);
    if (!trace) return fn(NOOP_TRACE);

    let pending: Promise<T>;
    try {
      pending = this.scope.run({ trace, span: undefined }, () => fn(trace));
    } catch (err) {
      trace.recordError(err);
      trace.finish();
      return Promise.reject(err);
    }

    return pending.then(
      (result) => {
        trace.finish();
        return result;
      },
      (err: unknown) => {
        trace.recordError(err);
        trace.finish();
        throw err;
      },
    );
  }

  currentTrace(): Trace | undefined {
    return this.scope.active?.trace;
  }

  currentSpan(): Span | undefined {
    return this.scope.active?.span;
  }

  captureContext(): Context | undefined {
    const active = this.scope.active;
    if (!active) return undefined;
    return active.span ? active.span.context : active.trace.context;
  }

  withContext<T>(ctx: Context, fn: () => T): T {
    const { trace, span } = ctx;
    // Contexts from another manager, or no-op ones, carry nothing to restore.
    if (!(trace instanceof TraceHandle) || trace.host !== this) return fn();
    return this.scope.run({ trace, span: span instanceof SpanHandle ? span : undefined }, fn);
  }

  /** Hands one event to the backend. Never throws. */
  emitEvent(event: TraceEvent): void {
    if (!this.config.enabled) return;
    try {
      this.emitEventImpl(event);
    } catch (err) {
      this.logger.error(`failed to emit ${event.type} event ${event.id}:`, err);
    }
  }

  flush(): Promise<void> {
    return this.flushImpl();
  }

  async shutdown(): Promise<void> {
    this.#closed = true;
    for (const trace of [...this.#activeTraces.values()]) trace.finish();
    this.#activeTraces.clear();
    await this.flush();
  }

  // ── TraceHost ─────────────────────────────────────────────────────────────

  /** @internal */
  generateSpanId(): SpanId {
    return generateSpanId();
  }

  /** @internal */
  generateEventId(): EventId {
    return generateEventId();
  }

  /** @internal */
  onTraceFinished(trace: TraceHandle): void {
    this.#activeTraces.delete(trace.traceId);
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  #startTrace(name: string, opts: TraceOptions): TraceHandle | undefined {
    if (!this.config.enabled || this.#closed) return undefined;
    const trace = new TraceHandle(this, generateTraceId(), name, opts);
    this.#activeTraces.set(trace.traceId, trace);
    return trace;
  }
}
