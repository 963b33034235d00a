import type { TraceManager } from "./manager.js";
import { createTraceManager, createTraceManagerFromEnv } from "./factory.js";
import type { CreateTraceManagerOptions, TraceManagerFromEnvOptions } from "./factory.js";
import { NOOP_SPAN } from "./noop.js";
import type { Context, Span, Trace, TraceOptions } from "./types.js";

/**
 * The main entry point for the SDK.
 *
 * @example
 * ```ts
 * import { Tracekit } from "@tracekit/sdk";
 *
 * const tk = Tracekit.fromEnv();
 *
 * const answer = await tk.withTraceAsync("answer-question", async (trace) => {
 *   trace.setInput({ question });
 *   return tk.spanAsync("llm", async (span) => {
 *     const result = await callModel(question);
 *     span.setOutput(result.text);
 *     return result.text;
 *   });
 * });
 *
 * // Before process exit:
 * await tk.shutdown();
 * ```
 */
export class Tracekit {
  readonly manager: TraceManager;

  constructor(manager: TraceManager) {
    this.manager = manager;
  }

  /** Backend chosen by TRACING_MODE, configured from the environment. */
  static fromEnv(opts?: TraceManagerFromEnvOptions): Tracekit {
    return new Tracekit(createTraceManagerFromEnv(opts));
  }

  static create(mode: string, opts?: CreateTraceManagerOptions): Tracekit {
    return new Tracekit(createTraceManager(mode, opts));
  }

  /**
   * Start a trace. Call .finish() on it when the operation is complete.
   * Prefer withTrace(), which also makes the trace active.
   */
  trace(name: string, opts?: TraceOptions): Trace {
    return this.manager.createTrace(name, opts);
  }

  withTrace<T>(name: string, fn: (trace: Trace) => T, opts?: TraceOptions): T {
    return this.manager.withTrace(name, fn, opts);
  }

  withTraceAsync<T>(name: string, fn: (trace: Trace) => Promise<T>, opts?: TraceOptions): Promise<T> {
    return this.manager.withTraceAsync(name, fn, opts);
  }

  /**
   * Run fn in a span under whatever is active: the current span, else the
   * current trace. Outside any trace fn still runs, with a no-op span.
   */
  span<T>(name: string, fn: (span: Span) => T): T {
    const parent = this.manager.currentSpan() ?? this.manager.currentTrace();
    return parent ? parent.span(name, fn) : fn(NOOP_SPAN);
  }

  spanAsync<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    const parent = this.manager.currentSpan() ?? this.manager.currentTrace();
    return parent ? parent.spanAsync(name, fn) : fn(NOOP_SPAN);
  }

  currentTrace(): Trace | undefined {
    return this.manager.currentTrace();
  }

  currentSpan(): Span | undefined {
    return this.manager.currentSpan();
  }

  captureContext(): Context | undefined {
    return this.manager.captureContext();
  }

  withContext<T>(ctx: Context, fn: () => T): T {
    return this.manager.withContext(ctx, fn);
  }

  /** Wait for queued events to be handed off. */
  flush(): Promise<void> {
    return this.manager.flush();
  }

  /**
   * Finish every open trace and flush. Call this before process exit so
   * nothing is dropped.
   */
  shutdown(): Promise<void> {
    return this.manager.shutdown();
  }
}
