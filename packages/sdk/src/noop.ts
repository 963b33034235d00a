import type { Status } from "@tracekit/core";
import type { TraceManager } from "./manager.js";
import { runWithGenerationTracker, runWithToolCallTracker } from "./tracker.js";
import type {
  Context,
  GenerationSpanOptions,
  GenerationTracker,
  RecordedSpanEvent,
  Span,
  ToolCallSpanOptions,
  ToolCallTracker,
  Trace,
} from "./types.js";

const NOOP_ID = "noop";

/**
 * Span that records nothing. Callbacks handed to it still run, so
 * instrumented code behaves the same with tracing off.
 */
export class NoOpSpan implements Span {
  readonly spanId = NOOP_ID;
  readonly traceId = NOOP_ID;
  readonly parentSpanId = undefined;
  readonly name = NOOP_ID;
  readonly startTime = new Date(0);
  readonly endTime = undefined;
  readonly status: Status = "ok";
  readonly isFinished = false;
  readonly events: readonly RecordedSpanEvent[] = [];

  get context(): Context {
    return { traceId: NOOP_ID, spanId: NOOP_ID, trace: NOOP_TRACE, span: this };
  }

  addMetadata(): void {}
  addTag(): void {}
  addTags(): void {}
  setInput(): void {}
  setOutput(): void {}
  setStatus(): void {}
  recordError(): void {}
  recordEvent(): void {}
  recordGeneration(): void {}
  recordToolCall(): void {}
  score(): void {}
  finish(): void {}

  span<T>(_name: string, fn: (span: Span) => T): T {
    return fn(this);
  }

  spanAsync<T>(_name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    return fn(this);
  }

  generationSpan<T>(
    _name: string,
    opts: GenerationSpanOptions,
    fn: (span: Span, tracker: GenerationTracker) => T,
  ): T {
    return runWithGenerationTracker(this, opts, fn);
  }

  toolCallSpan<T>(
    _name: string,
    opts: ToolCallSpanOptions,
    fn: (span: Span, tracker: ToolCallTracker) => T,
  ): T {
    return runWithToolCallTracker(this, opts, fn);
  }
}

export class NoOpTrace implements Trace {
  readonly traceId = NOOP_ID;
  readonly name = NOOP_ID;
  readonly userId = undefined;
  readonly sessionId = undefined;
  readonly currentSpan = undefined;
  readonly status: Status = "ok";
  readonly isFinished = false;

  get context(): Context {
    return { traceId: NOOP_ID, spanId: undefined, trace: this, span: undefined };
  }

  addMetadata(): void {}
  addTag(): void {}
  addTags(): void {}
  setInput(): void {}
  setOutput(): void {}
  setStatus(): void {}
  recordError(): void {}
  recordGeneration(): void {}
  updateGeneration(): void {}
  recordToolCall(): void {}
  score(): void {}
  finish(): void {}

  span<T>(_name: string, fn: (span: Span) => T): T {
    return fn(NOOP_SPAN);
  }

  spanAsync<T>(_name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    return fn(NOOP_SPAN);
  }

  generationSpan<T>(
    _name: string,
    opts: GenerationSpanOptions,
    fn: (span: Span, tracker: GenerationTracker) => T,
  ): T {
    return runWithGenerationTracker(NOOP_SPAN, opts, fn);
  }

  toolCallSpan<T>(
    _name: string,
    opts: ToolCallSpanOptions,
    fn: (span: Span, tracker: ToolCallTracker) => T,
  ): T {
    return runWithToolCallTracker(NOOP_SPAN, opts, fn);
  }
}

export const NOOP_SPAN: Span = new NoOpSpan();
export const NOOP_TRACE: Trace = new NoOpTrace();

/** Discards everything. Used when tracing is off or misconfigured. */
export class NoOpTraceManager implements TraceManager {
  readonly isEnabled = false;

  createTrace(): Trace {
    return NOOP_TRACE;
  }

  withTrace<T>(_name: string, fn: (trace: Trace) => T): T {
    return fn(NOOP_TRACE);
  }

  withTraceAsync<T>(_name: string, fn: (trace: Trace) => Promise<T>): Promise<T> {
    return fn(NOOP_TRACE);
  }

  currentTrace(): Trace | undefined {
    return undefined;
  }

  currentSpan(): Span | undefined {
    return undefined;
  }

  captureContext(): Context | undefined {
    return undefined;
  }

  withContext<T>(_ctx: Context, fn: () => T): T {
    return fn();
  }

  emitEvent(): void {}

  flush(): Promise<void> {
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    return Promise.resolve();
  }
}

export const NOOP_TRACE_MANAGER: TraceManager = new NoOpTraceManager();
