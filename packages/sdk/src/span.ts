import { toError } from "@tracekit/core";
import type { Metadata, SpanId, Status, TraceId } from "@tracekit/core";
import { runWithGenerationTracker, runWithToolCallTracker } from "./tracker.js";
import type { TraceHandle } from "./trace.js";
import type {
  Context,
  GenerationOptions,
  GenerationSpanOptions,
  GenerationTracker,
  RecordedSpanEvent,
  ScoreOptions,
  Span,
  ToolCallOptions,
  ToolCallSpanOptions,
  ToolCallTracker,
} from "./types.js";

/**
 * A handle to an in-progress span.
 *
 * Obtain one via TraceHandle.span() or SpanHandle.span(). The span is
 * finished when the callback returns; nested spans still open at that point
 * are finished first.
 */
export class SpanHandle implements Span {
  readonly spanId: SpanId;
  readonly traceId: TraceId;
  readonly parentSpanId: SpanId | undefined;
  readonly name: string;
  readonly startTime: Date;
  /** @internal */
  readonly trace: TraceHandle;

  readonly #parent: SpanHandle | undefined;
  readonly #metadata = new Map<string, unknown>();
  readonly #tags = new Set<string>();
  readonly #events: RecordedSpanEvent[] = [];
  readonly #children = new Map<SpanId, SpanHandle>();

  #input: unknown;
  #output: unknown;
  #status: Status = "ok";
  #error: Error | undefined;
  #endTime: Date | undefined;
  #finished = false;

  /** @internal */
  constructor(trace: TraceHandle, spanId: SpanId, name: string, parent?: SpanHandle) {
    this.spanId        = spanId;
    this.traceId       = trace.traceId;
    this.parentSpanId  = parent?.spanId;
    this.name          = name;
    this.startTime     = new Date();
    this.trace         = trace;
    this.#parent       = parent;

    if (parent) parent.#children.set(spanId, this);

    trace.host.emitEvent({
      type:         "span-create",
      id:           trace.host.generateEventId(),
      timestamp:    this.startTime,
      traceId:      this.traceId,
      spanId:       this.spanId,
      parentSpanId: this.parentSpanId,
      name:         this.name,
      startTime:    this.startTime,
      metadata:     {},
      tags:         [],
    });
  }

  get status(): Status {
    return this.#status;
  }

  get endTime(): Date | undefined {
    return this.#endTime;
  }

  get isFinished(): boolean {
    return this.#finished;
  }

  get events(): readonly RecordedSpanEvent[] {
    return this.#events;
  }

  get context(): Context {
    return { traceId: this.traceId, spanId: this.spanId, trace: this.trace, span: this };
  }

  addMetadata(key: string, value: unknown): void;
  addMetadata(metadata: Metadata): void;
  addMetadata(keyOrMetadata: string | Metadata, value?: unknown): void {
    if (typeof keyOrMetadata === "string") {
      this.#metadata.set(keyOrMetadata, value);
      return;
    }
    for (const [key, entry] of Object.entries(keyOrMetadata)) this.#metadata.set(key, entry);
  }

  addTag(tag: string): void {
    this.#tags.add(tag);
  }

  addTags(...tags: string[]): void {
    for (const tag of tags) this.#tags.add(tag);
  }

  setInput(input: unknown): void {
    this.#input = input;
  }

  setOutput(output: unknown): void {
    this.#output = output;
  }

  setStatus(status: Status): void {
    this.#status = status;
  }

  recordError(error: unknown): void {
    this.#error  = toError(error);
    this.#status = "error";
  }

  recordEvent(name: string, attributes: Metadata = {}): void {
    const event: RecordedSpanEvent = {
      id:        this.trace.host.generateEventId(),
      name,
      timestamp: new Date(),
      attributes,
    };
    this.#events.push(event);

    this.trace.host.emitEvent({
      type:       "span-event",
      id:         event.id,
      timestamp:  event.timestamp,
      traceId:    this.traceId,
      spanId:     this.spanId,
      eventName:  name,
      eventTime:  event.timestamp,
      attributes,
    });
  }

  recordGeneration(opts: GenerationOptions): void {
    this.trace.recordGeneration({ ...opts, spanId: this.spanId });
  }

  recordToolCall(opts: ToolCallOptions): void {
    this.trace.recordToolCall({ ...opts, spanId: this.spanId });
  }

  score(opts: ScoreOptions): void {
    this.trace.score({ ...opts, observationId: this.spanId });
  }

  span<T>(name: string, fn: (span: Span) => T): T {
    return runSpan(this.trace.startSpan(name, this), fn);
  }

  spanAsync<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    return runSpanAsync(this.trace.startSpan(name, this), fn);
  }

  generationSpan<T>(
    name: string,
    opts: GenerationSpanOptions,
    fn: (span: Span, tracker: GenerationTracker) => T,
  ): T {
    return this.span(name, (span) => runWithGenerationTracker(span, opts, fn));
  }

  toolCallSpan<T>(
    name: string,
    opts: ToolCallSpanOptions,
    fn: (span: Span, tracker: ToolCallTracker) => T,
  ): T {
    return this.span(name, (span) => runWithToolCallTracker(span, opts, fn));
  }

  /**
   * Finish the span, recording endTime now. Open children are finished
   * first, so their updates precede this one.
   *
   * Calling finish() more than once is a no-op.
   */
  finish(): void {
    if (this.#finished) return;
    this.#finished = true;

    // endTime never precedes startTime, even if the wall clock steps back.
    this.#endTime = new Date(Math.max(Date.now(), this.startTime.getTime()));

    for (const child of [...this.#children.values()]) child.finish();

    this.trace.host.emitEvent({
      type:      "span-update",
      id:        this.trace.host.generateEventId(),
      timestamp: this.#endTime,
      traceId:   this.traceId,
      spanId:    this.spanId,
      endTime:   this.#endTime,
      metadata:  Object.fromEntries(this.#metadata),
      tags:      [...this.#tags],
      input:     this.#input,
      output:    this.#output,
      status:    this.#status,
      error:     this.#error,
    });

    if (this.#parent) this.#parent.#children.delete(this.spanId);
    this.trace.onSpanFinished(this);
  }
}

/**
 * Runs fn with `span` active, finishing the span on return. A thrown error
 * is recorded on the span and rethrown unchanged.
 *
 * @internal
 */
export function runSpan<T>(span: SpanHandle, fn: (span: Span) => T): T {
  try {
    const result = span.trace.host.scope.run({ trace: span.trace, span }, () => fn(span));
    span.finish();
    return result;
  } catch (err) {
    span.recordError(err);
    span.finish();
    throw err;
  }
}

/**
 * Async counterpart of runSpan(): the span stays open, and active for
 * everything the body awaits, until the returned promise settles.
 *
 * @internal
 */
export function runSpanAsync<T>(span: SpanHandle, fn: (span: Span) => Promise<T>): Promise<T> {
  let pending: Promise<T>;
  try {
    pending = span.trace.host.scope.run({ trace: span.trace, span }, () => fn(span));
  } catch (err) {
    span.recordError(err);
    span.finish();
    return Promise.reject(err);
  }

  return pending.then(
    (result) => {
      span.finish();
      return result;
    },
    (err: unknown) => {
      span.recordError(err);
      span.finish();
      throw err;
    },
  );
}
