import { generationBodyId, toError } from "@tracekit/core";
import type { EventId, Metadata, SpanId, Status, TraceEvent, TraceId } from "@tracekit/core";
import type { ContextScope } from "./context.js";
import { SpanHandle, runSpan, runSpanAsync } from "./span.js";
import { runWithGenerationTracker, runWithToolCallTracker } from "./tracker.js";
import type {
  Context,
  GenerationOptions,
  GenerationSpanOptions,
  GenerationTracker,
  GenerationUpdateOptions,
  ScoreOptions,
  Span,
  ToolCallOptions,
  ToolCallSpanOptions,
  ToolCallTracker,
  Trace,
  TraceOptions,
} from "./types.js";

/**
 * What a trace needs from the manager that created it.
 *
 * @internal
 */
export interface TraceHost {
  readonly scope: ContextScope;
  generateSpanId(): SpanId;
  generateEventId(): EventId;
  emitEvent(event: TraceEvent): void;
  onTraceFinished(trace: TraceHandle): void;
}

/**
 * A handle to an in-progress trace.
 *
 * Obtain one via TraceManager.createTrace() or withTrace(). The create event
 * is emitted on construction so the trace is visible before it finishes.
 */
export class TraceHandle implements Trace {
  readonly traceId: TraceId;
  readonly name: string;
  readonly userId: string | undefined;
  readonly sessionId: string | undefined;
  readonly createdAt: Date;
  /** @internal */
  readonly host: TraceHost;

  readonly #metadata = new Map<string, unknown>();
  readonly #tags = new Set<string>();
  readonly #activeSpans = new Map<SpanId, SpanHandle>();

  #input: unknown;
  #output: unknown;
  #status: Status = "ok";
  #error: Error | undefined;
  #finished = false;

  /** @internal */
  constructor(host: TraceHost, traceId: TraceId, name: string, opts: TraceOptions = {}) {
    this.traceId    = traceId;
    this.name       = name;
    this.userId     = opts.userId;
    this.sessionId  = opts.sessionId;
    this.createdAt  = new Date();
    this.host       = host;
    this.#input     = opts.input;

    for (const [key, value] of Object.entries(opts.metadata ?? {})) this.#metadata.set(key, value);
    for (const tag of opts.tags ?? []) this.#tags.add(tag);

    host.emitEvent({
      type:      "trace-create",
      id:        host.generateEventId(),
      timestamp: this.createdAt,
      traceId:   this.traceId,
      name:      this.name,
      userId:    this.userId,
      sessionId: this.sessionId,
      metadata:  Object.fromEntries(this.#metadata),
      tags:      [...this.#tags],
      input:     this.#input,
    });
  }

  get status(): Status {
    return this.#status;
  }

  get isFinished(): boolean {
    return this.#finished;
  }

  get currentSpan(): SpanHandle | undefined {
    const active = this.host.scope.active;
    return active?.trace === this ? active.span : undefined;
  }

  get context(): Context {
    const span = this.currentSpan;
    return { traceId: this.traceId, spanId: span?.spanId, trace: this, span };
  }

  /** Number of spans started on this trace and not yet finished. */
  get activeSpanCount(): number {
    return this.#activeSpans.size;
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

  // ── Observations ──────────────────────────────────────────────────────────

  recordGeneration(opts: GenerationOptions): void {
    this.host.emitEvent({
      type:            "generation",
      id:              this.host.generateEventId(),
      timestamp:       new Date(),
      traceId:         this.traceId,
      spanId:          opts.spanId,
      name:            opts.name,
      startTime:       opts.startTime,
      endTime:         opts.endTime,
      model:           opts.model,
      modelParameters: opts.modelParameters ?? {},
      input:           opts.input,
      output:          opts.output,
      usage:           opts.usage,
      metadata:        opts.metadata ?? {},
      promptName:      opts.promptName,
      level:           opts.level,
      statusMessage:   opts.statusMessage,
    });
  }

  updateGeneration(name: string, opts: GenerationUpdateOptions): void {
    this.host.emitEvent({
      type:         "generation-update",
      id:           this.host.generateEventId(),
      timestamp:    new Date(),
      traceId:      this.traceId,
      generationId: generationBodyId(this.traceId, name),
      endTime:      opts.endTime,
      output:       opts.output,
      usage:        opts.usage,
      metadata:     opts.metadata ?? {},
    });
  }

  recordToolCall(opts: ToolCallOptions): void {
    this.host.emitEvent({
      type:      "tool-call",
      id:        this.host.generateEventId(),
      timestamp: new Date(),
      traceId:   this.traceId,
      spanId:    opts.spanId,
      name:      opts.name,
      startTime: opts.startTime,
      endTime:   opts.endTime,
      toolName:  opts.toolName,
      input:     opts.input,
      output:    opts.output,
      metadata:  { ...opts.metadata, toolName: opts.toolName },
    });
  }

  score(opts: ScoreOptions): void {
    this.host.emitEvent({
      type:          "score",
      id:            this.host.generateEventId(),
      timestamp:     new Date(),
      traceId:       this.traceId,
      observationId: opts.observationId,
      name:          opts.name,
      value:         opts.value,
      source:        opts.source ?? "annotation",
      comment:       opts.comment,
      metadata:      opts.metadata ?? {},
    });
  }

  // ── Spans ─────────────────────────────────────────────────────────────────

  /**
   * Run fn inside a new span. The span's parent is the active span of this
   * trace, if any; otherwise it is a root span.
   */
  span<T>(name: string, fn: (span: Span) => T): T {
    return runSpan(this.startSpan(name, this.currentSpan), fn);
  }

  spanAsync<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    return runSpanAsync(this.startSpan(name, this.currentSpan), fn);
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

  /** @internal */
  startSpan(name: string, parent: SpanHandle | undefined): SpanHandle {
    const span = new SpanHandle(this, this.host.generateSpanId(), name, parent);
    this.#activeSpans.set(span.spanId, span);
    return span;
  }

  /** @internal */
  onSpanFinished(span: SpanHandle): void {
    this.#activeSpans.delete(span.spanId);
  }

  /**
   * Finish the trace. Every span still open is finished first.
   *
   * Calling finish() more than once is a no-op.
   */
  finish(): void {
    if (this.#finished) return;
    this.#finished = true;

    for (const span of [...this.#activeSpans.values()]) span.finish();

    this.host.emitEvent({
      type:      "trace-update",
      id:        this.host.generateEventId(),
      timestamp: new Date(),
      traceId:   this.traceId,
      metadata:  Object.fromEntries(this.#metadata),
      tags:      [...this.#tags],
      output:    this.#output,
      status:    this.#status,
      error:     this.#error,
    });

    this.host.onTraceFinished(this);
  }
}
