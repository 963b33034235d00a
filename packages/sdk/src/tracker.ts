import type {
  GenerationResult,
  GenerationSpanOptions,
  GenerationTracker,
  Span,
  ToolCallResult,
  ToolCallSpanOptions,
  ToolCallTracker,
} from "./types.js";

class SpanGenerationTracker implements GenerationTracker {
  readonly #span: Span;
  readonly #opts: GenerationSpanOptions;
  readonly #startTime = new Date();

  #finished = false;

  constructor(span: Span, opts: GenerationSpanOptions) {
    this.#span = span;
    this.#opts = opts;
  }

  get isFinished(): boolean {
    return this.#finished;
  }

  finish(result: GenerationResult = {}): void {
    if (this.#finished) return;
    this.#finished = true;

    this.#span.recordGeneration({
      name:            `${this.#span.name} - Generation`,
      model:           this.#opts.model,
      startTime:       this.#startTime,
      endTime:         new Date(),
      modelParameters: this.#opts.modelParameters,
      input:           this.#opts.input,
      output:          result.output,
      usage:           result.usage,
      metadata:        result.metadata,
    });
    if (result.error !== undefined) this.#span.recordError(result.error);
  }
}

class SpanToolCallTracker implements ToolCallTracker {
  readonly #span: Span;
  readonly #opts: ToolCallSpanOptions;
  readonly #startTime = new Date();

  #finished = false;

  constructor(span: Span, opts: ToolCallSpanOptions) {
    this.#span = span;
    this.#opts = opts;
  }

  get isFinished(): boolean {
    return this.#finished;
  }

  finish(result: ToolCallResult = {}): void {
    if (this.#finished) return;
    this.#finished = true;

    this.#span.recordToolCall({
      name:      `${this.#span.name} - Tool Call`,
      toolName:  this.#opts.toolName,
      startTime: this.#startTime,
      endTime:   new Date(),
      input:     this.#opts.input,
      output:    result.output,
      metadata:  result.metadata,
    });
    if (result.error !== undefined) this.#span.recordError(result.error);
  }
}

/**
 * Runs fn with a generation tracker bound to `span`. A tracker the body
 * left unfinished is finished on exit, with the error when fn threw.
 */
export function runWithGenerationTracker<T>(
  span: Span,
  opts: GenerationSpanOptions,
  fn: (span: Span, tracker: GenerationTracker) => T,
): T {
  const tracker = new SpanGenerationTracker(span, opts);
  try {
    const result = fn(span, tracker);
    tracker.finish();
    return result;
  } catch (err) {
    tracker.finish({ error: err });
    throw err;
  }
}

export function runWithToolCallTracker<T>(
  span: Span,
  opts: ToolCallSpanOptions,
  fn: (span: Span, tracker: ToolCallTracker) => T,
): T {
  const tracker = new SpanToolCallTracker(span, opts);
  try {
    const result = fn(span, tracker);
    tracker.finish();
    return result;
  } catch (err) {
    tracker.finish({ error: err });
    throw err;
  }
}
