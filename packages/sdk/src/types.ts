import type {
  EventId,
  Metadata,
  SpanId,
  Status,
  TokenUsage,
  TraceId,
} from "@tracekit/core";

export interface TraceOptions {
  userId?: string;
  sessionId?: string;
  metadata?: Metadata;
  tags?: string[];
  input?: unknown;
}

/** A fully formed model invocation. */
export interface GenerationOptions {
  name: string;
  model: string;
  startTime: Date;
  endTime?: Date;
  modelParameters?: Metadata;
  input?: unknown;
  output?: unknown;
  usage?: TokenUsage;
  metadata?: Metadata;
  promptName?: string;
  /** "DEBUG" | "DEFAULT" | "WARNING" | "ERROR". Default: "DEFAULT" */
  level?: string;
  statusMessage?: string;
  /** Enclosing span. Recording through a span sets it to that span. */
  spanId?: SpanId;
}

export interface GenerationUpdateOptions {
  endTime?: Date;
  output?: unknown;
  usage?: TokenUsage;
  metadata?: Metadata;
}

export interface ToolCallOptions {
  name: string;
  toolName: string;
  startTime: Date;
  endTime?: Date;
  input?: unknown;
  output?: unknown;
  metadata?: Metadata;
  /** Enclosing span. Recording through a span sets it to that span. */
  spanId?: SpanId;
}

export interface ScoreOptions {
  name: string;
  value: number;
  /** Default: "annotation" */
  source?: string;
  comment?: string;
  /** Scoring through a span sets it to that span. */
  observationId?: string;
  metadata?: Metadata;
}

export interface GenerationSpanOptions {
  model: string;
  modelParameters?: Metadata;
  input?: unknown;
}

export interface ToolCallSpanOptions {
  toolName: string;
  input?: unknown;
}

export interface GenerationResult {
  output?: unknown;
  usage?: TokenUsage;
  metadata?: Metadata;
  /** Marks the enclosing span as failed. */
  error?: unknown;
}

export interface ToolCallResult {
  output?: unknown;
  metadata?: Metadata;
  /** Marks the enclosing span as failed. */
  error?: unknown;
}

/**
 * Records one generation when finished. finish() is idempotent; the first
 * call wins.
 */
export interface GenerationTracker {
  readonly isFinished: boolean;
  finish(result?: GenerationResult): void;
}

/** Records one tool call when finished. finish() is idempotent. */
export interface ToolCallTracker {
  readonly isFinished: boolean;
  finish(result?: ToolCallResult): void;
}

export interface RecordedSpanEvent {
  readonly id: EventId;
  readonly name: string;
  readonly timestamp: Date;
  readonly attributes: Metadata;
}

/**
 * A value capturing the active trace and span, handed across a boundary
 * the runtime does not follow (a job queue, a callback registry) and
 * reinstated there with TraceManager.withContext().
 */
export interface Context {
  readonly traceId: TraceId;
  readonly spanId: SpanId | undefined;
  readonly trace: Trace;
  readonly span: Span | undefined;
}

/** Operations shared by traces and spans. */
export interface Observation {
  readonly traceId: TraceId;
  readonly name: string;
  readonly status: Status;
  readonly isFinished: boolean;
  readonly context: Context;

  addMetadata(key: string, value: unknown): void;
  addMetadata(metadata: Metadata): void;
  addTag(tag: string): void;
  addTags(...tags: string[]): void;
  setInput(input: unknown): void;
  setOutput(output: unknown): void;
  setStatus(status: Status): void;
  /** Marks the observation as failed. The last recorded error wins. */
  recordError(error: unknown): void;

  recordGeneration(opts: GenerationOptions): void;
  recordToolCall(opts: ToolCallOptions): void;
  score(opts: ScoreOptions): void;

  /**
   * Runs fn inside a new child span that is active for its duration,
   * then finishes the span. A thrown error is recorded and rethrown.
   */
  span<T>(name: string, fn: (span: Span) => T): T;
  /** Like span(), finishing the child when the returned promise settles. */
  spanAsync<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T>;
  /** A child span named `name` that records one "<name> - Generation" on exit. */
  generationSpan<T>(
    name: string,
    opts: GenerationSpanOptions,
    fn: (span: Span, tracker: GenerationTracker) => T,
  ): T;
  /** A child span named `name` that records one "<name> - Tool Call" on exit. */
  toolCallSpan<T>(
    name: string,
    opts: ToolCallSpanOptions,
    fn: (span: Span, tracker: ToolCallTracker) => T,
  ): T;

  /** Idempotent. Finishes every still-open child first. */
  finish(): void;
}

export interface Trace extends Observation {
  readonly userId: string | undefined;
  readonly sessionId: string | undefined;
  /** The innermost active span of this trace, if any. */
  readonly currentSpan: Span | undefined;

  /** Amends a generation previously recorded on this trace under `name`. */
  updateGeneration(name: string, opts: GenerationUpdateOptions): void;
}

export interface Span extends Observation {
  readonly spanId: SpanId;
  readonly parentSpanId: SpanId | undefined;
  readonly startTime: Date;
  readonly endTime: Date | undefined;
  readonly events: readonly RecordedSpanEvent[];

  recordEvent(name: string, attributes?: Metadata): void;
}
