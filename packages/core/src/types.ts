/** Trace id, e.g. "trace_3f1c…" (prefix + 32-char lowercase hex). */
export type TraceId = string;

/** Span id, e.g. "span_9a0b…". */
export type SpanId = string;

/** Event id, unique per emitted event. The remote backend dedups on it. */
export type EventId = string;

export type Status = "ok" | "error" | "cancelled";

/**
 * Free-form key/value pairs attached to traces, spans and observations.
 * Values keep their type in memory; the wire encoder stringifies them.
 */
export type Metadata = Record<string, unknown>;
