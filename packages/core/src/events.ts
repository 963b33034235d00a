import type { TokenUsage } from "./model.js";
import type { EventId, Metadata, SpanId, Status, TraceId } from "./types.js";

/**
 * Fields shared by every event.
 *
 * `timestamp` is the emission time. It is independent of any domain time
 * carried in the body (a span's `startTime`, a generation's `endTime`).
 */
interface EventEnvelope {
  id:        EventId;
  timestamp: Date;
  traceId:   TraceId;
}

export interface TraceCreateEvent extends EventEnvelope {
  type:       "trace-create";
  name:       string;
  userId?:    string;
  sessionId?: string;
  metadata:   Metadata;
  tags:       string[];
  input?:     unknown;
}

export interface TraceUpdateEvent extends EventEnvelope {
  type:     "trace-update";
  metadata: Metadata;
  tags:     string[];
  output?:  unknown;
  status?:  Status;
  error?:   Error;
}

export interface SpanCreateEvent extends EventEnvelope {
  type:          "span-create";
  spanId:        SpanId;
  parentSpanId?: SpanId;
  name:          string;
  startTime:     Date;
  metadata:      Metadata;
  tags:          string[];
  input?:        unknown;
}

export interface SpanUpdateEvent extends EventEnvelope {
  type:     "span-update";
  spanId:   SpanId;
  endTime?: Date;
  metadata: Metadata;
  tags:     string[];
  input?:   unknown;
  output?:  unknown;
  status?:  Status;
  error?:   Error;
}

/** A discrete point-in-time event recorded on a span. */
export interface SpanEventEvent extends EventEnvelope {
  type:       "span-event";
  spanId:     SpanId;
  eventName:  string;
  eventTime:  Date;
  attributes: Metadata;
}

/** One model invocation, emitted fully formed in a single event. */
export interface GenerationEvent extends EventEnvelope {
  type:            "generation";
  spanId?:         SpanId;
  name:            string;
  startTime:       Date;
  endTime?:        Date;
  model:           string;
  modelParameters: Metadata;
  input?:          unknown;
  output?:         unknown;
  usage?:          TokenUsage;
  metadata:        Metadata;
  promptName?:     string;
  /** "DEBUG" | "DEFAULT" | "WARNING" | "ERROR" */
  level?:          string;
  statusMessage?:  string;
}

export interface GenerationUpdateEvent extends EventEnvelope {
  type:         "generation-update";
  /** Wire body id of the generation being updated. */
  generationId: string;
  endTime?:     Date;
  output?:      unknown;
  usage?:       TokenUsage;
  metadata:     Metadata;
}

export interface ToolCallEvent extends EventEnvelope {
  type:      "tool-call";
  spanId?:   SpanId;
  name:      string;
  startTime: Date;
  endTime?:  Date;
  toolName:  string;
  input?:    unknown;
  output?:   unknown;
  metadata:  Metadata;
}

/**
 * An evaluation attached to a trace, or to one of its observations when
 * `observationId` is set.
 */
export interface ScoreEvent extends EventEnvelope {
  type:           "score";
  observationId?: string;
  name:           string;
  value:          number;
  /** e.g. "annotation", "api", "eval" */
  source:         string;
  comment?:       string;
  metadata:       Metadata;
}

export type TraceEvent =
  | TraceCreateEvent
  | TraceUpdateEvent
  | SpanCreateEvent
  | SpanUpdateEvent
  | SpanEventEvent
  | GenerationEvent
  | GenerationUpdateEvent
  | ToolCallEvent
  | ScoreEvent;

export type TraceEventType = TraceEvent["type"];

export function assertNever(value: never): never {
  throw new Error(`[tracekit] unhandled event: ${JSON.stringify(value)}`);
}
