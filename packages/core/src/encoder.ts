import { assertNever } from "./events.js";
import type {
  GenerationEvent,
  GenerationUpdateEvent,
  ScoreEvent,
  SpanCreateEvent,
  SpanEventEvent,
  SpanUpdateEvent,
  ToolCallEvent,
  TraceCreateEvent,
  TraceEvent,
  TraceUpdateEvent,
} from "./events.js";
import { isCompletion, isConversation, isMessage, isTokenUsage } from "./model.js";
import type { Completion, Message, TokenUsage, ToolCall } from "./model.js";
import type { Metadata, Status, TraceId } from "./types.js";
import type { EnvelopeType, IngestionEnvelope, JsonObject, JsonValue, WireLevel, WireUsage } from "./wire.js";

export interface EncodeOptions {
  release:     string;
  version:     string;
  environment: string;
}

// ── Ids ───────────────────────────────────────────────────────────────────────

/** Replaces every character outside [A-Za-z0-9] with "_". */
export function slugify(name: string): string {
  return name.replace(/[^a-zA-Z0-9]/g, "_");
}

// Observation body ids are derived from (traceId, name) so that a later
// update event can address the same observation. Two names that slugify
// to the same string ("a.b" and "a-b") collide; there is no hashing.

export function generationBodyId(traceId: TraceId, name: string): string {
  return `${traceId}_gen_${slugify(name)}`;
}

export function toolCallBodyId(traceId: TraceId, toolName: string): string {
  return `${traceId}_tool_${slugify(toolName)}`;
}

export function scoreBodyId(traceId: TraceId, name: string): string {
  return `${traceId}_score_${slugify(name)}`;
}

export function spanEventBodyId(spanId: string, eventName: string): string {
  return `${spanId}_event_${slugify(eventName)}`;
}

// ── Values ────────────────────────────────────────────────────────────────────

/** ISO 8601 with millisecond precision and a "Z" suffix. */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

function optionalTimestamp(date: Date | undefined): string | null {
  return date ? formatTimestamp(date) : null;
}

export function statusToLevel(status: Status): WireLevel {
  switch (status) {
    case "ok":        return "DEFAULT";
    case "error":     return "ERROR";
    case "cancelled": return "WARNING";
  }
}

export function encodeUsage(usage: TokenUsage): WireUsage {
  return {
    input:       usage.promptTokens,
    output:      usage.completionTokens,
    total:       usage.totalTokens,
    unit:        usage.unit ?? "TOKENS",
    input_cost:  usage.inputCost  ?? null,
    output_cost: usage.outputCost ?? null,
    total_cost:  usage.totalCost  ?? null,
  };
}

function encodeToolCallRequest(call: ToolCall): JsonObject {
  return { id: call.id, name: call.name, arguments: toWireValue(call.arguments) };
}

/** Role/content shape expected by the ingestion API. */
export function encodeMessage(message: Message): JsonObject {
  switch (message.role) {
    case "user":
    case "system":
      return { role: message.role, content: message.content };
    case "assistant": {
      const out: JsonObject = { role: "assistant" };
      if (message.content) out["content"] = message.content;
      if (message.toolCalls && message.toolCalls.length > 0) {
        out["tool_calls"] = message.toolCalls.map(encodeToolCallRequest);
      }
      return out;
    }
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
  }
}

function encodeCompletion(completion: Completion): JsonValue {
  return completion.message.content ? completion.message.content : encodeMessage(completion.message);
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Values with no JSON shape of their own: parse the string form if it is
// JSON, otherwise send the string form verbatim.
function fromStringForm(value: unknown): JsonValue {
  const text = String(value);
  try {
    const parsed: unknown = JSON.parse(text);
    return normalize(parsed, new WeakSet());
  } catch {
    return text;
  }
}

function normalize(value: unknown, seen: WeakSet<object>): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value !== "object") return fromStringForm(value);

  if (value instanceof Date) return formatTimestamp(value);
  if (isConversation(value)) return value.messages.map(encodeMessage);
  if (isCompletion(value))   return encodeCompletion(value);
  if (isMessage(value))      return encodeMessage(value);
  if (isTokenUsage(value))   return encodeUsage(value);

  if (seen.has(value)) return "[Circular]";

  if (Array.isArray(value)) {
    seen.add(value);
    const items = value.map((item: unknown) => normalize(item, seen));
    seen.delete(value);
    return items;
  }

  if (isPlainObject(value)) {
    seen.add(value);
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = normalize(item, seen);
    }
    seen.delete(value);
    return out;
  }

  return fromStringForm(value);
}

/**
 * Converts an arbitrary input/output value into JSON for the wire.
 * Conversations, messages, completions and usage records are rewritten
 * into the API's shapes; plain objects and arrays are walked recursively.
 */
export function toWireValue(value: unknown): JsonValue {
  return normalize(value, new WeakSet());
}

/** Metadata values always travel as strings. */
export function stringifyMetadataValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (value instanceof Date) return formatTimestamp(value);
  if (value !== null && typeof value === "object") return JSON.stringify(toWireValue(value));
  return String(value);
}

export function encodeMetadata(metadata: Metadata): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(metadata)) {
    out[key] = stringifyMetadataValue(value);
  }
  return out;
}

function usageFromCompletion(output: unknown): WireUsage | null {
  if (isCompletion(output) && output.usage) return encodeUsage(output.usage);
  return null;
}

function completionMetadata(output: unknown): Metadata {
  if (!isCompletion(output)) return {};
  const meta: Metadata = {
    completion_id: output.id,
    created:       String(output.created),
    model:         output.model,
  };
  if (output.usage) {
    meta["prompt_tokens"]     = String(output.usage.promptTokens);
    meta["completion_tokens"] = String(output.usage.completionTokens);
    meta["total_tokens"]      = String(output.usage.totalTokens);
  }
  return meta;
}

// ── Envelopes ─────────────────────────────────────────────────────────────────

function envelope(id: string, timestamp: Date, type: EnvelopeType, body: JsonObject): IngestionEnvelope {
  return { id, timestamp: formatTimestamp(timestamp), type, body };
}

function encodeTraceCreate(e: TraceCreateEvent, opts: EncodeOptions): IngestionEnvelope {
  return envelope(e.id, e.timestamp, "trace-create", {
    id:          e.traceId,
    timestamp:   formatTimestamp(e.timestamp),
    name:        e.name,
    userId:      e.userId ?? null,
    sessionId:   e.sessionId ?? null,
    metadata:    encodeMetadata(e.metadata),
    tags:        [...e.tags],
    input:       toWireValue(e.input),
    release:     opts.release,
    version:     opts.version,
    environment: opts.environment,
  });
}

function encodeTraceUpdate(e: TraceUpdateEvent): IngestionEnvelope {
  return envelope(e.id, e.timestamp, "trace-update", {
    id:            e.traceId,
    metadata:      encodeMetadata(e.metadata),
    tags:          [...e.tags],
    output:        toWireValue(e.output),
    level:         e.status ? statusToLevel(e.status) : null,
    statusMessage: e.error?.message ?? null,
  });
}

function encodeSpanCreate(e: SpanCreateEvent): IngestionEnvelope {
  return envelope(e.id, e.timestamp, "span-create", {
    id:                  e.spanId,
    traceId:             e.traceId,
    parentObservationId: e.parentSpanId ?? null,
    name:                e.name,
    startTime:           formatTimestamp(e.startTime),
    metadata:            encodeMetadata(e.metadata),
    input:               toWireValue(e.input),
  });
}

function encodeSpanUpdate(e: SpanUpdateEvent): IngestionEnvelope {
  return envelope(e.id, e.timestamp, "span-update", {
    id:            e.spanId,
    endTime:       optionalTimestamp(e.endTime),
    metadata:      encodeMetadata({ ...e.metadata, ...completionMetadata(e.output) }),
    input:         toWireValue(e.input),
    output:        toWireValue(e.output),
    usage:         usageFromCompletion(e.output),
    level:         e.status ? statusToLevel(e.status) : null,
    statusMessage: e.error?.message ?? null,
  });
}

function encodeSpanEvent(e: SpanEventEvent): IngestionEnvelope {
  return envelope(e.id, e.timestamp, "event-create", {
    id:                  spanEventBodyId(e.spanId, e.eventName),
    traceId:             e.traceId,
    parentObservationId: e.spanId,
    name:                e.eventName,
    startTime:           formatTimestamp(e.eventTime),
    metadata:            encodeMetadata(e.attributes),
  });
}

function encodeGeneration(e: GenerationEvent): IngestionEnvelope {
  return envelope(e.id, e.timestamp, "generation-create", {
    id:                  generationBodyId(e.traceId, e.name),
    traceId:             e.traceId,
    parentObservationId: e.spanId ?? null,
    name:                e.name,
    startTime:           formatTimestamp(e.startTime),
    endTime:             optionalTimestamp(e.endTime),
    model:               e.model,
    modelParameters:     encodeMetadata(e.modelParameters),
    input:               toWireValue(e.input),
    output:              toWireValue(e.output),
    usage:               e.usage ? encodeUsage(e.usage) : null,
    metadata:            encodeMetadata(e.metadata),
    promptName:          e.promptName ?? null,
    level:               e.level ?? "DEFAULT",
    statusMessage:       e.statusMessage ?? null,
  });
}

function encodeGenerationUpdate(e: GenerationUpdateEvent): IngestionEnvelope {
  return envelope(e.id, e.timestamp, "generation-update", {
    id:       e.generationId,
    endTime:  optionalTimestamp(e.endTime),
    output:   toWireValue(e.output),
    usage:    e.usage ? encodeUsage(e.usage) : null,
    metadata: encodeMetadata(e.metadata),
  });
}

// A tool call is an observation of span type: a span-create carrying the
// call, then a span-update closing it when an end time or output is known.
function encodeToolCall(e: ToolCallEvent): IngestionEnvelope[] {
  const bodyId = toolCallBodyId(e.traceId, e.toolName);

  const create = envelope(e.id, e.timestamp, "span-create", {
    id:                  bodyId,
    traceId:             e.traceId,
    parentObservationId: e.spanId ?? null,
    name:                `Tool: ${e.toolName}`,
    startTime:           formatTimestamp(e.startTime),
    metadata:            encodeMetadata({ ...e.metadata, toolName: e.toolName }),
    input:               toWireValue(e.input),
  });

  if (e.endTime === undefined && e.output === undefined) return [create];

  const update = envelope(`${e.id}_update`, e.timestamp, "span-update", {
    id:      bodyId,
    traceId: e.traceId,
    endTime: optionalTimestamp(e.endTime),
    output:  toWireValue(e.output),
  });

  return [create, update];
}

function encodeScore(e: ScoreEvent): IngestionEnvelope {
  return envelope(e.id, e.timestamp, "score-create", {
    id:            scoreBodyId(e.traceId, e.name),
    traceId:       e.traceId,
    observationId: e.observationId ?? null,
    name:          e.name,
    value:         e.value,
    source:        e.source,
    comment:       e.comment ?? null,
    metadata:      encodeMetadata(e.metadata),
  });
}

/**
 * Maps one internal event to the envelopes sent for it. Every event yields
 * exactly one envelope except a completed tool call, which yields two.
 */
export function encodeEvent(event: TraceEvent, opts: EncodeOptions): IngestionEnvelope[] {
  switch (event.type) {
    case "trace-create":      return [encodeTraceCreate(event, opts)];
    case "trace-update":      return [encodeTraceUpdate(event)];
    case "span-create":       return [encodeSpanCreate(event)];
    case "span-update":       return [encodeSpanUpdate(event)];
    case "span-event":        return [encodeSpanEvent(event)];
    case "generation":        return [encodeGeneration(event)];
    case "generation-update": return [encodeGenerationUpdate(event)];
    case "tool-call":         return encodeToolCall(event);
    case "score":             return [encodeScore(event)];
    default:                  return assertNever(event);
  }
}
