import { randomUUID } from "node:crypto";
import type { EventId, SpanId, TraceId } from "./types.js";

function hex32(): string {
  return randomUUID().replace(/-/g, "");
}

/** "trace_" followed by 32 lowercase hex characters (a v4 UUID without dashes). */
export function generateTraceId(): TraceId {
  return `trace_${hex32()}`;
}

/** "span_" followed by 32 lowercase hex characters. */
export function generateSpanId(): SpanId {
  return `span_${hex32()}`;
}

/** "evt_" followed by 32 lowercase hex characters. */
export function generateEventId(): EventId {
  return `evt_${hex32()}`;
}
