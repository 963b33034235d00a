import {
  assertNever,
  formatTimestamp,
  stringifyMetadataValue,
  toWireValue,
} from "@tracekit/core";
import type { Metadata, SpanId, TokenUsage, TraceEvent } from "@tracekit/core";
import { BaseTraceManager } from "./manager.js";
import type { BaseTraceManagerOptions } from "./manager.js";

export interface PrintTraceManagerOptions extends BaseTraceManagerOptions {
  /** Receives each rendered line. Default: console.log */
  write?: (line: string) => void;
}

const INDENT = "  ";

/**
 * Development backend: renders every event as indented, human-readable
 * lines. Spans are indented by nesting depth; generations, tool calls and
 * span events one level deeper than the span they belong to.
 */
export class PrintTraceManager extends BaseTraceManager {
  readonly #write: (line: string) => void;
  readonly #depths = new Map<SpanId, number>();
  readonly #startTimes = new Map<SpanId, Date>();

  constructor(opts: PrintTraceManagerOptions = {}) {
    super(opts);
    this.#write = opts.write ?? ((line) => console.log(line));
  }

  protected emitEventImpl(event: TraceEvent): void {
    for (const line of this.render(event)) this.#write(line);
  }

  /** Renders one event, updating the span depth bookkeeping. */
  render(event: TraceEvent): string[] {
    const ts = formatTimestamp(event.timestamp);
    const lines: string[] = [];
    const head   = (indent: string, text: string) => lines.push(`[TRACE] [${ts}] ${indent}${text}`);
    const detail = (indent: string, label: string, value: string) =>
      lines.push(`[TRACE]   ${indent}${label}: ${value}`);

    switch (event.type) {
      case "trace-create": {
        head("", `TRACE START: ${event.name} (ID: ${event.traceId})`);
        if (event.userId !== undefined)    detail("", "User", event.userId);
        if (event.sessionId !== undefined) detail("", "Session", event.sessionId);
        this.#common(detail, "", event.metadata, event.tags);
        if (event.input !== undefined)     detail("", "Input", formatValue(event.input));
        break;
      }

      case "trace-update": {
        head("", `TRACE END: ${event.traceId}`);
        this.#common(detail, "", event.metadata, event.tags);
        if (event.output !== undefined) detail("", "Output", formatValue(event.output));
        if (event.status !== undefined) detail("", "Status", event.status);
        if (event.error !== undefined)  detail("", "Error", event.error.message);
        break;
      }

      case "span-create": {
        const parentDepth = event.parentSpanId !== undefined ? this.#depths.get(event.parentSpanId) ?? 0 : 0;
        const depth = parentDepth + 1;
        this.#depths.set(event.spanId, depth);
        this.#startTimes.set(event.spanId, event.startTime);

        const indent = INDENT.repeat(depth);
        head(indent, `SPAN START: ${event.name} (ID: ${event.spanId})`);
        this.#common(detail, indent, event.metadata, event.tags);
        if (event.input !== undefined) detail(indent, "Input", formatValue(event.input));
        break;
      }

      case "span-update": {
        const indent = INDENT.repeat(this.#depths.get(event.spanId) ?? 0);
        const startTime = this.#startTimes.get(event.spanId);
        head(indent, `SPAN END: ${event.spanId}`);
        if (event.endTime !== undefined && startTime !== undefined) {
          detail(indent, "Duration", `${event.endTime.getTime() - startTime.getTime()}ms`);
        }
        this.#common(detail, indent, event.metadata, event.tags);
        if (event.input !== undefined)  detail(indent, "Input", formatValue(event.input));
        if (event.output !== undefined) detail(indent, "Output", formatValue(event.output));
        if (event.status !== undefined) detail(indent, "Status", event.status);
        if (event.error !== undefined)  detail(indent, "Error", event.error.message);

        this.#depths.delete(event.spanId);
        this.#startTimes.delete(event.spanId);
        break;
      }

      case "span-event": {
        const indent = INDENT.repeat(this.#childDepth(event.spanId));
        head(indent, `EVENT: ${event.eventName}`);
        if (Object.keys(event.attributes).length > 0) {
          detail(indent, "Attributes", formatMetadata(event.attributes));
        }
        break;
      }

      case "generation": {
        const indent = INDENT.repeat(this.#childDepth(event.spanId));
        head(indent, `GENERATION: ${event.name}`);
        detail(indent, "Model", event.model);
        if (Object.keys(event.modelParameters).length > 0) {
          detail(indent, "Parameters", formatMetadata(event.modelParameters));
        }
        if (event.promptName !== undefined)    detail(indent, "Prompt", event.promptName);
        if (event.level !== undefined)         detail(indent, "Level", event.level);
        if (event.statusMessage !== undefined) detail(indent, "Status", event.statusMessage);
        if (event.input !== undefined)         detail(indent, "Input", formatValue(event.input));
        if (event.output !== undefined)        detail(indent, "Output", formatValue(event.output));
        if (event.usage !== undefined)         detail(indent, "Usage", formatUsage(event.usage));
        this.#common(detail, indent, event.metadata, []);
        break;
      }

      case "generation-update": {
        head(INDENT, `GENERATION UPDATE: ${event.generationId}`);
        if (event.endTime !== undefined) detail(INDENT, "End Time", formatTimestamp(event.endTime));
        if (event.output !== undefined)  detail(INDENT, "Output", formatValue(event.output));
        if (event.usage !== undefined)   detail(INDENT, "Usage", formatUsage(event.usage));
        this.#common(detail, INDENT, event.metadata, []);
        break;
      }

      case "tool-call": {
        const indent = INDENT.repeat(this.#childDepth(event.spanId));
        head(indent, `TOOL: ${event.toolName}`);
        if (event.input !== undefined)  detail(indent, "Input", formatValue(event.input));
        if (event.output !== undefined) detail(indent, "Output", formatValue(event.output));
        this.#common(detail, indent, event.metadata, []);
        break;
      }

      case "score": {
        head(INDENT, `SCORE: ${event.name} = ${event.value}`);
        detail(INDENT, "Source", event.source);
        if (event.observationId !== undefined) detail(INDENT, "Observation", event.observationId);
        if (event.comment !== undefined)       detail(INDENT, "Comment", event.comment);
        this.#common(detail, INDENT, event.metadata, []);
        break;
      }

      default:
        assertNever(event);
    }

    return lines;
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  /** Depth for records attached to a span, or to the trace itself. */
  #childDepth(spanId: SpanId | undefined): number {
    if (spanId === undefined) return 1;
    return (this.#depths.get(spanId) ?? 0) + 1;
  }

  #common(
    detail: (indent: string, label: string, value: string) => void,
    indent: string,
    metadata: Metadata,
    tags: readonly string[],
  ): void {
    if (Object.keys(metadata).length > 0) detail(indent, "Metadata", formatMetadata(metadata));
    if (tags.length > 0) detail(indent, "Tags", tags.join(", "));
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(toWireValue(value));
}

function formatMetadata(metadata: Metadata): string {
  return Object.entries(metadata)
    .map(([key, value]) => `${key}=${stringifyMetadataValue(value)}`)
    .join(", ");
}

function formatUsage(usage: TokenUsage): string {
  return `${usage.totalTokens} tokens (${usage.promptTokens} prompt, ${usage.completionTokens} completion)`;
}
