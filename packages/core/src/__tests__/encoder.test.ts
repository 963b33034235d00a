import { describe, it, expect } from "vitest";
import {
  encodeEvent,
  encodeMessage,
  encodeUsage,
  generationBodyId,
  slugify,
  statusToLevel,
  stringifyMetadataValue,
  toWireValue,
} from "../encoder.js";
import type { EncodeOptions } from "../encoder.js";
import type { TraceEvent } from "../events.js";
import type { Completion } from "../model.js";

const OPTS: EncodeOptions = { release: "2.0.0", version: "2.0.1", environment: "staging" };

const T0 = new Date("2024-05-01T12:00:00.000Z");
const T1 = new Date("2024-05-01T12:00:01.500Z");

function encodeOne(event: TraceEvent) {
  const [envelope, ...rest] = encodeEvent(event, OPTS);
  expect(rest).toHaveLength(0);
  if (!envelope) throw new Error("no envelope");
  return envelope;
}

describe("encodeEvent — traces", () => {
  it("encodes trace-create with release, version and environment", () => {
    const envelope = encodeOne({
      type:      "trace-create",
      id:        "evt_1",
      timestamp: T0,
      traceId:   "trace_1",
      name:      "checkout",
      userId:    "user-42",
      metadata:  { cart_items: 3 },
      tags:      ["prod"],
      input:     { sku: "A1" },
    });

    expect(envelope).toEqual({
      id:        "evt_1",
      timestamp: "2024-05-01T12:00:00.000Z",
      type:      "trace-create",
      body: {
        id:          "trace_1",
        timestamp:   "2024-05-01T12:00:00.000Z",
        name:        "checkout",
        userId:      "user-42",
        sessionId:   null,
        metadata:    { cart_items: "3" },
        tags:        ["prod"],
        input:       { sku: "A1" },
        release:     "2.0.0",
        version:     "2.0.1",
        environment: "staging",
      },
    });
  });

  it("encodes a failed trace-update with level and status message", () => {
    const envelope = encodeOne({
      type:      "trace-update",
      id:        "evt_2",
      timestamp: T1,
      traceId:   "trace_1",
      metadata:  {},
      tags:      [],
      status:    "error",
      error:     new Error("payment declined"),
    });

    expect(envelope.type).toBe("trace-update");
    expect(envelope.body).toEqual({
      id:            "trace_1",
      metadata:      {},
      tags:          [],
      output:        null,
      level:         "ERROR",
      statusMessage: "payment declined",
    });
  });
});

describe("encodeEvent — spans", () => {
  it("encodes span-create with its parent", () => {
    const envelope = encodeOne({
      type:         "span-create",
      id:           "evt_3",
      timestamp:    T0,
      traceId:      "trace_1",
      spanId:       "span_child",
      parentSpanId: "span_root",
      name:         "charge-card",
      startTime:    T0,
      metadata:     {},
      tags:         [],
    });

    expect(envelope.body).toEqual({
      id:                  "span_child",
      traceId:             "trace_1",
      parentObservationId: "span_root",
      name:                "charge-card",
      startTime:           "2024-05-01T12:00:00.000Z",
      metadata:            {},
      input:               null,
    });
  });

  it("sends an explicit null parent for a root span", () => {
    const envelope = encodeOne({
      type:      "span-create",
      id:        "evt_3",
      timestamp: T0,
      traceId:   "trace_1",
      spanId:    "span_root",
      name:      "root",
      startTime: T0,
      metadata:  {},
      tags:      [],
    });
    expect(envelope.body["parentObservationId"]).toBeNull();
  });

  it("lifts usage and completion details out of a completion output", () => {
    const completion: Completion = {
      id:      "cmpl-1",
      created: 1714564800,
      message: { role: "assistant", content: "Order placed" },
      model:   "test-model",
      usage:   { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    };

    const envelope = encodeOne({
      type:      "span-update",
      id:        "evt_4",
      timestamp: T1,
      traceId:   "trace_1",
      spanId:    "span_root",
      endTime:   T1,
      metadata:  { step: "pay" },
      tags:      [],
      output:    completion,
      status:    "ok",
    });

    expect(envelope.type).toBe("span-update");
    expect(envelope.body).toEqual({
      id:       "span_root",
      endTime:  "2024-05-01T12:00:01.500Z",
      metadata: {
        step:              "pay",
        completion_id:     "cmpl-1",
        created:           "1714564800",
        model:             "test-model",
        prompt_tokens:     "10",
        completion_tokens: "5",
        total_tokens:      "15",
      },
      input:  null,
      output: "Order placed",
      usage: {
        input:       10,
        output:      5,
        total:       15,
        unit:        "TOKENS",
        input_cost:  null,
        output_cost: null,
        total_cost:  null,
      },
      level:         "DEFAULT",
      statusMessage: null,
    });
  });

  it("encodes a span event under its span", () => {
    const envelope = encodeOne({
      type:       "span-event",
      id:         "evt_5",
      timestamp:  T0,
      traceId:    "trace_1",
      spanId:     "span_root",
      eventName:  "cache hit",
      eventTime:  T0,
      attributes: { key: "cart:1" },
    });

    expect(envelope.type).toBe("event-create");
    expect(envelope.body).toEqual({
      id:                  "span_root_event_cache_hit",
      traceId:             "trace_1",
      parentObservationId: "span_root",
      name:                "cache hit",
      startTime:           "2024-05-01T12:00:00.000Z",
      metadata:            { key: "cart:1" },
    });
  });
});

describe("encodeEvent — generations", () => {
  const generation = (name: string): TraceEvent => ({
    type:            "generation",
    id:              "evt_6",
    timestamp:       T1,
    traceId:         "trace_1",
    spanId:          "span_root",
    name,
    startTime:       T0,
    endTime:         T1,
    model:           "test-model",
    modelParameters: { temperature: 0.2 },
    input:           { messages: [{ role: "user", content: "Hi" }] },
    output:          "Hello",
    usage:           { promptTokens: 3, completionTokens: 1, totalTokens: 4, inputCost: 0.3, outputCost: 0.1, totalCost: 0.4 },
    metadata:        {},
  });

  it("encodes a full generation-create body", () => {
    const envelope = encodeOne(generation("plan"));

    expect(envelope.type).toBe("generation-create");
    expect(envelope.body).toEqual({
      id:                  "trace_1_gen_plan",
      traceId:             "trace_1",
      parentObservationId: "span_root",
      name:                "plan",
      startTime:           "2024-05-01T12:00:00.000Z",
      endTime:             "2024-05-01T12:00:01.500Z",
      model:               "test-model",
      modelParameters:     { temperature: "0.2" },
      input:               [{ role: "user", content: "Hi" }],
      output:              "Hello",
      usage: {
        input:       3,
        output:      1,
        total:       4,
        unit:        "TOKENS",
        input_cost:  0.3,
        output_cost: 0.1,
        total_cost:  0.4,
      },
      metadata:      {},
      promptName:    null,
      level:         "DEFAULT",
      statusMessage: null,
    });
  });

  it("derives the same body id for the same trace and name", () => {
    const a = encodeOne(generation("plan step"));
    const b = encodeOne(generation("plan step"));
    expect(a.body["id"]).toBe(b.body["id"]);
    expect(a.body["id"]).toBe(generationBodyId("trace_1", "plan step"));
  });

  it("derives different body ids for different names", () => {
    expect(encodeOne(generation("plan")).body["id"]).not.toBe(encodeOne(generation("answer")).body["id"]);
  });

  it("addresses the generation it updates", () => {
    const envelope = encodeOne({
      type:         "generation-update",
      id:           "evt_7",
      timestamp:    T1,
      traceId:      "trace_1",
      generationId: generationBodyId("trace_1", "plan"),
      output:       "Done",
      metadata:     {},
    });

    expect(envelope.body).toEqual({
      id:       "trace_1_gen_plan",
      endTime:  null,
      output:   "Done",
      usage:    null,
      metadata: {},
    });
  });
});

describe("encodeEvent — tool calls", () => {
  it("emits a span-create and a closing span-update for a finished call", () => {
    const envelopes = encodeEvent(
      {
        type:      "tool-call",
        id:        "evt_8",
        timestamp: T1,
        traceId:   "trace_1",
        spanId:    "span_root",
        name:      "lookup",
        startTime: T0,
        endTime:   T1,
        toolName:  "inventory.lookup",
        input:     { sku: "A1" },
        output:    { inStock: true },
        metadata:  {},
      },
      OPTS,
    );

    expect(envelopes).toEqual([
      {
        id:        "evt_8",
        timestamp: "2024-05-01T12:00:01.500Z",
        type:      "span-create",
        body: {
          id:                  "trace_1_tool_inventory_lookup",
          traceId:             "trace_1",
          parentObservationId: "span_root",
          name:                "Tool: inventory.lookup",
          startTime:           "2024-05-01T12:00:00.000Z",
          metadata:            { toolName: "inventory.lookup" },
          input:               { sku: "A1" },
        },
      },
      {
        id:        "evt_8_update",
        timestamp: "2024-05-01T12:00:01.500Z",
        type:      "span-update",
        body: {
          id:      "trace_1_tool_inventory_lookup",
          traceId: "trace_1",
          endTime: "2024-05-01T12:00:01.500Z",
          output:  { inStock: true },
        },
      },
    ]);
  });

  it("emits only the span-create while the call is open", () => {
    const envelopes = encodeEvent(
      {
        type:      "tool-call",
        id:        "evt_9",
        timestamp: T0,
        traceId:   "trace_1",
        name:      "lookup",
        startTime: T0,
        toolName:  "search",
        metadata:  {},
      },
      OPTS,
    );
    expect(envelopes.map((e) => e.type)).toEqual(["span-create"]);
  });
});

describe("encodeEvent — scores", () => {
  it("encodes score-create with a derived id", () => {
    const envelope = encodeOne({
      type:          "score",
      id:            "evt_10",
      timestamp:     T1,
      traceId:       "trace_1",
      observationId: "span_root",
      name:          "helpfulness",
      value:         0.9,
      source:        "eval",
      metadata:      {},
    });

    expect(envelope.body).toEqual({
      id:            "trace_1_score_helpfulness",
      traceId:       "trace_1",
      observationId: "span_root",
      name:          "helpfulness",
      value:         0.9,
      source:        "eval",
      comment:       null,
      metadata:      {},
    });
  });
});

describe("value helpers", () => {
  it("maps status to level", () => {
    expect(statusToLevel("ok")).toBe("DEFAULT");
    expect(statusToLevel("error")).toBe("ERROR");
    expect(statusToLevel("cancelled")).toBe("WARNING");
  });

  it("slugifies every non-alphanumeric character", () => {
    expect(slugify("a.b-c d/é")).toBe("a_b_c_d__");
  });

  it("defaults the usage unit and nulls missing costs", () => {
    expect(encodeUsage({ promptTokens: 1, completionTokens: 2, totalTokens: 3, unit: "CHARACTERS" })).toEqual({
      input:       1,
      output:      2,
      total:       3,
      unit:        "CHARACTERS",
      input_cost:  null,
      output_cost: null,
      total_cost:  null,
    });
  });

  it("omits empty assistant content and tool calls", () => {
    expect(encodeMessage({ role: "assistant", content: "" })).toEqual({ role: "assistant" });
  });

  it("encodes assistant tool calls and tool results", () => {
    expect(
      encodeMessage({
        role:      "assistant",
        toolCalls: [{ id: "call_1", name: "search", arguments: { q: "shoes" } }],
      }),
    ).toEqual({
      role:       "assistant",
      tool_calls: [{ id: "call_1", name: "search", arguments: { q: "shoes" } }],
    });
    expect(encodeMessage({ role: "tool", toolCallId: "call_1", content: "3 results" })).toEqual({
      role:         "tool",
      tool_call_id: "call_1",
      content:      "3 results",
    });
  });

  it("normalizes values with no JSON shape", () => {
    expect(toWireValue(undefined)).toBeNull();
    expect(toWireValue(Number.NaN)).toBeNull();
    expect(toWireValue(10n)).toBe("10");
    expect(toWireValue(T0)).toBe("2024-05-01T12:00:00.000Z");
    expect(toWireValue(new Map())).toBe("[object Map]");
  });

  it("parses the string form of values that render as JSON", () => {
    class Point {
      toString() {
        return '{"x":1,"y":2}';
      }
    }
    expect(toWireValue(new Point())).toEqual({ x: 1, y: 2 });
  });

  it("marks circular references", () => {
    const node: Record<string, unknown> = { name: "a" };
    node["self"] = node;
    expect(toWireValue(node)).toEqual({ name: "a", self: "[Circular]" });
  });

  it("rewrites exact model shapes", () => {
    expect(toWireValue({ messages: [{ role: "user", content: "hi" }] })).toEqual([{ role: "user", content: "hi" }]);
    expect(toWireValue({ promptTokens: 1, completionTokens: 2, totalTokens: 3 })).toEqual({
      input:       1,
      output:      2,
      total:       3,
      unit:        "TOKENS",
      input_cost:  null,
      output_cost: null,
      total_cost:  null,
    });
  });

  it("keeps every field of application data that only resembles a model shape", () => {
    expect(toWireValue({ role: "user", content: "hi", locale: "de" })).toEqual({
      role:    "user",
      content: "hi",
      locale:  "de",
    });
    expect(toWireValue({ messages: [], cursor: "abc" })).toEqual({ messages: [], cursor: "abc" });
    expect(toWireValue({ promptTokens: 1, completionTokens: 2, totalTokens: 3, region: "eu" })).toEqual({
      promptTokens:     1,
      completionTokens: 2,
      totalTokens:      3,
      region:           "eu",
    });
  });

  it("walks a completion with extra fields as a plain object", () => {
    const output = {
      id:        "cmpl-1",
      created:   1714564800,
      message:   { role: "assistant", content: "ok" },
      model:     "test-model",
      latencyMs: 120,
    };
    expect(toWireValue(output)).toEqual(output);
  });

  it("stringifies metadata values", () => {
    expect(stringifyMetadataValue("plain")).toBe("plain");
    expect(stringifyMetadataValue(42)).toBe("42");
    expect(stringifyMetadataValue(true)).toBe("true");
    expect(stringifyMetadataValue(null)).toBe("null");
    expect(stringifyMetadataValue(new Error("boom"))).toBe("boom");
    expect(stringifyMetadataValue({ a: [1, 2] })).toBe('{"a":[1,2]}');
  });
});
