import { describe, it, expect } from "vitest";
import { generateTraceId, generateSpanId, generateEventId } from "../ids.js";

describe("generateTraceId", () => {
  it("returns trace_ followed by 32-char lowercase hex", () => {
    expect(generateTraceId()).toMatch(/^trace_[0-9a-f]{32}$/);
  });

  it("generates unique IDs", () => {
    const ids = new Set(Array.from({ length: 200 }, generateTraceId));
    expect(ids.size).toBe(200);
  });
});

describe("generateSpanId", () => {
  it("returns span_ followed by 32-char lowercase hex", () => {
    expect(generateSpanId()).toMatch(/^span_[0-9a-f]{32}$/);
  });

  it("generates unique IDs", () => {
    const ids = new Set(Array.from({ length: 200 }, generateSpanId));
    expect(ids.size).toBe(200);
  });
});

describe("generateEventId", () => {
  it("returns evt_ followed by 32-char lowercase hex", () => {
    expect(generateEventId()).toMatch(/^evt_[0-9a-f]{32}$/);
  });

  it("never collides with trace or span ids", () => {
    const id = generateEventId();
    expect(id.startsWith("trace_")).toBe(false);
    expect(id.startsWith("span_")).toBe(false);
  });
});
