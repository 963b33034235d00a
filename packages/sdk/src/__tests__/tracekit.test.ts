import { describe, it, expect } from "vitest";
import { silentLogger } from "@tracekit/core";
import { NOOP_SPAN } from "../noop.js";
import { PrintTraceManager } from "../print.js";
import { Tracekit } from "../tracekit.js";
import { RecordingTraceManager } from "./helpers.js";

describe("Tracekit", () => {
  it("runs spans outside any trace against the no-op span", () => {
    const manager = new RecordingTraceManager();
    const tk = new Tracekit(manager);

    expect(tk.span("orphan", (span) => span)).toBe(NOOP_SPAN);
    expect(manager.events).toEqual([]);
  });

  it("nests spans under whatever is active", async () => {
    const manager = new RecordingTraceManager();
    const tk = new Tracekit(manager);

    await tk.withTraceAsync("answer", async () => {
      await tk.spanAsync("retrieve", async () => {
        tk.span("rank", () => undefined);
      });
      tk.span("generate", () => undefined);
    });

    const [retrieve, rank, generate] = manager.ofType("span-create");
    expect(retrieve?.parentSpanId).toBeUndefined();
    expect(rank?.parentSpanId).toBe(retrieve?.spanId);
    expect(generate?.parentSpanId).toBeUndefined();
    expect(manager.ofType("trace-update")).toHaveLength(1);
  });

  it("exposes the active trace and span", () => {
    const tk = new Tracekit(new RecordingTraceManager());
    tk.withTrace("job", (trace) => {
      expect(tk.currentTrace()).toBe(trace);
      tk.span("step", (span) => {
        expect(tk.currentSpan()).toBe(span);
        expect(tk.captureContext()?.spanId).toBe(span.spanId);
      });
    });
  });

  it("builds a manager by mode", () => {
    const tk = Tracekit.create("print", { logger: silentLogger, write: () => {} });
    expect(tk.manager).toBeInstanceOf(PrintTraceManager);
  });

  it("finishes open traces on shutdown", async () => {
    const manager = new RecordingTraceManager();
    const tk = new Tracekit(manager);
    tk.trace("open");
    await tk.shutdown();
    expect(manager.types).toEqual(["trace-create", "trace-update"]);
  });
});
