import { silentLogger } from "@tracekit/core";
import type { TraceEvent, TraceManagerConfig } from "@tracekit/core";
import { BaseTraceManager } from "../manager.js";

export type EventOfType<K extends TraceEvent["type"]> = Extract<TraceEvent, { type: K }>;

/** Keeps every emitted event in memory. */
export class RecordingTraceManager extends BaseTraceManager {
  readonly events: TraceEvent[] = [];

  constructor(config: Partial<TraceManagerConfig> = {}) {
    super({ config, logger: silentLogger });
  }

  protected emitEventImpl(event: TraceEvent): void {
    this.events.push(event);
  }

  get types(): TraceEvent["type"][] {
    return this.events.map((e) => e.type);
  }

  ofType<K extends TraceEvent["type"]>(type: K): EventOfType<K>[] {
    return this.events.filter((e): e is EventOfType<K> => e.type === type);
  }

  /** The single event of `type`; fails the test when there is not exactly one. */
  one<K extends TraceEvent["type"]>(type: K): EventOfType<K> {
    const found = this.ofType(type);
    if (found.length !== 1) throw new Error(`expected one ${type} event, got ${found.length}`);
    const [event] = found;
    if (!event) throw new Error(`expected one ${type} event`);
    return event;
  }
}
