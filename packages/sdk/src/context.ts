import { AsyncLocalStorage } from "node:async_hooks";
import type { SpanHandle } from "./span.js";
import type { TraceHandle } from "./trace.js";

export interface ActiveScope {
  readonly trace: TraceHandle;
  readonly span: SpanHandle | undefined;
}

/**
 * The active trace and span of the current logical flow.
 *
 * Backed by AsyncLocalStorage, so the scope follows awaits, timers and
 * promise callbacks started inside run() and never leaks into flows that
 * were started outside it. Each manager owns one scope.
 */
export class ContextScope {
  readonly #storage = new AsyncLocalStorage<ActiveScope>();

  get active(): ActiveScope | undefined {
    return this.#storage.getStore();
  }

  run<T>(scope: ActiveScope, fn: () => T): T {
    return this.#storage.run(scope, fn);
  }
}
