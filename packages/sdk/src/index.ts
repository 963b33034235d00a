export { Tracekit } from "./tracekit.js";
export { TraceHandle } from "./trace.js";
export { SpanHandle } from "./span.js";
export { BaseTraceManager } from "./manager.js";
export type { TraceManager, BaseTraceManagerOptions } from "./manager.js";
export { PrintTraceManager } from "./print.js";
export type { PrintTraceManagerOptions } from "./print.js";
export { RemoteTraceManager } from "./remote.js";
export type { RemoteTraceManagerOptions } from "./remote.js";
export {
  NoOpTraceManager,
  NoOpTrace,
  NoOpSpan,
  NOOP_TRACE,
  NOOP_SPAN,
  NOOP_TRACE_MANAGER,
} from "./noop.js";
export { createTraceManager, createTraceManagerFromEnv } from "./factory.js";
export type { CreateTraceManagerOptions, TraceManagerFromEnvOptions } from "./factory.js";
export type {
  Trace,
  Span,
  Observation,
  Context,
  TraceOptions,
  GenerationOptions,
  GenerationUpdateOptions,
  ToolCallOptions,
  ScoreOptions,
  GenerationSpanOptions,
  ToolCallSpanOptions,
  GenerationResult,
  ToolCallResult,
  GenerationTracker,
  ToolCallTracker,
  RecordedSpanEvent,
} from "./types.js";

// Re-export core primitives so users only need one import
export type {
  TraceId,
  SpanId,
  EventId,
  Status,
  Metadata,
  TraceEvent,
  TokenUsage,
  Message,
  Conversation,
  Completion,
  Logger,
  TraceManagerConfig,
  RemoteConfig,
} from "@tracekit/core";
export {
  ConfigurationError,
  createConsoleLogger,
  silentLogger,
  DEFAULT_TRACE_MANAGER_CONFIG,
} from "@tracekit/core";
