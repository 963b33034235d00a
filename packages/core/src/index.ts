export type {
  TraceId,
  SpanId,
  EventId,
  Status,
  Metadata,
} from "./types.js";

export type {
  TraceEvent,
  TraceEventType,
  TraceCreateEvent,
  TraceUpdateEvent,
  SpanCreateEvent,
  SpanUpdateEvent,
  SpanEventEvent,
  GenerationEvent,
  GenerationUpdateEvent,
  ToolCallEvent,
  ScoreEvent,
} from "./events.js";
export { assertNever } from "./events.js";

export type {
  TokenUsage,
  ToolCall,
  Message,
  UserMessage,
  SystemMessage,
  AssistantMessage,
  ToolMessage,
  Conversation,
  Completion,
} from "./model.js";
export {
  TokenUsageSchema,
  MessageSchema,
  ConversationSchema,
  CompletionSchema,
  isTokenUsage,
  isMessage,
  isConversation,
  isCompletion,
} from "./model.js";

export { generateTraceId, generateSpanId, generateEventId } from "./ids.js";

export { TracekitError, ConfigurationError, DeliveryError, toError } from "./errors.js";

export type { Logger, LogLevel, ConsoleLoggerOptions } from "./logger.js";
export { createConsoleLogger, silentLogger } from "./logger.js";

export type { TracingMode, TraceManagerConfig, RemoteConfig, ResolvedConfig } from "./config.js";
export {
  TRACING_MODES,
  DEFAULT_TRACE_MANAGER_CONFIG,
  resolveConfig,
  loadConfig,
  isRemoteConfigValid,
} from "./config.js";

export type {
  JsonValue,
  JsonObject,
  EnvelopeType,
  WireLevel,
  IngestionEnvelope,
  IngestionBatch,
  WireUsage,
} from "./wire.js";

export type { EncodeOptions } from "./encoder.js";
export {
  encodeEvent,
  encodeUsage,
  encodeMessage,
  encodeMetadata,
  toWireValue,
  stringifyMetadataValue,
  statusToLevel,
  formatTimestamp,
  slugify,
  generationBodyId,
  toolCallBodyId,
  scoreBodyId,
  spanEventBodyId,
} from "./encoder.js";

export type { CircuitState, CircuitBreakerOptions } from "./circuit-breaker.js";
export { CircuitBreaker } from "./circuit-breaker.js";

export { IngestClient, isRetryable } from "./client.js";
export type { IngestClientOptions } from "./client.js";
