import { z } from "zod";

// Shapes produced by LLM clients and agent loops. They are recognised by
// the wire encoder, which rewrites them into role/content messages and
// usage objects. Schemas are strict: an object with any other key is
// application data and passes through untouched.

export const TokenUsageSchema = z.object({
  promptTokens:     z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative(),
  totalTokens:      z.number().int().nonnegative(),
  /** Defaults to "TOKENS" on the wire. */
  unit:             z.string().optional(),
  /** Float USD */
  inputCost:        z.number().optional(),
  outputCost:       z.number().optional(),
  totalCost:        z.number().optional(),
}).strict();

export const ToolCallSchema = z.object({
  id:        z.string(),
  name:      z.string(),
  arguments: z.unknown(),
}).strict();

export const UserMessageSchema = z.object({
  role:    z.literal("user"),
  content: z.string(),
}).strict();

export const SystemMessageSchema = z.object({
  role:    z.literal("system"),
  content: z.string(),
}).strict();

export const AssistantMessageSchema = z.object({
  role:      z.literal("assistant"),
  content:   z.string().optional(),
  toolCalls: z.array(ToolCallSchema).optional(),
}).strict();

export const ToolMessageSchema = z.object({
  role:       z.literal("tool"),
  toolCallId: z.string(),
  content:    z.string(),
}).strict();

export const MessageSchema = z.discriminatedUnion("role", [
  UserMessageSchema,
  SystemMessageSchema,
  AssistantMessageSchema,
  ToolMessageSchema,
]);

export const ConversationSchema = z.object({
  messages: z.array(MessageSchema),
}).strict();

export const CompletionSchema = z.object({
  id:      z.string(),
  /** Unix seconds, as reported by the provider. */
  created: z.number(),
  message: AssistantMessageSchema,
  model:   z.string(),
  usage:   TokenUsageSchema.optional(),
}).strict();

export type TokenUsage       = z.infer<typeof TokenUsageSchema>;
export type ToolCall         = z.infer<typeof ToolCallSchema>;
export type UserMessage      = z.infer<typeof UserMessageSchema>;
export type SystemMessage    = z.infer<typeof SystemMessageSchema>;
export type AssistantMessage = z.infer<typeof AssistantMessageSchema>;
export type ToolMessage      = z.infer<typeof ToolMessageSchema>;
export type Message          = z.infer<typeof MessageSchema>;
export type Conversation     = z.infer<typeof ConversationSchema>;
export type Completion       = z.infer<typeof CompletionSchema>;

export function isTokenUsage(value: unknown): value is TokenUsage {
  return TokenUsageSchema.safeParse(value).success;
}

export function isMessage(value: unknown): value is Message {
  return MessageSchema.safeParse(value).success;
}

export function isConversation(value: unknown): value is Conversation {
  return ConversationSchema.safeParse(value).success;
}

export function isCompletion(value: unknown): value is Completion {
  return CompletionSchema.safeParse(value).success;
}
