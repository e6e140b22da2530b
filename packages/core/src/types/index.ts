/**
 * @llm-relay/core - Type definitions using TypeBox schemas
 * Chat messages, per-call parameters and failure classes shared by every provider.
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

export const MessageRoleSchema = Type.Union([
  Type.Literal('system'),
  Type.Literal('user'),
  Type.Literal('assistant'),
]);
export type MessageRole = Static<typeof MessageRoleSchema>;

export const ChatMessageSchema = Type.Object({
  role: MessageRoleSchema,
  content: Type.String(),
});
export type ChatMessage = Static<typeof ChatMessageSchema>;

/** A conversation is forwarded verbatim, so it only has to be non-empty. */
export const ConversationSchema = Type.Array(ChatMessageSchema, { minItems: 1 });
export type Conversation = Static<typeof ConversationSchema>;

// ---------------------------------------------------------------------------
// Call parameters
// ---------------------------------------------------------------------------

export const CallParametersSchema = Type.Object({
  /** Overrides the model of every provider. */
  model: Type.Optional(Type.String({ minLength: 1 })),
  /** Per-provider model override, keyed by provider id. Wins over `model`. */
  models: Type.Optional(Type.Record(Type.String(), Type.String({ minLength: 1 }))),
  maxTokens: Type.Optional(Type.Integer({ minimum: 1 })),
  temperature: Type.Optional(Type.Number({ minimum: 0, maximum: 2 })),
  /** Provider-specific options passed through to the vendor request. */
  extra: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  /** Per-attempt deadline in ms. 0 disables it. */
  timeoutMs: Type.Optional(Type.Integer({ minimum: 0 })),
});

/**
 * Options accepted by a single dispatch. `signal` is not part of the schema
 * since it never comes from serialized input.
 */
export type CallParameters = Static<typeof CallParametersSchema> & {
  signal?: AbortSignal;
};

// ---------------------------------------------------------------------------
// Failure classes
// ---------------------------------------------------------------------------

export const FailureClassSchema = Type.Union([
  Type.Literal('unavailable'),
  Type.Literal('rate_limited'),
  Type.Literal('empty'),
  Type.Literal('other'),
]);
export type FailureClass = Static<typeof FailureClassSchema>;
