import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const AgentModelSchema = Type.Object({
  provider: Type.String({ minLength: 1 }),
  modelId: Type.String({ minLength: 1 })
});

export const AgentRecordSchema = Type.Object({
  agentId: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  instructions: Type.String({ minLength: 1 }),
  tools: Type.Optional(Type.Array(Type.String())),
  model: AgentModelSchema,
  metadata: Type.Object({
    createdAt: Type.String(),
    updatedAt: Type.String(),
    tags: Type.Optional(Type.Array(Type.String()))
  })
});

export const ConversationTurnSchema = Type.Object({
  role: Type.Union([Type.Literal("user"), Type.Literal("agent")]),
  agent: Type.String(),
  text: Type.String(),
  handoffTo: Type.Optional(Type.String()),
  rejectedHandoff: Type.Optional(Type.String()),
  timestamp: Type.String()
});

export const ConversationRecordSchema = Type.Object({
  conversationId: Type.String({ minLength: 1 }),
  activeAgent: Type.String({ minLength: 1 }),
  turns: Type.Array(ConversationTurnSchema),
  createdAt: Type.String(),
  updatedAt: Type.String()
});

export type StoredAgentRecord = Static<typeof AgentRecordSchema>;
export type StoredConversationRecord = Static<typeof ConversationRecordSchema>;

/** Returns the value typed by the schema, or a description of the first violation. */
export function validateRecord<T extends TSchema>(schema: T, value: unknown): Static<T> | string {
  if (Value.Check(schema, value)) {
    return value;
  }

  const first = Value.Errors(schema, value).First();
  if (!first) {
    return "record does not match schema";
  }

  const path = first.path.length > 0 ? first.path : "/";
  return `${path}: ${first.message}`;
}
