import { Type, type Static, type TObject, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { ToolName } from "@handoff-relay/protocol";
import { ValidationError } from "../swarm/errors.js";
import { AgentModelSchema } from "../swarm/record-schemas.js";

// `pattern: "\\S"` rejects blank strings, not just empty ones.
const requiredText = (description: string) => Type.String({ minLength: 1, pattern: "\\S", description });

const agentDefinitionSchema = Type.Object({
  name: requiredText("Unique agent name."),
  instructions: requiredText(
    "Persona / system instructions. Describe when the agent should transfer to other agents."
  ),
  tools: Type.Optional(
    Type.Array(Type.String(), {
      description:
        "Transfer tools this agent may call, e.g. transfer_to_risk_analyst. Omit to allow transfers to every other agent."
    })
  ),
  model: Type.Optional(AgentModelSchema),
  tags: Type.Optional(Type.Array(Type.String()))
});

export const toolArgumentSchemas = {
  create_agent: agentDefinitionSchema,
  update_agent: agentDefinitionSchema,
  list_agents: Type.Object({}),
  delete_agent: Type.Object({
    name: requiredText("Name of the agent to delete.")
  }),
  chat_with_agent: Type.Object({
    message: requiredText("Message for the agent."),
    agentName: Type.Optional(
      Type.String({
        description: "Agent to address. Required for a new conversation; defaults to the conversation's active agent."
      })
    ),
    conversationId: Type.Optional(
      Type.String({ description: "Conversation to continue or start. Defaults to the shared default conversation." })
    )
  }),
  get_conversation_history: Type.Object({
    conversationId: requiredText("Conversation id.")
  }),
  reset_conversation: Type.Object({
    conversationId: requiredText("Conversation id.")
  }),
  create_finance_team: Type.Object({
    companyName: Type.Optional(Type.String({ description: "Company the team works for.", default: "Investment Firm" }))
  })
} satisfies Record<ToolName, TObject>;

const toolDescriptions: Record<ToolName, string> = {
  create_agent: "Create a new agent persona. Agents can hand the conversation to each other with transfer tools.",
  update_agent: "Replace an existing agent's definition. Every field is replaced; omitted optional fields are cleared.",
  list_agents: "List all agents with their instructions and the number of agents each can transfer to.",
  delete_agent: "Delete an agent. Conversation history that mentions it is kept as is.",
  chat_with_agent:
    "Send a message to an agent. Handoffs between agents are followed automatically up to the configured hop limit.",
  get_conversation_history: "Show the turns of a conversation, oldest first, and its active agent.",
  reset_conversation: "Clear a conversation's turns. The conversation keeps its id and active agent.",
  create_finance_team:
    "Create a coordinated finance team of four agents (risk, portfolio, data, research) that hand off to each other."
};

export const TOOL_NAMES: readonly ToolName[] = [
  "create_agent",
  "update_agent",
  "list_agents",
  "delete_agent",
  "chat_with_agent",
  "get_conversation_history",
  "reset_conversation",
  "create_finance_team"
];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

export function listRelayTools(): Tool[] {
  return TOOL_NAMES.map((name) => ({
    name,
    description: toolDescriptions[name],
    inputSchema: toInputSchema(toolArgumentSchemas[name])
  }));
}

/** Validates raw tool arguments and returns them typed by the schema. */
export function parseToolArguments<T extends TSchema>(toolName: string, schema: T, raw: unknown): Static<T> {
  const value: unknown = raw ?? {};
  if (Value.Check(schema, value)) {
    return value;
  }

  const first = Value.Errors(schema, value).First();
  if (!first) {
    throw new ValidationError(`Invalid arguments for ${toolName}`);
  }

  const field = first.path.replace(/^\//, "").replace(/\//g, ".");
  if (!field) {
    throw new ValidationError(`Invalid arguments for ${toolName}: ${first.message}`);
  }
  if (first.value === undefined) {
    throw new ValidationError(`${toolName}.${field} is required`);
  }
  if (typeof first.value === "string" && first.value.trim().length === 0) {
    throw new ValidationError(`${toolName}.${field} must be a non-empty string`);
  }
  throw new ValidationError(`${toolName}.${field}: ${first.message}`);
}

function toInputSchema(schema: TObject): Tool["inputSchema"] {
  const inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: { ...schema.properties }
  };
  if (schema.required && schema.required.length > 0) {
    inputSchema.required = [...schema.required];
  }
  return inputSchema;
}
