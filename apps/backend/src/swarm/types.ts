import type {
  AgentModelDescriptor,
  ChatResult,
  ConversationTurn,
  HandoffRecord,
  TurnRole
} from "@handoff-relay/protocol";

export type { AgentModelDescriptor, ChatResult, ConversationTurn, HandoffRecord, TurnRole };

export interface AgentMetadata {
  createdAt: string;
  updatedAt: string;
  tags?: string[];
}

export interface AgentRecord {
  agentId: string;
  name: string;
  instructions: string;
  tools?: string[];
  model: AgentModelDescriptor;
  metadata: AgentMetadata;
}

export interface AgentDefinitionInput {
  name: string;
  instructions: string;
  tools?: string[];
  model?: AgentModelDescriptor;
  tags?: string[];
}

export interface ConversationRecord {
  conversationId: string;
  activeAgent: string;
  turns: ConversationTurn[];
  createdAt: string;
  updatedAt: string;
}

export interface HandoffTool {
  /** Tool name advertised to the model, e.g. `transfer_to_risk_analyst`. */
  name: string;
  targetAgent: string;
  description: string;
}

/** Parsed once at the inference edge; `handoff` names the requested target agent. */
export interface ModelResponse {
  content: string;
  handoff?: string;
}

export interface CompletionRequest {
  agent: AgentRecord;
  history: ConversationTurn[];
  handoffTools: HandoffTool[];
  signal?: AbortSignal;
}

export interface InferenceClient {
  complete(request: CompletionRequest): Promise<ModelResponse>;
}

export interface ChatRequest {
  message: string;
  agentName?: string;
  conversationId?: string;
  signal?: AbortSignal;
}

export interface RelayPaths {
  dataDir: string;
  agentsDir: string;
  conversationsDir: string;
}

export interface RelayConfig {
  debug: boolean;
  apiKey?: string;
  defaultModel: AgentModelDescriptor;
  maxTokens: number;
  maxHops: number;
  maxTurns?: number;
  defaultConversationId: string;
  paths: RelayPaths;
}

export type DebugLogger = (message: string, details?: unknown) => void;
