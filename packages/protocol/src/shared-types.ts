export interface AgentModelDescriptor {
  provider: string
  modelId: string
}

export interface AgentSummary {
  name: string
  agentId: string
  instructions: string
  tools?: string[]
  model: AgentModelDescriptor
  tags?: string[]
  createdAt: string
  updatedAt: string
}

export type TurnRole = 'user' | 'agent'

export interface ConversationTurn {
  role: TurnRole
  /** Addressed agent for user turns, speaking agent for agent turns. */
  agent: string
  text: string
  handoffTo?: string
  rejectedHandoff?: string
  timestamp: string
}

export interface HandoffRecord {
  from: string
  to: string
}

export interface ChatResult {
  conversationId: string
  response: string
  startingAgent: string
  respondingAgent: string
  activeAgent: string
  hops: number
  handoffs: HandoffRecord[]
  truncated: boolean
}

export interface ConversationSnapshot {
  conversationId: string
  activeAgent: string
  turns: ConversationTurn[]
}
