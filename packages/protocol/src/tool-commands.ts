import type { AgentModelDescriptor } from './shared-types.js'

export type ToolName =
  | 'create_agent'
  | 'update_agent'
  | 'list_agents'
  | 'delete_agent'
  | 'chat_with_agent'
  | 'get_conversation_history'
  | 'reset_conversation'
  | 'create_finance_team'

export interface AgentDefinitionArgs {
  name: string
  instructions: string
  tools?: string[]
  model?: AgentModelDescriptor
  tags?: string[]
}

export interface ToolArgumentsByName {
  create_agent: AgentDefinitionArgs
  update_agent: AgentDefinitionArgs
  list_agents: Record<string, never>
  delete_agent: { name: string }
  chat_with_agent: { message: string; agentName?: string; conversationId?: string }
  get_conversation_history: { conversationId: string }
  reset_conversation: { conversationId: string }
  create_finance_team: { companyName?: string }
}

export type ToolErrorKind =
  | 'NotFound'
  | 'DuplicateName'
  | 'AuthError'
  | 'RateLimitError'
  | 'UpstreamError'
  | 'StorageError'
  | 'ValidationError'
