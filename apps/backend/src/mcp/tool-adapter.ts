import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AgentSummary, ToolArgumentsByName } from "@handoff-relay/protocol";
import type { AgentStore } from "../swarm/agent-store.js";
import { DuplicateNameError, errorMessage, isRelayError, RelayError, ValidationError } from "../swarm/errors.js";
import { buildHandoffTools } from "../swarm/handoff-tools.js";
import { logError } from "../swarm/logger.js";
import type { SwarmRouter } from "../swarm/swarm-router.js";
import { loadTeamTemplate, type BuiltInTeamId, type TeamMemberTemplate } from "../swarm/teams/team-template-registry.js";
import type { AgentRecord, DebugLogger } from "../swarm/types.js";
import { formatAgentList, formatChatResult, formatConversation, toolErrorResult, toolResult } from "./format.js";
import { isToolName, parseToolArguments, toolArgumentSchemas } from "./tool-definitions.js";

export const DEFAULT_COMPANY_NAME = "Investment Firm";

export type TeamTemplateLoader = (
  teamId: BuiltInTeamId,
  values: Record<string, string>
) => Promise<TeamMemberTemplate[]>;

interface ToolCallAdapterDependencies {
  agents: AgentStore;
  router: SwarmRouter;
  logDebug: DebugLogger;
  loadTeam?: TeamTemplateLoader;
}

export interface ToolCallOptions {
  signal?: AbortSignal;
}

/**
 * Maps MCP tool calls onto the agent store and swarm router. Never throws: every failure
 * comes back as an `isError` result naming the error kind.
 */
export class ToolCallAdapter {
  private readonly loadTeam: TeamTemplateLoader;

  constructor(private readonly deps: ToolCallAdapterDependencies) {
    this.loadTeam = deps.loadTeam ?? loadTeamTemplate;
  }

  async call(toolName: string, rawArguments: unknown, options: ToolCallOptions = {}): Promise<CallToolResult> {
    this.deps.logDebug("tool:call", { tool: toolName });

    try {
      return await this.dispatch(toolName, rawArguments, options);
    } catch (error) {
      if (isRelayError(error)) {
        this.deps.logDebug("tool:error", { tool: toolName, kind: error.kind, message: error.message });
        return toolErrorResult(toolName, error);
      }

      logError(`Unexpected failure in ${toolName}`, error);
      return toolErrorResult(
        toolName,
        new RelayError("UpstreamError", `Unexpected error: ${errorMessage(error)}`, { cause: error })
      );
    }
  }

  private async dispatch(toolName: string, rawArguments: unknown, options: ToolCallOptions): Promise<CallToolResult> {
    if (!isToolName(toolName)) {
      throw new ValidationError(`Unknown tool: ${toolName}`);
    }

    const { agents, router } = this.deps;

    switch (toolName) {
      case "create_agent": {
        const args: ToolArgumentsByName["create_agent"] = parseToolArguments(
          toolName,
          toolArgumentSchemas.create_agent,
          rawArguments
        );
        const agent = await agents.create(args);
        return toolResult(`Created agent ${agent.name}`, toAgentSummary(agent));
      }

      case "update_agent": {
        const args: ToolArgumentsByName["update_agent"] = parseToolArguments(
          toolName,
          toolArgumentSchemas.update_agent,
          rawArguments
        );
        const agent = await agents.replace(args.name, args);
        return toolResult(`Updated agent ${agent.name}`, toAgentSummary(agent));
      }

      case "list_agents": {
        parseToolArguments(toolName, toolArgumentSchemas.list_agents, rawArguments);
        const records = await agents.list();
        const summaries = records.map((agent) => ({
          ...toAgentSummary(agent),
          handoffTargets: buildHandoffTools(agent, records).length
        }));
        return toolResult(formatAgentList(summaries), { agents: summaries });
      }

      case "delete_agent": {
        const args: ToolArgumentsByName["delete_agent"] = parseToolArguments(
          toolName,
          toolArgumentSchemas.delete_agent,
          rawArguments
        );
        const agent = await agents.get(args.name);
        await agents.delete(args.name);
        return toolResult(`Deleted agent ${agent.name}`, { name: agent.name, deleted: true });
      }

      case "chat_with_agent": {
        const args: ToolArgumentsByName["chat_with_agent"] = parseToolArguments(
          toolName,
          toolArgumentSchemas.chat_with_agent,
          rawArguments
        );
        const result = await router.chat({
          message: args.message,
          agentName: args.agentName,
          conversationId: args.conversationId,
          signal: options.signal
        });
        return toolResult(formatChatResult(result), result);
      }

      case "get_conversation_history": {
        const args: ToolArgumentsByName["get_conversation_history"] = parseToolArguments(
          toolName,
          toolArgumentSchemas.get_conversation_history,
          rawArguments
        );
        const snapshot = await router.history(args.conversationId);
        return toolResult(formatConversation(snapshot), snapshot);
      }

      case "reset_conversation": {
        const args: ToolArgumentsByName["reset_conversation"] = parseToolArguments(
          toolName,
          toolArgumentSchemas.reset_conversation,
          rawArguments
        );
        const snapshot = await router.reset(args.conversationId);
        return toolResult(
          `Conversation ${snapshot.conversationId} reset (active agent: ${snapshot.activeAgent})`,
          snapshot
        );
      }

      case "create_finance_team": {
        const args: ToolArgumentsByName["create_finance_team"] = parseToolArguments(
          toolName,
          toolArgumentSchemas.create_finance_team,
          rawArguments
        );
        return this.createFinanceTeam(args.companyName?.trim() || DEFAULT_COMPANY_NAME);
      }
    }
  }

  // Members are created in order; the first duplicate stops the run and earlier members stay.
  private async createFinanceTeam(companyName: string): Promise<CallToolResult> {
    const members = await this.loadTeam("finance", { companyName });
    const created: AgentRecord[] = [];

    for (const member of members) {
      try {
        created.push(await this.deps.agents.create(member));
      } catch (error) {
        if (error instanceof DuplicateNameError && created.length > 0) {
          throw new RelayError(
            "DuplicateName",
            `${error.message}. Created before the conflict: ${created.map((agent) => agent.name).join(", ")}`,
            { cause: error }
          );
        }
        throw error;
      }
    }

    const names = created.map((agent) => agent.name);
    return toolResult(`Created finance team for ${companyName}: ${names.join(", ")}`, {
      companyName,
      agents: created.map(toAgentSummary)
    });
  }
}

export function toAgentSummary(agent: AgentRecord): AgentSummary {
  const summary: AgentSummary = {
    name: agent.name,
    agentId: agent.agentId,
    instructions: agent.instructions,
    model: agent.model,
    createdAt: agent.metadata.createdAt,
    updatedAt: agent.metadata.updatedAt
  };
  if (agent.tools) {
    summary.tools = agent.tools;
  }
  if (agent.metadata.tags) {
    summary.tags = agent.metadata.tags;
  }
  return summary;
}
