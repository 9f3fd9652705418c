import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AgentSummary, ChatResult, ConversationSnapshot, ConversationTurn } from "@handoff-relay/protocol";
import type { RelayError } from "../swarm/errors.js";

/** A readable summary block followed by the same data as JSON. */
export function toolResult(summary: string, details: unknown): CallToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(details, null, 2) }
    ]
  };
}

export function toolErrorResult(toolName: string, error: RelayError): CallToolResult {
  const hint = error.retryable ? " Retry after a short delay." : "";
  return {
    content: [{ type: "text", text: `${toolName} failed (${error.kind}): ${error.message}${hint}` }],
    isError: true
  };
}

export function formatChatResult(result: ChatResult): string {
  const lines = [`**${result.respondingAgent}**:`, "", result.response || "(no text)"];

  if (result.handoffs.length > 0) {
    lines.push("");
    for (const handoff of result.handoffs) {
      lines.push(`Transfer: ${handoff.from} -> ${handoff.to}`);
    }
  }

  if (result.truncated) {
    lines.push("");
    lines.push(
      `Stopped after ${result.hops} model calls; ${result.activeAgent} is now active and will answer the next message.`
    );
  }

  return lines.join("\n");
}

export function formatAgentList(agents: Array<AgentSummary & { handoffTargets: number }>): string {
  if (agents.length === 0) {
    return "No agents. Create one with create_agent or create_finance_team.";
  }

  const lines = [`${agents.length} agent${agents.length === 1 ? "" : "s"}:`];
  for (const agent of agents) {
    lines.push(
      `- ${agent.name} (${agent.model.provider}/${agent.model.modelId}), can transfer to ${agent.handoffTargets}`
    );
  }
  return lines.join("\n");
}

export function formatConversation(snapshot: ConversationSnapshot): string {
  if (snapshot.turns.length === 0) {
    return `Conversation ${snapshot.conversationId} has no turns (active agent: ${snapshot.activeAgent})`;
  }

  const lines = [
    `Conversation ${snapshot.conversationId} (active agent: ${snapshot.activeAgent}, ${snapshot.turns.length} turns)`
  ];
  snapshot.turns.forEach((turn, index) => {
    lines.push(`${index + 1}. ${formatTurn(turn)}`);
  });
  return lines.join("\n");
}

function formatTurn(turn: ConversationTurn): string {
  if (turn.role === "user") {
    return `User -> ${turn.agent}: ${turn.text}`;
  }

  const suffix = turn.handoffTo ? ` [transferred to ${turn.handoffTo}]` : "";
  return `${turn.agent}: ${turn.text || "(no text)"}${suffix}`;
}
