import { normalizeAgentId } from "../utils/normalize.js";
import type { AgentRecord, HandoffTool } from "./types.js";

export const HANDOFF_TOOL_PREFIX = "transfer_to_";

/**
 * Transfer tool name for every agent in the store, keyed by agent id. Names come from the
 * normalized agent name (`Risk Analyst` -> `transfer_to_risk_analyst`); when that slug is empty
 * or shared by several agents, the digest-bearing agent id is used instead.
 */
export function handoffToolNames(agents: AgentRecord[]): Map<string, string> {
  const slugs = new Map<string, string>();
  const counts = new Map<string, number>();

  for (const agent of agents) {
    const slug = normalizeAgentId(agent.name).replace(/-/g, "_");
    slugs.set(agent.agentId, slug);
    counts.set(slug, (counts.get(slug) ?? 0) + 1);
  }

  const names = new Map<string, string>();
  for (const agent of agents) {
    const slug = slugs.get(agent.agentId) ?? "";
    const stem = slug && counts.get(slug) === 1 ? slug : agent.agentId.replace(/-/g, "_");
    names.set(agent.agentId, `${HANDOFF_TOOL_PREFIX}${stem}`);
  }
  return names;
}

/**
 * Transfer tools offered to `agent`: one per other agent in the store. When the agent
 * declares a `tools` list, only the transfer tools named there are offered.
 */
export function buildHandoffTools(agent: AgentRecord, agents: AgentRecord[]): HandoffTool[] {
  const allowed = agent.tools ? new Set(agent.tools) : undefined;
  const toolNames = handoffToolNames(agents);
  const tools: HandoffTool[] = [];

  for (const target of agents) {
    if (target.agentId === agent.agentId) {
      continue;
    }

    const name = toolNames.get(target.agentId);
    if (!name || (allowed && !allowed.has(name))) {
      continue;
    }

    tools.push({
      name,
      targetAgent: target.name,
      description: `Transfer the conversation to ${target.name} for their specialized expertise.`
    });
  }

  return tools;
}

/**
 * Maps a tool call name back to the agent it hands off to. Undeclared transfer tools resolve
 * to the raw suffix so the router can record them as rejected; other tool names are not
 * handoffs.
 */
export function resolveHandoffTarget(toolName: string, declared: HandoffTool[]): string | undefined {
  const match = declared.find((tool) => tool.name === toolName);
  if (match) {
    return match.targetAgent;
  }

  if (!toolName.startsWith(HANDOFF_TOOL_PREFIX)) {
    return undefined;
  }

  const suffix = toolName.slice(HANDOFF_TOOL_PREFIX.length).trim();
  return suffix.length > 0 ? suffix : undefined;
}
