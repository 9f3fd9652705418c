import type { ConversationSnapshot } from "@handoff-relay/protocol";
import { previewForLog } from "../utils/normalize.js";
import type { AgentStore } from "./agent-store.js";
import type { ConversationLog } from "./conversation-log.js";
import { UpstreamError, ValidationError } from "./errors.js";
import { buildHandoffTools } from "./handoff-tools.js";
import { KeyedLock } from "./keyed-lock.js";
import type {
  AgentRecord,
  ChatRequest,
  ChatResult,
  ConversationRecord,
  ConversationTurn,
  DebugLogger,
  HandoffRecord,
  HandoffTool,
  InferenceClient,
  RelayConfig
} from "./types.js";

interface SwarmRouterDependencies {
  config: Pick<RelayConfig, "maxHops" | "defaultConversationId">;
  agents: AgentStore;
  conversations: ConversationLog;
  inference: InferenceClient;
  logDebug: DebugLogger;
  now?: () => string;
}

/**
 * Runs chat requests against the active agent and follows handoffs.
 *
 * Each model call is one hop. Every hop's turn is appended to the conversation log before the
 * next hop starts, so an interrupted chain leaves a consistent partial history. Requests for
 * the same conversation are serialized; different conversations proceed independently.
 */
export class SwarmRouter {
  private readonly lock = new KeyedLock();
  private readonly now: () => string;

  constructor(private readonly deps: SwarmRouterDependencies) {
    this.now = deps.now ?? (() => new Date().toISOString());
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    const message = request.message.trim();
    if (!message) {
      throw new ValidationError("message must be a non-empty string");
    }

    const conversationId = this.resolveConversationId(request.conversationId);
    return this.lock.run(conversationId, () => this.runChat(conversationId, message, request));
  }

  async history(conversationId: string): Promise<ConversationSnapshot> {
    const id = this.resolveConversationId(conversationId);
    return this.lock.run(id, async () => toSnapshot(await this.deps.conversations.require(id)));
  }

  async reset(conversationId: string): Promise<ConversationSnapshot> {
    const id = this.resolveConversationId(conversationId);
    return this.lock.run(id, async () => toSnapshot(await this.deps.conversations.reset(id)));
  }

  private async runChat(conversationId: string, message: string, request: ChatRequest): Promise<ChatResult> {
    const { agents, conversations, inference } = this.deps;
    const existing = await conversations.get(conversationId);
    const requestedAgent = request.agentName?.trim();

    let startingName: string;
    if (requestedAgent) {
      startingName = requestedAgent;
    } else if (existing) {
      startingName = existing.activeAgent;
    } else {
      throw new ValidationError("agentName is required to start a new conversation");
    }

    let current = await agents.get(startingName);
    const startingAgent = current.name;
    await conversations.ensure(conversationId, current.name);
    await conversations.setActiveAgent(conversationId, current.name);

    let record = await conversations.append(conversationId, {
      role: "user",
      agent: current.name,
      text: message,
      timestamp: this.now()
    });

    const maxHops = Math.max(1, this.deps.config.maxHops);
    const handoffs: HandoffRecord[] = [];
    let hops = 0;

    for (;;) {
      if (request.signal?.aborted) {
        throw new UpstreamError(`Request cancelled after ${hops} model calls`);
      }

      const handoffTools = buildHandoffTools(current, await agents.list());
      const response = await inference.complete({
        agent: current,
        history: record.turns,
        handoffTools,
        signal: request.signal
      });
      hops += 1;

      const target = response.handoff
        ? await this.resolveHandoffTarget(current, response.handoff, handoffTools)
        : undefined;
      const turn: ConversationTurn = {
        role: "agent",
        agent: current.name,
        text: response.content,
        timestamp: this.now()
      };
      if (target) {
        turn.handoffTo = target.name;
      } else if (response.handoff) {
        turn.rejectedHandoff = response.handoff;
      }
      record = await conversations.append(conversationId, turn);

      this.deps.logDebug("router:hop", {
        conversationId,
        hop: hops,
        agent: current.name,
        handoff: turn.handoffTo,
        rejectedHandoff: turn.rejectedHandoff,
        preview: previewForLog(response.content)
      });

      if (!target) {
        return {
          conversationId,
          response: response.content,
          startingAgent,
          respondingAgent: current.name,
          activeAgent: current.name,
          hops,
          handoffs,
          truncated: false
        };
      }

      handoffs.push({ from: current.name, to: target.name });
      await conversations.setActiveAgent(conversationId, target.name);

      if (hops >= maxHops) {
        this.deps.logDebug("router:hop_limit", { conversationId, maxHops, pendingAgent: target.name });
        return {
          conversationId,
          response: response.content,
          startingAgent,
          respondingAgent: current.name,
          activeAgent: target.name,
          hops,
          handoffs,
          truncated: true
        };
      }

      current = target;
    }
  }

  // A handoff only applies to an agent the current agent was offered a transfer tool for.
  private async resolveHandoffTarget(
    current: AgentRecord,
    requested: string,
    offered: HandoffTool[]
  ): Promise<AgentRecord | undefined> {
    if (!offered.some((tool) => tool.targetAgent === requested)) {
      this.deps.logDebug("router:handoff_rejected", { from: current.name, requested, reason: "not offered" });
      return undefined;
    }

    const target = await this.deps.agents.find(requested);
    if (!target || target.agentId === current.agentId) {
      this.deps.logDebug("router:handoff_rejected", { from: current.name, requested, reason: "unknown agent" });
      return undefined;
    }
    return target;
  }

  private resolveConversationId(conversationId: string | undefined): string {
    const trimmed = conversationId?.trim();
    return trimmed ? trimmed : this.deps.config.defaultConversationId;
  }
}

function toSnapshot(record: ConversationRecord): ConversationSnapshot {
  return {
    conversationId: record.conversationId,
    activeAgent: record.activeAgent,
    turns: record.turns
  };
}
