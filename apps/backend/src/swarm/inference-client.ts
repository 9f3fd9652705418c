import {
  complete,
  getModels,
  getProviders,
  type Api,
  type AssistantMessage,
  type Context,
  type Message,
  type Model,
  type TextContent,
  type Tool,
  type ToolCall,
  type Usage
} from "@mariozechner/pi-ai";
import { Type } from "@sinclair/typebox";
import { previewForLog } from "../utils/normalize.js";
import { AuthError, UpstreamError } from "./errors.js";
import { resolveHandoffTarget } from "./handoff-tools.js";
import { classifyProviderError } from "./provider-errors.js";
import type {
  AgentModelDescriptor,
  AgentRecord,
  CompletionRequest,
  ConversationTurn,
  DebugLogger,
  HandoffTool,
  InferenceClient,
  ModelResponse,
  RelayConfig
} from "./types.js";

export interface CompletionOptions {
  apiKey: string;
  maxTokens: number;
  signal?: AbortSignal;
}

export type CompleteFn = (model: Model<Api>, context: Context, options: CompletionOptions) => Promise<AssistantMessage>;

export type ModelResolver = (descriptor: AgentModelDescriptor) => Model<Api> | undefined;

interface PiAiInferenceClientDependencies {
  config: Pick<RelayConfig, "apiKey" | "maxTokens">;
  logDebug: DebugLogger;
  completeFn?: CompleteFn;
  resolveModel?: ModelResolver;
}

const HandoffParameters = Type.Object({
  reason: Type.Optional(Type.String({ description: "Why the conversation is being transferred." }))
});

const EMPTY_USAGE: Usage = {
  input: 0,
  output: 0,
  cacheRead: 0,
  cacheWrite: 0,
  totalTokens: 0,
  cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 }
};

const CONTINUE_PROMPT = "Continue the conversation from here.";

/**
 * Sends one agent turn to the hosted model through pi-ai and parses the reply into a
 * `ModelResponse`. Performs no retries: throttling and upstream failures surface to the caller.
 */
export class PiAiInferenceClient implements InferenceClient {
  private readonly completeFn: CompleteFn;
  private readonly resolveModel: ModelResolver;

  constructor(private readonly deps: PiAiInferenceClientDependencies) {
    this.completeFn = deps.completeFn ?? ((model, context, options) => complete(model, context, options));
    this.resolveModel = deps.resolveModel ?? resolveCatalogModel;
  }

  async complete(request: CompletionRequest): Promise<ModelResponse> {
    const apiKey = this.deps.config.apiKey;
    if (!apiKey) {
      throw new AuthError("No API credential configured. Set ANTHROPIC_API_KEY or HANDOFF_RELAY_API_KEY.");
    }

    const { agent } = request;
    const model = this.resolveModel(agent.model);
    if (!model) {
      throw new UpstreamError(`Unknown model ${agent.model.provider}/${agent.model.modelId} for agent "${agent.name}"`);
    }

    const context: Context = {
      systemPrompt: agent.instructions,
      messages: toProviderMessages(model, agent, request.history),
      tools: toProviderTools(request.handoffTools)
    };

    this.deps.logDebug("inference:request", {
      agent: agent.name,
      model: `${model.provider}/${model.id}`,
      messages: context.messages.length,
      tools: request.handoffTools.map((tool) => tool.name)
    });

    let message: AssistantMessage;
    try {
      message = await this.completeFn(model, context, {
        apiKey,
        maxTokens: this.deps.config.maxTokens,
        signal: request.signal
      });
    } catch (error) {
      throw classifyProviderError(error);
    }

    if (message.stopReason === "error") {
      throw classifyProviderError(new Error(message.errorMessage ?? "Provider returned an error without a message"));
    }
    if (message.stopReason === "aborted") {
      throw new UpstreamError(`Request for agent "${agent.name}" was aborted`);
    }

    const response = parseAssistantMessage(message, request.handoffTools);
    this.deps.logDebug("inference:response", {
      agent: agent.name,
      stopReason: message.stopReason,
      handoff: response.handoff,
      preview: previewForLog(response.content)
    });
    return response;
  }
}

export function resolveCatalogModel(descriptor: AgentModelDescriptor): Model<Api> | undefined {
  const provider = getProviders().find((candidate) => candidate === descriptor.provider);
  if (!provider) {
    return undefined;
  }

  const models: Model<Api>[] = getModels(provider);
  return models.find((model) => model.id === descriptor.modelId);
}

/** Text blocks become `content`; the first transfer tool call becomes `handoff`. */
export function parseAssistantMessage(message: AssistantMessage, handoffTools: HandoffTool[]): ModelResponse {
  const content = message.content
    .filter((block): block is TextContent => block.type === "text")
    .map((block) => block.text)
    .join("\n")
    .trim();

  for (const block of message.content) {
    if (!isToolCall(block)) {
      continue;
    }

    const handoff = resolveHandoffTarget(block.name, handoffTools);
    if (handoff) {
      return { content, handoff };
    }
  }

  return { content };
}

/**
 * The agent's own turns replay as assistant messages. Everything else, including what other
 * agents said before a handoff, replays as user-side context so the request never ends on an
 * assistant message.
 */
export function toProviderMessages(model: Model<Api>, agent: AgentRecord, history: ConversationTurn[]): Message[] {
  const messages: Message[] = [];

  for (const turn of history) {
    const timestamp = parseTimestamp(turn.timestamp);

    if (turn.role === "agent" && turn.agent === agent.name) {
      messages.push({
        role: "assistant",
        content: [{ type: "text", text: describeAgentTurn(turn) }],
        api: model.api,
        provider: model.provider,
        model: model.id,
        usage: EMPTY_USAGE,
        stopReason: "stop",
        timestamp
      });
      continue;
    }

    const text = turn.role === "user" ? turn.text : `[${turn.agent}] ${describeAgentTurn(turn)}`;
    messages.push({ role: "user", content: text, timestamp });
  }

  const last = messages[messages.length - 1];
  if (!last || last.role === "assistant") {
    messages.push({ role: "user", content: CONTINUE_PROMPT, timestamp: Date.now() });
  }

  return messages;
}

function toProviderTools(handoffTools: HandoffTool[]): Tool[] {
  return handoffTools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    parameters: HandoffParameters
  }));
}

function describeAgentTurn(turn: ConversationTurn): string {
  const text = turn.text.trim();
  if (turn.handoffTo) {
    return text ? `${text}\n(Transferred to ${turn.handoffTo}.)` : `(Transferred to ${turn.handoffTo}.)`;
  }
  return text || "(no text)";
}

function isToolCall(block: AssistantMessage["content"][number]): block is ToolCall {
  return block.type === "toolCall";
}

function parseTimestamp(value: string): number {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? Date.now() : parsed;
}
