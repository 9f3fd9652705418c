import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { config as loadDotenv } from "dotenv";
import { createConfig, type ConfigOverrides } from "./config.js";
import { createRelayMcpServer } from "./mcp/server.js";
import { ToolCallAdapter, type TeamTemplateLoader } from "./mcp/tool-adapter.js";
import { AgentStore } from "./swarm/agent-store.js";
import { ConversationLog } from "./swarm/conversation-log.js";
import { PiAiInferenceClient } from "./swarm/inference-client.js";
import { createDebugLogger } from "./swarm/logger.js";
import { SwarmRouter } from "./swarm/swarm-router.js";
import type { InferenceClient, RelayConfig } from "./swarm/types.js";

export interface BootstrapOptions {
  /** `.env` file to load; `null` skips dotenv entirely. Defaults to `.env` in the working directory. */
  envPath?: string | null;
  config?: ConfigOverrides;
  inference?: InferenceClient;
  loadTeam?: TeamTemplateLoader;
  transport?: Transport;
}

export interface BootstrapResult {
  config: RelayConfig;
  agents: AgentStore;
  conversations: ConversationLog;
  router: SwarmRouter;
  adapter: ToolCallAdapter;
  server: Server;
  stop: () => Promise<void>;
}

export async function startHandoffRelay(options: BootstrapOptions = {}): Promise<BootstrapResult> {
  loadBootstrapDotenv(options.envPath);

  const config = createConfig(options.config);
  const logDebug = createDebugLogger({ debug: config.debug });

  const agents = new AgentStore({ config, logDebug });
  const conversations = new ConversationLog({ config, logDebug });
  await agents.ensureDirectories();
  await conversations.ensureDirectories();

  const inference = options.inference ?? new PiAiInferenceClient({ config, logDebug });
  const router = new SwarmRouter({ config, agents, conversations, inference, logDebug });
  const adapter = new ToolCallAdapter({ agents, router, logDebug, loadTeam: options.loadTeam });
  const server = createRelayMcpServer(adapter);

  let stopped = false;
  const stop = async (): Promise<void> => {
    if (stopped) {
      return;
    }

    stopped = true;
    await server.close();
  };

  await server.connect(options.transport ?? new StdioServerTransport());
  logDebug("relay:started", {
    dataDir: config.paths.dataDir,
    model: `${config.defaultModel.provider}/${config.defaultModel.modelId}`,
    maxHops: config.maxHops,
    credential: config.apiKey ? "configured" : "missing"
  });

  return {
    config,
    agents,
    conversations,
    router,
    adapter,
    server,
    stop
  };
}

function loadBootstrapDotenv(envPath: string | null | undefined): void {
  if (envPath === null) {
    return;
  }

  const pathToLoad = typeof envPath === "string" ? resolve(envPath) : resolve(process.cwd(), ".env");
  if (!existsSync(pathToLoad)) {
    return;
  }

  loadDotenv({ path: pathToLoad, override: false });
}
