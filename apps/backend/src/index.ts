#!/usr/bin/env node
import { startHandoffRelay } from "./bootstrap.js";
import { logError } from "./swarm/logger.js";

async function main(): Promise<void> {
  const relay = await startHandoffRelay();

  if (!relay.config.apiKey) {
    console.error(
      "[handoff-relay] No API credential configured. chat_with_agent will fail until ANTHROPIC_API_KEY or HANDOFF_RELAY_API_KEY is set."
    );
  }
  console.error(`[handoff-relay] MCP server ready on stdio (data dir: ${relay.config.paths.dataDir})`);

  const shutdown = async (signal: string): Promise<void> => {
    console.error(`[handoff-relay] Received ${signal}. Shutting down...`);
    await relay.stop();
    process.exit(0);
  };

  relay.server.onclose = () => {
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

void main().catch((error) => {
  logError("Failed to start MCP server", error);
  process.exit(1);
});
