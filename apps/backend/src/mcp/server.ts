import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ToolCallAdapter } from "./tool-adapter.js";
import { listRelayTools } from "./tool-definitions.js";

export const SERVER_NAME = "handoff-relay";
export const SERVER_VERSION = "0.1.0";

export function createRelayMcpServer(adapter: ToolCallAdapter): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listRelayTools()
  }));

  // A cancelled request aborts the in-flight handoff chain between hops.
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
    adapter.call(request.params.name, request.params.arguments ?? {}, { signal: extra.signal })
  );

  return server;
}
