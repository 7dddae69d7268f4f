import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ToolRegistry } from "../toolpacks/registry.js";

export interface GatewayDeps {
  registry: ToolRegistry;
  name: string;
  version: string;
}

/** Serves the tool registry over MCP. Dispatch failures surface as `isError` tool results. */
export function createGatewayServer(deps: GatewayDeps): Server {
  const server = new Server({ name: deps.name, version: deps.version }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: deps.registry.list()
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    deps.registry.dispatch(request.params.name, request.params.arguments ?? {})
  );

  return server;
}
