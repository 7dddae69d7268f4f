import { builtinToolDefinitions } from "./builtin/index.js";
import { ToolRegistry } from "./registry.js";
import type { ToolContext, ToolDefinition } from "./types.js";

/** Builds the sealed registry a session dispatches against. */
export function createToolRegistry(ctx: ToolContext, tools: ToolDefinition[] = builtinToolDefinitions): ToolRegistry {
  const registry = new ToolRegistry(ctx);
  for (const tool of tools) registry.register(tool);
  return registry.seal();
}
