import * as z from "zod/v4";
import {
  UnknownToolError,
  ValidationError,
  errorKindOf,
  errorMessageOf
} from "../core/errors.js";
import type { ToolContext, ToolDefinition, ToolDescriptor, ToolInputSchema, ToolResponse } from "./types.js";

const TOOL_NAME_RE = /^[a-z][a-z0-9_]*$/;

function validateToolDefinition(tool: ToolDefinition, existing: ReadonlyMap<string, ToolDefinition>): void {
  if (!tool.toolName || typeof tool.toolName !== "string") {
    throw new Error(`toolpack: missing toolName`);
  }
  if (tool.toolName.length > 128 || !TOOL_NAME_RE.test(tool.toolName)) {
    throw new Error(`toolpack: invalid toolName: ${tool.toolName}`);
  }
  if (existing.has(tool.toolName)) {
    throw new Error(`toolpack: duplicate toolName: ${tool.toolName}`);
  }
  if (typeof tool.description !== "string" || tool.description.trim().length === 0) {
    throw new Error(`toolpack:${tool.toolName}: description must be non-empty`);
  }
  if (typeof tool.run !== "function") {
    throw new Error(`toolpack:${tool.toolName}: run must be a function`);
  }
}

function describeInputSchema(schema: z.ZodType): ToolInputSchema {
  const json = z.toJSONSchema(schema, { io: "input" });
  return {
    type: "object",
    properties: json.properties ?? {},
    ...(json.required && json.required.length > 0 ? { required: [...json.required] } : {})
  };
}

export function errorResponse(toolName: string, err: unknown): ToolResponse {
  const text =
    err instanceof UnknownToolError
      ? err.message
      : `Error executing ${toolName} (${errorKindOf(err)}): ${errorMessageOf(err)}`;
  return { content: [{ type: "text", text }], isError: true };
}

/**
 * Named tools and their handlers. Registration happens at startup; after `seal()` the table is
 * read-only and `dispatch` may be called from any number of sessions.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly descriptors = new Map<string, ToolDescriptor>();
  private sealed = false;

  constructor(private readonly ctx: ToolContext) {}

  register(tool: ToolDefinition): this {
    if (this.sealed) throw new Error(`toolpack: registry is sealed, cannot register ${tool.toolName}`);
    validateToolDefinition(tool, this.tools);
    this.tools.set(tool.toolName, tool);
    this.descriptors.set(tool.toolName, {
      name: tool.toolName,
      description: tool.description,
      inputSchema: describeInputSchema(tool.inputSchema)
    });
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescriptor[] {
    return [...this.descriptors.values()];
  }

  /** Always resolves; handler failures come back as `isError` responses. */
  async dispatch(name: string, rawArgs: unknown): Promise<ToolResponse> {
    const log = this.ctx.logger.child({ component: "dispatcher", tool: name });
    try {
      const tool = this.tools.get(name);
      if (!tool) throw new UnknownToolError(name);

      const parsed = tool.inputSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) throw ValidationError.fromIssues(parsed.error.issues);

      log.debug("tool call");
      return await tool.run(parsed.data, this.ctx);
    } catch (err) {
      log.warn({ kind: errorKindOf(err), err: errorMessageOf(err) }, "tool call failed");
      return errorResponse(name, err);
    }
  }
}
