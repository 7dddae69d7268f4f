import type { Logger } from "pino";
import type * as z from "zod/v4";
import type { JobLimits } from "../config/config.js";
import type { JobSupervisor } from "../execution/supervisor.js";
import type { GenomeRegistry } from "../genomes/genomeRegistry.js";

export interface ToolContext {
  genomes: GenomeRegistry;
  supervisor: JobSupervisor;
  limits: JobLimits;
  defaultPattern: string;
  /** Relative paths in tool arguments resolve against this directory. */
  workingDir: string;
  logger: Logger;
}

// Type aliases rather than interfaces: the SDK result types carry an index signature.
export type TextContent = {
  type: "text";
  text: string;
};

export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
  structuredContent?: Record<string, unknown>;
};

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
};

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export interface ToolDefinition<TSchema extends z.ZodType = z.ZodType> {
  toolName: string;
  description: string;
  inputSchema: TSchema;
  run(args: z.output<TSchema>, ctx: ToolContext): Promise<ToolResponse>;
}

export function defineTool<TSchema extends z.ZodType>(definition: ToolDefinition<TSchema>): ToolDefinition {
  return definition;
}

export function textResponse(text: string, structuredContent?: Record<string, unknown>): ToolResponse {
  return structuredContent ? { content: [{ type: "text", text }], structuredContent } : { content: [{ type: "text", text }] };
}
