import type { ToolDefinition } from "../types.js";
import { annotateGenomicRegionsTool } from "./annotateGenomicRegions.js";
import { listSupportedGenomesTool } from "./listSupportedGenomes.js";
import { validateBedFormatTool } from "./validateBedFormat.js";
import { getAnnotationSummaryTool } from "./getAnnotationSummary.js";

export const builtinToolDefinitions: ToolDefinition[] = [
  annotateGenomicRegionsTool,
  listSupportedGenomesTool,
  validateBedFormatTool,
  getAnnotationSummaryTool
];
