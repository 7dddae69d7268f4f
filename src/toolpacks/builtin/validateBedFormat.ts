import { promises as fs } from "fs";
import path from "path";
import { inspectBedFile } from "../../bed/detectBedFormat.js";
import { ValidationError } from "../../core/errors.js";
import { zValidateBedFormatInput } from "../../mcp/toolSchemas.js";
import { defineTool, textResponse } from "../types.js";

export const validateBedFormatTool = defineTool({
  toolName: "validate_bed_format",
  description: "Validate BED file format and structure (detects BED3/BED6/BED12 from the column count)",
  inputSchema: zValidateBedFormatInput,

  async run(args, ctx) {
    const filePath = path.resolve(ctx.workingDir, args.file_path);
    const st = await fs.stat(filePath).catch(() => null);
    if (!st) throw new ValidationError(`file not found: ${args.file_path}`);
    if (!st.isFile()) throw new ValidationError(`not a regular file: ${args.file_path}`);

    const inspection = await inspectBedFile(filePath);
    if (inspection.format === "UNKNOWN") {
      throw new ValidationError(`${args.file_path}: no data line with at least 3 tab-separated columns`);
    }

    const text = [
      "BED File Validation Results",
      "",
      `File: ${args.file_path}`,
      `Detected format: ${inspection.format}`,
      `Columns: ${inspection.columns}`,
      `Data lines: ${inspection.dataLines}`,
      "",
      `Preview (first ${inspection.preview.length} lines):`,
      "```",
      ...inspection.preview,
      "```"
    ].join("\n");

    return textResponse(text, {
      file_path: args.file_path,
      format: inspection.format,
      columns: inspection.columns,
      data_lines: inspection.dataLines
    });
  }
});
