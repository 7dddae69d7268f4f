import { promises as fs } from "fs";
import path from "path";
import { ValidationError } from "../../core/errors.js";
import { zGetAnnotationSummaryInput } from "../../mcp/toolSchemas.js";
import { filterManifest, readTablePreview, scanOutputDirectory } from "../../results/classifyOutputs.js";
import { defineTool, textResponse } from "../types.js";

function section(title: string, files: readonly string[], limit: number): string {
  const shown = files.slice(0, limit).map((f) => `- ${f}`);
  return [`${title}:`, ...(shown.length ? shown : ["- (none)"])].join("\n");
}

export const getAnnotationSummaryTool = defineTool({
  toolName: "get_annotation_summary",
  description: "Get summary of annotation results from an output directory",
  inputSchema: zGetAnnotationSummaryInput,

  async run(args, ctx) {
    const dir = path.resolve(ctx.workingDir, args.results_directory);
    const st = await fs.stat(dir).catch(() => null);
    if (!st?.isDirectory()) {
      throw new ValidationError(`results directory not found: ${args.results_directory}`);
    }

    const log = ctx.logger.child({ component: "summary" });
    const scanned = scanOutputDirectory(dir, {
      onSkip: (dirPath, err) => log.warn({ dir: dirPath, err: String(err) }, "skipped unreadable results directory")
    });
    const sampleName = args.sample_name;
    const manifest = sampleName ? filterManifest(scanned, (rel) => path.posix.basename(rel).includes(sampleName)) : scanned;

    const lines = [
      "Annotation Results Summary",
      "",
      `Directory: ${args.results_directory}`,
      ...(sampleName ? [`Sample: ${sampleName}`] : []),
      "",
      "Files found:",
      `- Summary files: ${manifest.summaryFiles.length}`,
      `- Annotation files: ${manifest.annotationFiles.length}`,
      `- Combined files: ${manifest.combinedFiles.length}`,
      `- Plot files: ${manifest.plotFiles.length}`,
      "",
      section("Summary files", manifest.summaryFiles, manifest.summaryFiles.length),
      "",
      section("Annotation files", manifest.annotationFiles, 5),
      "",
      section("Visualizations", manifest.plotFiles, 5)
    ];

    const firstSummary = manifest.summaryFiles[0];
    let preview: { file: string; header: string[]; rows: string[][] } | null = null;
    if (firstSummary) {
      const table = await readTablePreview(path.join(dir, firstSummary), args.max_preview_rows);
      preview = { file: firstSummary, header: table.header, rows: table.rows };
      lines.push(
        "",
        `Sample summary (from ${firstSummary}):`,
        "```",
        table.header.join("\t"),
        ...table.rows.map((r) => r.join("\t")),
        "```"
      );
    }

    return textResponse(lines.join("\n"), {
      results_directory: dir,
      files: {
        annotation_files: manifest.annotationFiles,
        summary_files: manifest.summaryFiles,
        combined_files: manifest.combinedFiles,
        plot_files: manifest.plotFiles
      },
      summary_preview: preview
    });
  }
});
