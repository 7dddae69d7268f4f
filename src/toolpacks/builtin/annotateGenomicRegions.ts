import { buildJobSpec } from "../../jobs/jobSpec.js";
import { zAnnotateGenomicRegionsInput } from "../../mcp/toolSchemas.js";
import { assertSucceeded } from "../../execution/supervisor.js";
import { scanOutputDirectory, type FileManifest } from "../../results/classifyOutputs.js";
import { defineTool, textResponse } from "../types.js";

function bulletList(items: readonly string[], limit: number): string {
  if (items.length === 0) return "- (none)";
  const shown = items.slice(0, limit).map((f) => `- ${f}`);
  if (items.length > limit) shown.push(`- ... and ${items.length - limit} more`);
  return shown.join("\n");
}

export function formatAnnotationReport(input: {
  jobId: string;
  inputFiles: readonly string[];
  genomeBuild: string;
  outputDirectory: string;
  manifest: FileManifest;
}): string {
  const { manifest } = input;
  const lines = [
    "Genomic annotation completed successfully.",
    "",
    `Job: ${input.jobId}`,
    `Input: ${input.inputFiles.join(", ")}`,
    `Genome build: ${input.genomeBuild}`,
    `Output directory: ${input.outputDirectory}`,
    "",
    "Generated files:",
    `- Annotation files: ${manifest.annotationFiles.length}`,
    `- Summary files: ${manifest.summaryFiles.length}`,
    `- Combined files: ${manifest.combinedFiles.length}`,
    `- Plot files: ${manifest.plotFiles.length}`,
    "",
    "Key output files:",
    bulletList(manifest.annotationFiles, 5)
  ];
  if (manifest.plotFiles.length > 0) {
    lines.push("", `Visualizations: ${manifest.plotFiles.slice(0, 3).join(", ")}`);
  }
  return lines.join("\n");
}

export const annotateGenomicRegionsTool = defineTool({
  toolName: "annotate_genomic_regions",
  description:
    "Annotate genomic regions from BED files with CpG and genic features. Runs the annotation pipeline and reports the generated tables and plots.",
  inputSchema: zAnnotateGenomicRegionsInput,

  async run(args, ctx) {
    const spec = buildJobSpec(args, {
      genomes: ctx.genomes,
      limits: ctx.limits,
      defaultPattern: ctx.defaultPattern
    });

    const outcome = await ctx.supervisor.run(spec);
    assertSucceeded(outcome);

    const log = ctx.logger.child({ job_id: spec.jobId });
    const manifest = scanOutputDirectory(outcome.outputDirectory, {
      onSkip: (dirPath, err) => log.warn({ dir: dirPath, err: String(err) }, "skipped unreadable output directory")
    });

    return textResponse(
      formatAnnotationReport({
        jobId: spec.jobId,
        inputFiles: spec.inputFiles,
        genomeBuild: spec.genomeBuild,
        outputDirectory: outcome.outputDirectory,
        manifest
      }),
      {
        job_id: spec.jobId,
        genome_build: spec.genomeBuild,
        output_directory: outcome.outputDirectory,
        duration_ms: outcome.durationMs,
        files: {
          annotation_files: manifest.annotationFiles,
          summary_files: manifest.summaryFiles,
          combined_files: manifest.combinedFiles,
          plot_files: manifest.plotFiles
        }
      }
    );
  }
});
