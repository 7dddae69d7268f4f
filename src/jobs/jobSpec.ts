import type { JobLimits } from "../config/config.js";
import { ValidationError } from "../core/errors.js";
import { newJobId, type JobId } from "../core/ids.js";
import type { GenomeRegistry } from "../genomes/genomeRegistry.js";
import { zAnnotateGenomicRegionsInput, type PlotFormat } from "../mcp/toolSchemas.js";
import { ANNOTATOR_DEFAULT_PATTERN } from "../execution/annotationCommand.js";

/** One annotation job. Frozen on creation; every dispatch builds a fresh one. */
export interface JobSpec {
  readonly jobId: JobId;
  readonly inputFiles: readonly string[];
  readonly genomeBuild: string;
  readonly outputDirectory: string;
  readonly sampleName?: string;
  readonly includeCpg: boolean;
  readonly includeGenic: boolean;
  readonly plotFormats: readonly PlotFormat[];
  readonly combineAnalysis: boolean;
  readonly pattern: string;
  readonly timeoutSeconds: number;
}

export interface JobSpecOptions {
  genomes: GenomeRegistry;
  limits: Pick<JobLimits, "defaultTimeoutSeconds" | "maxTimeoutSeconds">;
  defaultPattern?: string;
  newId?: () => JobId;
}

/** Accepts a path, a comma-joined string of paths, or an array of either. */
export function normalizeInputFiles(value: string | readonly string[]): string[] {
  const parts = typeof value === "string" ? [value] : value;
  return parts
    .flatMap((p) => p.split(","))
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function buildJobSpec(rawArgs: unknown, options: JobSpecOptions): JobSpec {
  const parsed = zAnnotateGenomicRegionsInput.safeParse(rawArgs ?? {});
  if (!parsed.success) throw ValidationError.fromIssues(parsed.error.issues);
  const args = parsed.data;

  const inputFiles = normalizeInputFiles(args.input_files);
  if (inputFiles.length === 0) {
    throw new ValidationError("input_files must name at least one file");
  }

  const genome = options.genomes.get(args.genome_build);
  if (!genome) {
    throw new ValidationError(
      `Unsupported genome build '${args.genome_build}'. Available: ${options.genomes.ids().join(", ")}`
    );
  }
  if (args.include_cpg && !genome.annotations.includes("cpg")) {
    throw new ValidationError(`genome build ${genome.id} has no CpG annotations`);
  }
  if (args.include_genic && !genome.annotations.includes("genic")) {
    throw new ValidationError(`genome build ${genome.id} has no genic annotations`);
  }

  const outputDirectory = args.output_directory.trim();
  if (outputDirectory.length === 0) {
    throw new ValidationError("output_directory must be non-empty");
  }

  const timeoutSeconds = args.timeout ?? options.limits.defaultTimeoutSeconds;
  if (timeoutSeconds > options.limits.maxTimeoutSeconds) {
    throw new ValidationError(`timeout ${timeoutSeconds}s exceeds the maximum of ${options.limits.maxTimeoutSeconds}s`);
  }

  const sampleName = args.sample_name?.trim();

  return Object.freeze({
    jobId: (options.newId ?? newJobId)(),
    inputFiles: Object.freeze(inputFiles),
    genomeBuild: genome.id,
    outputDirectory,
    ...(sampleName ? { sampleName } : {}),
    includeCpg: args.include_cpg,
    includeGenic: args.include_genic,
    plotFormats: Object.freeze([...new Set(args.plot_formats)]),
    combineAnalysis: args.combine_analysis,
    pattern: args.pattern ?? options.defaultPattern ?? ANNOTATOR_DEFAULT_PATTERN,
    timeoutSeconds
  });
}
