import type { JobSpec } from "../jobs/jobSpec.js";

/** The annotation script's own default for `--pattern`; the flag is omitted when it matches. */
export const ANNOTATOR_DEFAULT_PATTERN = "*.bed";

export interface AnnotatorTarget {
  executable: string;
  scriptPath: string;
}

export function buildAnnotationArgv(spec: JobSpec, target: AnnotatorTarget): string[] {
  const argv = [
    target.executable,
    target.scriptPath,
    "-i",
    spec.inputFiles.join(","),
    "-g",
    spec.genomeBuild,
    "-o",
    spec.outputDirectory,
    "--formats",
    spec.plotFormats.join(",")
  ];

  if (spec.sampleName !== undefined) {
    argv.push("-n", spec.sampleName);
  }

  if (spec.pattern !== ANNOTATOR_DEFAULT_PATTERN) {
    argv.push("--pattern", spec.pattern);
  }

  if (spec.combineAnalysis) {
    argv.push("--combine");
  }

  return argv;
}
