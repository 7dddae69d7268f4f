import type { JobLimits } from "../src/config/config.js";
import type { JobSpec } from "../src/jobs/jobSpec.js";
import type { JobSupervisor, ProcessOutcome } from "../src/execution/supervisor.js";
import { GenomeRegistry } from "../src/genomes/genomeRegistry.js";
import { silentLogger } from "../src/logging/logger.js";
import type { ToolContext } from "../src/toolpacks/types.js";

export const TEST_LIMITS: JobLimits = {
  defaultTimeoutSeconds: 300,
  maxTimeoutSeconds: 3600,
  killGraceMs: 50,
  maxCaptureBytes: 1024 * 1024
};

export const quietLogger = silentLogger;

/** Records every spec it is asked to run and answers with a scripted outcome. */
export class FakeSupervisor implements JobSupervisor {
  readonly specs: JobSpec[] = [];

  constructor(
    private readonly respond: (spec: JobSpec) => Partial<ProcessOutcome> = () => ({}),
    private readonly outputRoot = "/work"
  ) {}

  async run(spec: JobSpec): Promise<ProcessOutcome> {
    this.specs.push(spec);
    const outputDirectory = spec.outputDirectory.startsWith("/")
      ? spec.outputDirectory
      : `${this.outputRoot}/${spec.outputDirectory}`;
    return {
      jobId: spec.jobId,
      status: "succeeded",
      exitCode: 0,
      signal: null,
      stdout: "",
      stderr: "",
      outputDirectory,
      argv: ["Rscript", "annotate.R"],
      timeoutSeconds: spec.timeoutSeconds,
      startedAt: "2026-01-01T00:00:00.000Z",
      finishedAt: "2026-01-01T00:00:01.000Z",
      durationMs: 1000,
      ...this.respond(spec)
    };
  }
}

export function makeContext(overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    genomes: new GenomeRegistry(),
    supervisor: new FakeSupervisor(),
    limits: TEST_LIMITS,
    defaultPattern: "*.bed",
    workingDir: "/work",
    logger: quietLogger(),
    ...overrides
  };
}
