import { promises as fs } from "fs";
import path from "path";
import type { Logger } from "pino";
import type { AnnotatorSettings, JobLimits } from "../config/config.js";
import { EnvironmentError, ProcessFailure, TimeoutFailure, errorMessageOf } from "../core/errors.js";
import type { JobId } from "../core/ids.js";
import type { JobSpec } from "../jobs/jobSpec.js";
import { buildAnnotationArgv } from "./annotationCommand.js";
import { LocalProcessRunner } from "./backends/localProcess.js";
import type { ExecutionResult, RunnerBackend } from "./backends/types.js";

export type ProcessStatus = "succeeded" | "failed" | "timed_out" | "launch_failed";

export interface ProcessOutcome {
  jobId: JobId;
  status: ProcessStatus;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** Absolute; relative job output paths resolve against the supervisor's working directory. */
  outputDirectory: string;
  argv: readonly string[];
  timeoutSeconds: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface JobSupervisor {
  run(spec: JobSpec): Promise<ProcessOutcome>;
}

const PROBE_TIMEOUT_MS = 10_000;

type Settled = { ok: true; result: ExecutionResult } | { ok: false; error: unknown };

function delay<T>(ms: number, value: T): { promise: Promise<T>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(value), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Runs one annotation process per job with a wall-clock deadline. Holds no per-job state, so
 * concurrent `run` calls are independent.
 */
export class AnnotationSupervisor implements JobSupervisor {
  private readonly runner: RunnerBackend;
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      annotator: AnnotatorSettings;
      limits: Pick<JobLimits, "killGraceMs" | "maxCaptureBytes">;
      logger: Logger;
      runner?: RunnerBackend;
    }
  ) {
    this.runner = deps.runner ?? new LocalProcessRunner();
    this.log = deps.logger.child({ component: "supervisor" });
  }

  get workingDir(): string {
    return this.deps.annotator.workingDir;
  }

  commandFor(spec: JobSpec): string[] {
    return buildAnnotationArgv(spec, this.deps.annotator);
  }

  resolveOutputDirectory(spec: JobSpec): string {
    return path.resolve(this.deps.annotator.workingDir, spec.outputDirectory);
  }

  async run(spec: JobSpec): Promise<ProcessOutcome> {
    const argv = this.commandFor(spec);
    const log = this.log.child({ job_id: spec.jobId });
    const started = Date.now();
    const controller = new AbortController();

    log.info({ argv, cwd: this.workingDir, timeout_seconds: spec.timeoutSeconds }, "annotation job launched");

    const execution: Promise<Settled> = this.runner
      .execute(
        { argv, cwd: this.workingDir },
        {
          signal: controller.signal,
          maxCaptureBytes: this.deps.limits.maxCaptureBytes,
          drainMs: this.deps.limits.killGraceMs
        }
      )
      .then(
        (result): Settled => ({ ok: true, result }),
        (error: unknown): Settled => ({ ok: false, error })
      );

    const deadline = delay(spec.timeoutSeconds * 1000, "timeout" as const);
    const first = await Promise.race([execution, deadline.promise]);
    deadline.cancel();

    const base = {
      jobId: spec.jobId,
      outputDirectory: this.resolveOutputDirectory(spec),
      argv,
      timeoutSeconds: spec.timeoutSeconds,
      startedAt: new Date(started).toISOString()
    };
    const finish = (): { finishedAt: string; durationMs: number } => {
      const now = Date.now();
      return { finishedAt: new Date(now).toISOString(), durationMs: now - started };
    };

    if (first === "timeout") {
      controller.abort();
      const grace = delay(this.deps.limits.killGraceMs, null);
      const late = await Promise.race([execution, grace.promise]);
      grace.cancel();
      const result = late !== null && late.ok ? late.result : null;
      const outcome: ProcessOutcome = {
        ...base,
        status: "timed_out",
        exitCode: result?.exitCode ?? null,
        signal: result?.signal ?? "SIGKILL",
        stdout: result?.stdout ?? "",
        stderr: result?.stderr ?? "",
        ...finish()
      };
      log.warn({ status: outcome.status, duration_ms: outcome.durationMs }, "annotation job timed out");
      return outcome;
    }

    if (!first.ok) {
      const outcome: ProcessOutcome = {
        ...base,
        status: "launch_failed",
        exitCode: null,
        signal: null,
        stdout: "",
        stderr: errorMessageOf(first.error),
        ...finish()
      };
      log.error({ status: outcome.status, err: outcome.stderr }, "annotation job failed to launch");
      return outcome;
    }

    const { result } = first;
    const outcome: ProcessOutcome = {
      ...base,
      status: result.exitCode === 0 ? "succeeded" : "failed",
      exitCode: result.exitCode,
      signal: result.signal,
      stdout: result.stdout,
      stderr: result.stderr,
      ...finish()
    };
    log.info(
      { status: outcome.status, exit_code: outcome.exitCode, duration_ms: outcome.durationMs },
      "annotation job finished"
    );
    return outcome;
  }

  /** Verifies the script exists and the executable answers `--version`. */
  async probeEnvironment(): Promise<{ executable: string; scriptPath: string; version: string }> {
    const { executable, scriptPath } = this.deps.annotator;

    const st = await fs.stat(scriptPath).catch(() => null);
    if (!st?.isFile()) {
      throw new EnvironmentError(`annotation script not found: ${scriptPath}`);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), PROBE_TIMEOUT_MS);
    let result: ExecutionResult;
    try {
      result = await this.runner.execute({ argv: [executable, "--version"] }, { signal: controller.signal });
    } catch (err) {
      throw new EnvironmentError(`annotation executable unavailable (${executable}): ${errorMessageOf(err)}`);
    } finally {
      clearTimeout(timer);
    }

    if (result.aborted) {
      throw new EnvironmentError(`${executable} --version did not finish within ${PROBE_TIMEOUT_MS / 1000} seconds`);
    }
    if (result.exitCode !== 0) {
      throw new EnvironmentError(`${executable} --version exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }

    // Rscript prints its version banner on stderr.
    const banner = (result.stderr.trim() || result.stdout.trim()).split(/\r?\n/)[0] ?? "";
    this.log.info({ executable, script_path: scriptPath, version: banner }, "annotation environment ok");
    return { executable, scriptPath, version: banner };
  }
}

/** Converts a non-success outcome into its tagged failure. */
export function assertSucceeded(outcome: ProcessOutcome): void {
  switch (outcome.status) {
    case "succeeded":
      return;
    case "failed":
      throw new ProcessFailure(outcome.exitCode, outcome.stderr, outcome.signal);
    case "timed_out":
      throw new TimeoutFailure(outcome.timeoutSeconds);
    case "launch_failed":
      throw new EnvironmentError(`failed to launch ${outcome.argv[0] ?? "annotation process"}: ${outcome.stderr}`);
  }
}
