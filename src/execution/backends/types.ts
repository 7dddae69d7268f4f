export interface LocalProcessSpec {
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface ExecutionControl {
  /** Aborting kills the process group (SIGKILL); the promise still settles once it has exited. */
  signal?: AbortSignal;
  maxCaptureBytes?: number;
  /** How long to keep reading stdout/stderr after the process exits. */
  drainMs?: number;
}

export interface ExecutionResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  aborted: boolean;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

export interface RunnerBackend {
  execute(spec: LocalProcessSpec, control?: ExecutionControl): Promise<ExecutionResult>;
}
