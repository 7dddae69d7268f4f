import { spawn, type ChildProcess } from "child_process";
import type { ExecutionControl, ExecutionResult, LocalProcessSpec, RunnerBackend } from "./types.js";

export const DEFAULT_MAX_CAPTURE_BYTES = 1024 * 1024;
export const DEFAULT_DRAIN_MS = 2000;

type ExitStatus = { code: number | null; signal: NodeJS.Signals | null };

/** Kills the child and everything it started; the child leads its own process group. */
function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, "SIGKILL");
  } catch {
    // The group is gone (or the platform has none); the direct child may still be alive.
    child.kill("SIGKILL");
  }
}

class BoundedCapture {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  private truncated = false;

  constructor(private readonly maxBytes: number) {}

  append(chunk: Buffer): void {
    if (this.truncated) return;
    const next = this.bytes + chunk.byteLength;
    if (next > this.maxBytes) {
      const keep = Math.max(0, this.maxBytes - this.bytes);
      if (keep > 0) this.chunks.push(chunk.subarray(0, keep));
      this.bytes = this.maxBytes;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.bytes = next;
  }

  text(streamName: string): string {
    return Buffer.concat(this.chunks).toString("utf8") + (this.truncated ? `\n[${streamName} truncated]\n` : "");
  }
}

export class LocalProcessRunner implements RunnerBackend {
  async execute(spec: LocalProcessSpec, control: ExecutionControl = {}): Promise<ExecutionResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("local_process argv must be non-empty");
    if (control.signal?.aborted) throw new Error("execution aborted before launch");
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const,
      detached: true
    });

    const maxBytes = control.maxCaptureBytes ?? DEFAULT_MAX_CAPTURE_BYTES;
    const stdout = new BoundedCapture(maxBytes);
    const stderr = new BoundedCapture(maxBytes);
    child.stdout.on("data", (chunk: Buffer) => stdout.append(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.append(chunk));

    // 'close' waits for every holder of the pipes, including processes the child left behind.
    const closed = new Promise<void>((resolve) => child.once("close", () => resolve()));

    let aborted = false;
    const onAbort = (): void => {
      aborted = true;
      killProcessGroup(child);
    };
    control.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const exit = await new Promise<ExitStatus>((resolve, reject) => {
        child.once("error", reject);
        child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
      });

      let timer: NodeJS.Timeout | undefined;
      const drained = await Promise.race([
        closed.then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), control.drainMs ?? DEFAULT_DRAIN_MS);
        })
      ]);
      clearTimeout(timer);
      if (!drained) {
        killProcessGroup(child);
        child.stdout.destroy();
        child.stderr.destroy();
      }

      return {
        exitCode: exit.code,
        signal: exit.signal,
        aborted,
        stdout: stdout.text("stdout"),
        stderr: stderr.text("stderr"),
        startedAt,
        finishedAt: new Date().toISOString()
      };
    } finally {
      control.signal?.removeEventListener("abort", onAbort);
    }
  }
}
