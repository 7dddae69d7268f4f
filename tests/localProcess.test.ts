import { describe, it, expect } from "vitest";
import { mkdtemp, realpath, rm } from "fs/promises";
import os from "os";
import path from "path";
import { LocalProcessRunner } from "../src/execution/backends/localProcess.js";

const node = process.execPath;

describe("LocalProcessRunner", () => {
  const runner = new LocalProcessRunner();

  it("captures stdout, stderr and the exit code", async () => {
    const result = await runner.execute({
      argv: [node, "-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"]
    });
    expect(result.exitCode).toBe(3);
    expect(result.signal).toBeNull();
    expect(result.aborted).toBe(false);
    expect(result.stdout).toBe("out");
    expect(result.stderr).toBe("err");
  });

  it("runs in the requested working directory", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "annotation-gateway-cwd-"));
    try {
      const result = await runner.execute({ argv: [node, "-e", "process.stdout.write(process.cwd())"], cwd: dir });
      expect(result.stdout).toBe(await realpath(dir));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("truncates captured output at the byte cap", async () => {
    const result = await runner.execute(
      { argv: [node, "-e", "process.stdout.write('x'.repeat(100))"] },
      { maxCaptureBytes: 10 }
    );
    expect(result.stdout).toBe("xxxxxxxxxx\n[stdout truncated]\n");
  });

  it("kills the process when aborted", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = runner.execute({ argv: [node, "-e", "setInterval(() => {}, 1000)"] }, { signal: controller.signal });
    setTimeout(() => controller.abort(), 200);
    const result = await pending;
    expect(result.aborted).toBe(true);
    expect(result.signal).toBe("SIGKILL");
    expect(result.exitCode).toBeNull();
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it("completes at exit even when a leftover process still holds the output pipes", async () => {
    const script = [
      "const { spawn } = require('child_process');",
      "spawn(process.execPath, ['-e', 'setTimeout(() => {}, 30000)'], { stdio: ['ignore', 'inherit', 'inherit'] });",
      "process.stdout.write('done\\n');",
      "process.exit(0);"
    ].join(" ");
    const started = Date.now();
    const result = await runner.execute({ argv: [node, "-e", script] }, { drainMs: 300 });
    expect(result.exitCode).toBe(0);
    expect(result.aborted).toBe(false);
    expect(result.stdout).toBe("done\n");
    expect(Date.now() - started).toBeLessThan(10_000);
  });

  it("kills the whole process group when aborted", async () => {
    const script = [
      "const { spawn } = require('child_process');",
      "spawn(process.execPath, ['-e', 'setTimeout(() => {}, 30000)'], { stdio: ['ignore', 'inherit', 'inherit'] });",
      "setInterval(() => {}, 1000);"
    ].join(" ");
    const controller = new AbortController();
    const started = Date.now();
    const pending = runner.execute({ argv: [node, "-e", script] }, { signal: controller.signal, drainMs: 15_000 });
    setTimeout(() => controller.abort(), 300);
    const result = await pending;
    expect(result.aborted).toBe(true);
    // Pipes close only once the leftover process is gone too; otherwise the drain window would run out.
    expect(Date.now() - started).toBeLessThan(10_000);
  });

  it("rejects when the executable cannot be launched", async () => {
    await expect(runner.execute({ argv: ["definitely-not-an-annotator-binary"] })).rejects.toThrow(/ENOENT/);
  });

  it("rejects an empty argv", async () => {
    await expect(runner.execute({ argv: [] })).rejects.toThrow("local_process argv must be non-empty");
  });
});
