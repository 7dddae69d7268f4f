import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import type { LogLevel } from "../logging/logger.js";

export type TransportMode = "mcp" | "line";

/** Largest timeout a Node timer can hold (2^31 - 1 ms), in whole seconds. */
export const MAX_TIMEOUT_SECONDS = Math.floor(0x7fffffff / 1000);

const zEnvString = z.string().trim().min(1);
const zTimeoutSeconds = z.number().int().positive().max(MAX_TIMEOUT_SECONDS);

const zGatewayConfig = z.object({
  version: z.literal(1),
  server: z.object({
    name: z.string().min(1).default("genomic-annotation-gateway"),
    transport: z.enum(["mcp", "line"]).default("mcp")
  }),
  annotator: z.object({
    executable: zEnvString.default("Rscript"),
    script_path: zEnvString,
    working_dir: zEnvString.default("."),
    default_pattern: z.string().min(1).default("*.bed")
  }),
  limits: z.object({
    default_timeout_seconds: zTimeoutSeconds.default(300),
    max_timeout_seconds: zTimeoutSeconds.default(3600),
    kill_grace_ms: z.number().int().min(0).default(5000),
    max_capture_bytes: z.number().int().positive().default(1024 * 1024)
  }),
  logging: z
    .object({
      level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
    })
    .optional()
});

export type GatewayConfigFile = z.output<typeof zGatewayConfig>;

export interface ConfigOverrides {
  transport?: TransportMode;
  scriptPath?: string;
  logLevel?: LogLevel;
}

export interface AnnotatorSettings {
  executable: string;
  scriptPath: string;
  workingDir: string;
  defaultPattern: string;
}

export interface JobLimits {
  defaultTimeoutSeconds: number;
  maxTimeoutSeconds: number;
  killGraceMs: number;
  maxCaptureBytes: number;
}

function expandEnvToken(value: string, field: string): string {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1] ?? "";
  const v = process.env[varName]?.trim();
  if (!v) throw new Error(`config ${field} references unset environment variable ${varName}`);
  return v;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`).join("; ");
}

export class GatewayConfig {
  private constructor(
    private readonly file: GatewayConfigFile,
    private readonly baseDir: string,
    private readonly overrides: ConfigOverrides
  ) {
    if (file.limits.default_timeout_seconds > file.limits.max_timeout_seconds) {
      throw new Error(
        `config limits.default_timeout_seconds (${file.limits.default_timeout_seconds}) exceeds limits.max_timeout_seconds (${file.limits.max_timeout_seconds})`
      );
    }
  }

  static fromObject(raw: unknown, baseDir: string, overrides: ConfigOverrides = {}): GatewayConfig {
    const parsed = zGatewayConfig.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`invalid gateway config: ${formatIssues(parsed.error)}`);
    }
    return new GatewayConfig(parsed.data, path.resolve(baseDir), overrides);
  }

  static async loadFromFile(filePath: string, overrides: ConfigOverrides = {}): Promise<GatewayConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    let parsed: unknown;
    try {
      parsed = YAML.parse(raw) as unknown;
    } catch (err) {
      throw new Error(`invalid gateway config at ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return GatewayConfig.fromObject(parsed, path.dirname(path.resolve(filePath)), overrides);
  }

  serverName(): string {
    return this.file.server.name;
  }

  transport(): TransportMode {
    return this.overrides.transport ?? this.file.server.transport;
  }

  logLevel(): LogLevel {
    return this.overrides.logLevel ?? this.file.logging?.level ?? "info";
  }

  annotator(): AnnotatorSettings {
    const a = this.file.annotator;
    const scriptPath = this.overrides.scriptPath ?? expandEnvToken(a.script_path, "annotator.script_path");
    return {
      executable: expandEnvToken(a.executable, "annotator.executable"),
      scriptPath: path.resolve(this.baseDir, scriptPath),
      workingDir: path.resolve(this.baseDir, expandEnvToken(a.working_dir, "annotator.working_dir")),
      defaultPattern: a.default_pattern
    };
  }

  limits(): JobLimits {
    const l = this.file.limits;
    return {
      defaultTimeoutSeconds: l.default_timeout_seconds,
      maxTimeoutSeconds: l.max_timeout_seconds,
      killGraceMs: l.kill_grace_ms,
      maxCaptureBytes: l.max_capture_bytes
    };
  }

  snapshot(): GatewayConfigFile {
    return structuredClone(this.file);
  }
}
