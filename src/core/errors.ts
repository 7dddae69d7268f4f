import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

export type FailureKind =
  | "validation"
  | "environment"
  | "process_failure"
  | "timeout"
  | "unknown_tool"
  | "protocol";

export abstract class GatewayError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad or missing argument, unsupported genome build. Raised before any process is launched. */
export class ValidationError extends GatewayError {
  readonly kind = "validation" as const;

  constructor(
    message: string,
    readonly issues: string[] = [message]
  ) {
    super(message);
  }

  static fromIssues(issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>): ValidationError {
    const lines = issues.map((i) => `${i.path.map(String).join(".") || "(arguments)"}: ${i.message}`);
    return new ValidationError(`invalid arguments: ${lines.join("; ")}`, lines);
  }
}

/** External executable or script unavailable or misconfigured. */
export class EnvironmentError extends GatewayError {
  readonly kind = "environment" as const;
}

function describeExit(exitCode: number | null, signal: string | null): string {
  return exitCode === null ? `signal ${signal ?? "unknown"}` : `exit code ${exitCode}`;
}

/** The annotation process ran and exited non-zero. `stderr` is kept verbatim. */
export class ProcessFailure extends GatewayError {
  readonly kind = "process_failure" as const;

  constructor(
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly signal: string | null = null
  ) {
    super(`annotation process failed with ${describeExit(exitCode, signal)}:\n${stderr}`);
  }
}

/** The annotation process did not finish before its deadline and was killed. */
export class TimeoutFailure extends GatewayError {
  readonly kind = "timeout" as const;

  constructor(readonly timeoutSeconds: number) {
    super(`annotation process timed out after ${timeoutSeconds} seconds`);
  }
}

export class UnknownToolError extends GatewayError {
  readonly kind = "unknown_tool" as const;

  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
  }
}

export class ProtocolError extends GatewayError {
  readonly kind = "protocol" as const;

  constructor(
    readonly code: ErrorCode,
    message: string
  ) {
    super(message);
  }
}

export type TaggedFailure =
  | ValidationError
  | EnvironmentError
  | ProcessFailure
  | TimeoutFailure
  | UnknownToolError
  | ProtocolError;

export function isGatewayError(err: unknown): err is TaggedFailure {
  return err instanceof GatewayError;
}

export function errorKindOf(err: unknown): FailureKind | "internal" {
  return isGatewayError(err) ? err.kind : "internal";
}

export function errorMessageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
