import readline from "readline";
import type { Readable, Writable } from "stream";
import type { Logger } from "pino";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { ProtocolError, errorMessageOf } from "../core/errors.js";
import type { ToolRegistry } from "../toolpacks/registry.js";

export type LoopState = "awaiting_request" | "processing" | "closed";

type RequestId = string | number | null;

interface LineRequest {
  id?: RequestId;
  method: string;
  params?: unknown;
}

export type LineResponse = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRequestId(value: unknown): value is RequestId {
  return value === null || typeof value === "string" || typeof value === "number";
}

export function parseRequest(line: string): LineRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line) as unknown;
  } catch (err) {
    throw new ProtocolError(ErrorCode.ParseError, `Parse error: ${errorMessageOf(err)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ProtocolError(ErrorCode.InvalidRequest, "Invalid request: expected a JSON object");
  }
  const { id, method, params } = parsed;
  if (typeof method !== "string") {
    throw new ProtocolError(ErrorCode.InvalidRequest, "Invalid request: method must be a string");
  }
  if (id === undefined) return { method, params };
  if (!isRequestId(id)) {
    throw new ProtocolError(ErrorCode.InvalidRequest, "Invalid request: id must be a string, number or null");
  }
  return { id, method, params };
}

function requestIdOf(line: string): RequestId | undefined {
  try {
    const parsed = JSON.parse(line) as unknown;
    return isPlainObject(parsed) && isRequestId(parsed.id) ? parsed.id : undefined;
  } catch {
    return undefined;
  }
}

/**
 * One request per input line, one response per output line. Requests are handled strictly in
 * order; a bad line is answered with an error and the loop keeps reading. Only end of input
 * ends the loop.
 */
export class LineTransportLoop {
  private current: LoopState = "awaiting_request";
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      input: Readable;
      output: Writable;
      registry: ToolRegistry;
      logger: Logger;
    }
  ) {
    this.log = deps.logger.child({ component: "line-transport" });
  }

  get state(): LoopState {
    return this.current;
  }

  async run(): Promise<void> {
    const rl = readline.createInterface({ input: this.deps.input, crlfDelay: Infinity, terminal: false });
    this.log.info("line transport ready");
    try {
      for await (const line of rl) {
        if (line.trim().length === 0) continue;
        this.current = "processing";
        const response = await this.handleLine(line);
        await this.write(response);
        this.current = "awaiting_request";
      }
    } finally {
      rl.close();
      this.current = "closed";
      this.log.info("line transport closed");
    }
  }

  async handleLine(line: string): Promise<LineResponse> {
    try {
      const request = parseRequest(line);
      const result = await this.route(request);
      return request.id === undefined ? result : { id: request.id, ...result };
    } catch (err) {
      const code = err instanceof ProtocolError ? err.code : ErrorCode.InternalError;
      if (!(err instanceof ProtocolError)) this.log.error({ err: errorMessageOf(err) }, "request handling failed");
      const id = requestIdOf(line);
      const error = { error: { code, message: errorMessageOf(err) } };
      return id === undefined ? error : { id, ...error };
    }
  }

  private async route(request: LineRequest): Promise<LineResponse> {
    switch (request.method) {
      case "tools/list":
        return { tools: this.deps.registry.list() };
      case "tools/call": {
        const params = request.params;
        if (!isPlainObject(params) || typeof params.name !== "string") {
          throw new ProtocolError(ErrorCode.InvalidParams, "Invalid params: tools/call requires params.name");
        }
        const response = await this.deps.registry.dispatch(params.name, params.arguments ?? {});
        return { ...response };
      }
      default:
        throw new ProtocolError(ErrorCode.MethodNotFound, `Unknown method: ${request.method}`);
    }
  }

  private write(response: LineResponse): Promise<void> {
    const line = `${JSON.stringify(response)}\n`;
    return new Promise((resolve, reject) => {
      this.deps.output.write(line, (err) => (err ? reject(err) : resolve()));
    });
  }
}
