#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { GatewayConfig, type ConfigOverrides } from "./config/config.js";
import { errorKindOf, errorMessageOf } from "./core/errors.js";
import { AnnotationSupervisor } from "./execution/supervisor.js";
import { GenomeRegistry } from "./genomes/genomeRegistry.js";
import { createLogger, isLogLevel } from "./logging/logger.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { createToolRegistry } from "./toolpacks/register.js";
import { LineTransportLoop } from "./transport/lineLoop.js";

const GATEWAY_VERSION = "0.1.0";

function overridesFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const transport = env.GATEWAY_TRANSPORT?.trim();
  if (transport) {
    if (transport !== "mcp" && transport !== "line") {
      throw new Error(`GATEWAY_TRANSPORT must be "mcp" or "line" (got ${transport})`);
    }
    overrides.transport = transport;
  }
  const scriptPath = env.ANNOTATOR_SCRIPT?.trim();
  if (scriptPath) overrides.scriptPath = scriptPath;
  const level = env.LOG_LEVEL?.trim();
  if (level) {
    if (!isLogLevel(level)) throw new Error(`LOG_LEVEL is not a log level: ${level}`);
    overrides.logLevel = level;
  }
  return overrides;
}

async function main(): Promise<void> {
  const configPath = process.env.GATEWAY_CONFIG_PATH ?? "config/default.config.yaml";
  const config = await GatewayConfig.loadFromFile(configPath, overridesFromEnv(process.env));
  const logger = createLogger({ level: config.logLevel(), name: config.serverName() });
  logger.debug({ config_path: configPath, config: config.snapshot() }, "config loaded");

  const annotator = config.annotator();
  const limits = config.limits();
  const supervisor = new AnnotationSupervisor({ annotator, limits, logger });

  // Fatal when missing: no tool call is served without a working annotation environment.
  await supervisor.probeEnvironment();

  const registry = createToolRegistry({
    genomes: new GenomeRegistry(),
    supervisor,
    limits,
    defaultPattern: annotator.defaultPattern,
    workingDir: annotator.workingDir,
    logger
  });

  if (config.transport() === "line") {
    const loop = new LineTransportLoop({ input: process.stdin, output: process.stdout, registry, logger });
    await loop.run();
    return;
  }

  const server = createGatewayServer({ registry, name: config.serverName(), version: GATEWAY_VERSION });
  await server.connect(new StdioServerTransport());
  logger.info({ tools: registry.list().map((t) => t.name) }, "gateway ready");
}

main().catch((err: unknown) => {
  createLogger().fatal({ kind: errorKindOf(err), err: errorMessageOf(err) }, "gateway failed to start");
  process.exitCode = 1;
});
