#!/usr/bin/env node
import { loadConfig } from "./config";
import { buildGateway } from "./gateway";
import { closeServer, startServer } from "./server/node-adapter";
import { createRuntimeFromEnv } from "./utils/runtime";
import { errorMessage } from "./utils/error";
import { createLogger, envLogLevel } from "./utils/logger";

async function main(): Promise<void> {
  const { cwd, env } = createRuntimeFromEnv();
  const config = await loadConfig({ cwd, env, logger: createLogger(envLogLevel(env)) });
  const logger = createLogger(config.logLevel);

  const { gateway } = buildGateway(config, { logger });
  const server = await startServer(gateway, { host: config.host, port: config.port }, logger);
  logger.info("Gateway ready", {
    upstream: config.upstream.baseUrl,
    cacheTtlSeconds: config.cache.ttlSeconds,
    maxAttempts: config.upstream.maxAttempts,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    closeServer(server).catch((e: unknown) => {
      logger.error("Error while closing server", { error: errorMessage(e) });
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((e: unknown) => {
  // eslint-disable-next-line no-console
  console.error(e instanceof Error && e.stack ? e.stack : String(e));
  process.exitCode = 1;
});
