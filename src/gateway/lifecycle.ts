import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { TicketDeskConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { createRuntime, type Runtime } from "./runtime.js";
import { GatewayServer } from "./server.js";

export interface GatewayContext {
  config: TicketDeskConfig;
  logger: Logger;
  runtime: Runtime;
  server: GatewayServer;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startGateway(configPath?: string): Promise<GatewayContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting ticket desk gateway...");

  // 3. Ensure state directory
  const stateDir = ensureDir(getStateDir());

  // 4. Wire catalog, tools and pipeline
  const runtime = createRuntime(config, logger, stateDir);

  // 5. Start HTTP server
  const server = new GatewayServer(
    {
      conversations: runtime.conversations,
      enquiries: runtime.enquiries,
      notifications: runtime.notifications,
      catalog: runtime.catalog,
      logger,
    },
    config.gateway.port,
    config.gateway.hostname,
  );
  await server.start();
  logger.info({ port: config.gateway.port, hostname: config.gateway.hostname }, "Gateway listening");

  // 6. Graceful shutdown (use 'once' to avoid handler accumulation)
  let shutdownInProgress = false;
  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await server.stop();
    runtime.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  process.once("SIGTERM", () => void shutdown());
  process.once("SIGINT", () => void shutdown());

  logger.info("Ticket desk gateway started");
  return { config, logger, runtime, server };
}
