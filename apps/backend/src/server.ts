// ──────────────────────────────────────────────
// Scrubline - Backend API Server
// ──────────────────────────────────────────────

import { loadConfig, createLogger } from "@scrubline/utils";
import { buildApp } from "./app.js";

const logger = createLogger("server");

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const app = await buildApp(config);

  // Start server
  try {
    await app.listen({ port: config.backend.port, host: config.backend.host });
    logger.info({
      port: config.backend.port,
      environment: config.nodeEnv,
      scopePolicy: config.cleaning.scopePolicy,
    }, "Scrubline API started");
  } catch (err) {
    logger.error({ error: err }, "Failed to start server");
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutdown signal received");
    await app.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ error: err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

bootstrap().catch((err) => {
  logger.error({ error: err }, "Bootstrap failed");
  process.exit(1);
});
