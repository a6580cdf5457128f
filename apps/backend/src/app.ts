// ──────────────────────────────────────────────
// Scrubline - Backend App Factory
// ──────────────────────────────────────────────

import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyReply } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import type { ApiErrorCode, ApiErrorResponse } from "@scrubline/types";
import { createLogger, type AppConfig } from "@scrubline/utils";
import { createCleaningService } from "./services/cleaning.service.js";
import { registerCleaningRoutes } from "./routes/cleaning.routes.js";

const logger = createLogger("app");

// Datasets travel inline in request bodies.
const BODY_LIMIT_BYTES = 25 * 1024 * 1024;

function errorCode(statusCode: number): ApiErrorCode {
  if (statusCode === 429) return "RATE_LIMITED";
  if (statusCode === 413) return "PAYLOAD_TOO_LARGE";
  if (statusCode >= 500) return "INTERNAL_ERROR";
  return "BAD_REQUEST";
}

export async function buildApp(config: AppConfig): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: config.logLevel,
      timestamp: true,
    },
    bodyLimit: BODY_LIMIT_BYTES,
  });

  // Plugins
  await app.register(cors, {
    origin: true,
  });

  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.windowMs,
  });

  // Services
  const cleaningService = createCleaningService(config);

  // Routes
  registerCleaningRoutes(app, cleaningService);

  // Health check
  app.get("/api/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Global error handler
  app.setErrorHandler((error: Error & { statusCode?: number }, _request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = error.statusCode ?? 500;
    logger.error({
      message: error.message,
      statusCode,
      stack: config.nodeEnv === "development" ? error.stack : undefined,
    }, "Unhandled error");

    const body: ApiErrorResponse = {
      success: false,
      error: {
        code: errorCode(statusCode),
        message: statusCode >= 500 ? "Internal server error" : error.message,
      },
    };
    return reply.status(statusCode).send(body);
  });

  return app;
}
