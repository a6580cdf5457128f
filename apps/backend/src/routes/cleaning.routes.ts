// ──────────────────────────────────────────────
// Scrubline - Cleaning Routes
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { ApiErrorResponse } from "@scrubline/types";
import { cleanDatasetSchema, summarizeDatasetSchema } from "../validation/schemas.js";
import { ServiceError, type CleaningService } from "../services/cleaning.service.js";

function sendServiceError(reply: FastifyReply, err: ServiceError): FastifyReply {
  const body: ApiErrorResponse = {
    success: false,
    error: { code: err.code, message: err.message },
  };
  return reply.status(err.statusCode).send(body);
}

function validationError(details: unknown): ApiErrorResponse {
  return {
    success: false,
    error: { code: "VALIDATION_ERROR", message: "Invalid input", details },
  };
}

export function registerCleaningRoutes(app: FastifyInstance, cleaningService: CleaningService): void {
  // Profile a dataset without changing it
  app.post("/api/datasets/summary", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = summarizeDatasetSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send(validationError(parsed.error.flatten()));
    }

    try {
      const summary = cleaningService.summarize(parsed.data.dataset);
      return reply.send({ success: true, data: summary });
    } catch (err) {
      if (err instanceof ServiceError) {
        return sendServiceError(reply, err);
      }
      throw err;
    }
  });

  // Run an ordered list of cleaning operations
  app.post("/api/datasets/clean", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = cleanDatasetSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send(validationError(parsed.error.flatten()));
    }

    try {
      const result = cleaningService.clean(parsed.data);
      return reply.send({ success: true, data: result });
    } catch (err) {
      if (err instanceof ServiceError) {
        return sendServiceError(reply, err);
      }
      throw err;
    }
  });
}
