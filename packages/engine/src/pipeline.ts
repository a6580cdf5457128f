// ──────────────────────────────────────────────
// Scrubline - Cleaning Pipeline
// Pure domain logic, no HTTP or framework deps
// ──────────────────────────────────────────────

import type {
  ChangeLogEntry,
  CleaningOperation,
  CleaningOptions,
  Dataset,
  SummaryComparison,
} from "@scrubline/types";
import {
  createLogger,
  measureDuration,
  sanitizeErrorMessage,
  startTimer,
  type Logger,
} from "@scrubline/utils";
import { validateDataset } from "./dataset.js";
import { applyOperation } from "./operations/index.js";
import type { OperationContext } from "./operations/index.js";
import { compareSummaries } from "./statistics.js";

export const DEFAULT_DATE_SAMPLE_SIZE = 100;

export interface PipelineResult {
  dataset: Dataset;
  log: ChangeLogEntry[];
  summary: SummaryComparison;
}

export interface PipelineParams {
  dataset: Dataset;
  operations: readonly CleaningOperation[];
  options?: CleaningOptions;
  logger?: Logger;
}

/**
 * Applies operations strictly in order, each one seeing the previous one's
 * output. A failing operation leaves the dataset as it was and gets a
 * `failed` entry; only an invalid input dataset aborts the run.
 */
export function runCleaningPipeline(params: PipelineParams): PipelineResult {
  const { dataset, operations, options = {} } = params;
  const logger = params.logger ?? createLogger("cleaning-pipeline");

  validateDataset(dataset);

  const context: OperationContext = {
    policy: options.scopePolicy ?? "permissive",
    dateSampleSize: options.dateSampleSize ?? DEFAULT_DATE_SAMPLE_SIZE,
  };
  const runTimer = startTimer();

  logger.info(
    {
      rows: dataset.rowIds.length,
      columns: dataset.columns.length,
      operationCount: operations.length,
      scopePolicy: context.policy,
    },
    "Cleaning run started"
  );

  let current = dataset;
  const log: ChangeLogEntry[] = [];

  operations.forEach((operation, index) => {
    const timer = startTimer();
    const rowsBefore = current.rowIds.length;
    logger.debug({ step: index + 1, operation: operation.kind }, "Applying operation");

    try {
      const outcome = applyOperation(current, operation, context);

      for (const note of outcome.notes) {
        const data = { step: index + 1, operation: operation.kind };
        if (note.level === "warn") {
          logger.warn(data, note.message);
        } else {
          logger.info(data, note.message);
        }
      }

      current = outcome.dataset;
      log.push({
        operation: operation.kind,
        summary: outcome.summary,
        rowsBefore,
        rowsAfter: current.rowIds.length,
        status: "applied",
        notes: outcome.notes.map((note) => note.message),
        durationMs: measureDuration(timer),
      });
    } catch (err) {
      const message = sanitizeErrorMessage(err);
      logger.warn({ step: index + 1, operation: operation.kind, error: message }, "Operation failed");
      log.push({
        operation: operation.kind,
        summary: `Failed: ${message}`,
        rowsBefore,
        rowsAfter: rowsBefore,
        status: "failed",
        notes: [],
        durationMs: measureDuration(timer),
      });
    }
  });

  logger.info(
    {
      rowsBefore: dataset.rowIds.length,
      rowsAfter: current.rowIds.length,
      failed: log.filter((entry) => entry.status === "failed").length,
      durationMs: measureDuration(runTimer),
    },
    "Cleaning run finished"
  );

  return {
    dataset: current,
    log,
    summary: compareSummaries(dataset, current),
  };
}
