// ──────────────────────────────────────────────
// Scrubline - Cleaning Session
// Caller-owned snapshot + change history for one dataset
// ──────────────────────────────────────────────

import type {
  ChangeLogEntry,
  CleaningOperation,
  CleaningOptions,
  Dataset,
  SummaryComparison,
} from "@scrubline/types";
import { createCorrelationId, createSessionLogger, generateId } from "@scrubline/utils";
import { validateDataset } from "./dataset.js";
import { runCleaningPipeline, type PipelineResult } from "./pipeline.js";
import { compareSummaries } from "./statistics.js";

export interface CleaningSession {
  readonly id: string;
  /** The dataset the session was opened with. */
  readonly original: Dataset;
  readonly current: Dataset;
  readonly history: readonly ChangeLogEntry[];
  apply(operations: readonly CleaningOperation[]): PipelineResult;
  /** Drops the most recent batch; returns false when there is nothing to undo. */
  undo(): boolean;
  reset(): void;
  summary(): SummaryComparison;
}

export function createCleaningSession(
  dataset: Dataset,
  options: CleaningOptions = {}
): CleaningSession {
  validateDataset(dataset);

  const id = generateId();
  const logger = createSessionLogger(id, createCorrelationId());
  const batches: { before: Dataset; entries: ChangeLogEntry[] }[] = [];
  let current = dataset;

  logger.info(
    { rows: dataset.rowIds.length, columns: dataset.columns.length },
    "Cleaning session opened"
  );

  return {
    id,
    original: dataset,
    get current() {
      return current;
    },
    get history() {
      return batches.flatMap((batch) => batch.entries);
    },

    apply(operations) {
      const result = runCleaningPipeline({ dataset: current, operations, options, logger });
      batches.push({ before: current, entries: result.log });
      current = result.dataset;
      return result;
    },

    undo() {
      const last = batches.pop();
      if (!last) return false;
      current = last.before;
      logger.info({ undoneOperations: last.entries.length }, "Undid last batch");
      return true;
    },

    reset() {
      batches.length = 0;
      current = dataset;
      logger.info("Session reset to original dataset");
    },

    summary() {
      return compareSummaries(dataset, current);
    },
  };
}
