// ──────────────────────────────────────────────
// Scrubline - Cleaning Service
// ──────────────────────────────────────────────

import type {
  ApiErrorCode,
  ChangeLogEntry,
  Column,
  Dataset,
  DatasetRecord,
  DatasetSummary,
  SummaryComparison,
} from "@scrubline/types";
import {
  DatasetShapeError,
  createDataset,
  inferColumnType,
  runCleaningPipeline,
  summarizeDataset,
  toRecords,
  validateDataset,
} from "@scrubline/engine";
import { createLogger, type AppConfig } from "@scrubline/utils";
import type { CleanDatasetInput, DatasetInput } from "../validation/schemas.js";

const logger = createLogger("cleaning-service");

export interface CleanResponse {
  dataset: Dataset;
  records: DatasetRecord[];
  log: ChangeLogEntry[];
  summary: SummaryComparison;
}

export interface CleaningService {
  summarize(input: DatasetInput): DatasetSummary;
  clean(input: CleanDatasetInput): CleanResponse;
}

export class ServiceError extends Error {
  readonly code: ApiErrorCode;
  readonly statusCode: number;

  constructor(message: string, code: ApiErrorCode, statusCode: number) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export function toDataset(input: DatasetInput): Dataset {
  if ("records" in input) {
    return createDataset(input.records, { columns: input.columns, types: input.types });
  }

  const columns: Column[] = input.columns.map((column) => ({
    name: column.name,
    type: column.type ?? inferColumnType(column.values),
    values: column.values,
  }));
  const length = input.columns[0]?.values.length ?? 0;

  return {
    rowIds: input.rowIds ?? Array.from({ length }, (_, index) => index),
    columns,
  };
}

export function createCleaningService(config: AppConfig): CleaningService {
  function enforceQuota(dataset: Dataset, operationCount: number): void {
    const { maxRows, maxColumns, maxOperations } = config.quota;
    if (dataset.rowIds.length > maxRows) {
      throw new ServiceError(
        `Dataset has ${dataset.rowIds.length} rows; the limit is ${maxRows}`,
        "QUOTA_EXCEEDED",
        413
      );
    }
    if (dataset.columns.length > maxColumns) {
      throw new ServiceError(
        `Dataset has ${dataset.columns.length} columns; the limit is ${maxColumns}`,
        "QUOTA_EXCEEDED",
        413
      );
    }
    if (operationCount > maxOperations) {
      throw new ServiceError(
        `Request has ${operationCount} operations; the limit is ${maxOperations}`,
        "QUOTA_EXCEEDED",
        413
      );
    }
  }

  function loadDataset(input: DatasetInput, operationCount: number): Dataset {
    const dataset = toDataset(input);
    enforceQuota(dataset, operationCount);
    try {
      validateDataset(dataset);
    } catch (err) {
      if (err instanceof DatasetShapeError) {
        throw new ServiceError(err.message, err.code, 422);
      }
      throw err;
    }
    return dataset;
  }

  return {
    summarize(input) {
      const dataset = loadDataset(input, 0);
      return summarizeDataset(dataset);
    },

    clean(input) {
      const dataset = loadDataset(input.dataset, input.operations.length);
      logger.info(
        {
          rows: dataset.rowIds.length,
          columns: dataset.columns.length,
          operations: input.operations.map((operation) => operation.kind),
        },
        "Cleaning request received"
      );

      const result = runCleaningPipeline({
        dataset,
        operations: input.operations,
        options: {
          scopePolicy: input.options?.scopePolicy ?? config.cleaning.scopePolicy,
          dateSampleSize: input.options?.dateSampleSize ?? config.cleaning.dateSampleSize,
        },
      });

      return {
        dataset: result.dataset,
        records: toRecords(result.dataset),
        log: result.log,
        summary: result.summary,
      };
    },
  };
}
