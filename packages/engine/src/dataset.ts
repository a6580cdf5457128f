// ──────────────────────────────────────────────
// Scrubline - Dataset Helpers
// Construction, validation and copy-on-write row/column edits
// ──────────────────────────────────────────────

import type {
  CellValue,
  Column,
  ColumnType,
  Dataset,
  DatasetRecord,
} from "@scrubline/types";
import { DatasetShapeError } from "./errors.js";

export type RecordInput = Record<string, CellValue | undefined>;

export interface CreateDatasetOptions {
  /**
   * Column order. Defaults to first-seen key order across records, which follows
   * `Object.keys`: integer-like names such as `"2024"` come first, in ascending
   * order. Pass the order here, or use the columns form, when it matters.
   */
  columns?: string[];
  types?: Record<string, ColumnType>;
  /** Defaults to `0..n-1`. */
  rowIds?: number[];
}

function normalizeCell(value: CellValue | undefined): CellValue {
  if (value === undefined) return null;
  if (typeof value === "number" && Number.isNaN(value)) return null;
  return value;
}

/**
 * Column type from the runtime types of the non-missing values. Strings are
 * never parsed here; a column of numeric-looking strings stays `text`.
 */
export function inferColumnType(values: readonly CellValue[]): ColumnType {
  const kinds = new Set<string>();
  for (const value of values) {
    if (value !== null) kinds.add(typeof value);
  }
  if (kinds.size !== 1) return "mixed";
  if (kinds.has("number")) return "numeric";
  if (kinds.has("boolean")) return "boolean";
  return "text";
}

export function createDataset(
  records: readonly RecordInput[],
  options: CreateDatasetOptions = {}
): Dataset {
  const names: string[] = options.columns ? [...options.columns] : [];
  if (!options.columns) {
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key);
          names.push(key);
        }
      }
    }
  }

  const columns: Column[] = names.map((name) => {
    const values = records.map((record) => normalizeCell(record[name]));
    return {
      name,
      type: options.types?.[name] ?? inferColumnType(values),
      values,
    };
  });

  return {
    rowIds: options.rowIds ? [...options.rowIds] : records.map((_, index) => index),
    columns,
  };
}

export function toRecords(dataset: Dataset): DatasetRecord[] {
  return dataset.rowIds.map((_, position) => {
    const record: DatasetRecord = {};
    for (const column of dataset.columns) {
      record[column.name] = column.values[position] ?? null;
    }
    return record;
  });
}

/** Input-shape check. Anything reported here halts a cleaning run before it starts. */
export function validateDataset(dataset: Dataset): void {
  const problems: string[] = [];

  if (dataset.columns.length === 0) {
    problems.push("dataset has no columns");
  }
  if (dataset.rowIds.length === 0) {
    problems.push("dataset has no rows");
  }

  const names = new Set<string>();
  for (const column of dataset.columns) {
    if (names.has(column.name)) {
      problems.push(`duplicate column name "${column.name}"`);
    }
    names.add(column.name);
    if (column.values.length !== dataset.rowIds.length) {
      problems.push(
        `column "${column.name}" has ${column.values.length} values, expected ${dataset.rowIds.length}`
      );
    }
  }

  if (new Set(dataset.rowIds).size !== dataset.rowIds.length) {
    problems.push("row identifiers are not unique");
  }

  if (problems.length > 0) {
    throw new DatasetShapeError(problems);
  }
}

export function getColumn(dataset: Dataset, name: string): Column | undefined {
  return dataset.columns.find((column) => column.name === name);
}

export function pickRows(dataset: Dataset, positions: readonly number[]): Dataset {
  return {
    rowIds: positions.map((position) => dataset.rowIds[position]!),
    columns: dataset.columns.map((column) => ({
      ...column,
      values: positions.map((position) => column.values[position] ?? null),
    })),
  };
}

export function filterRows(
  dataset: Dataset,
  keep: (position: number) => boolean
): Dataset {
  const positions: number[] = [];
  for (let position = 0; position < dataset.rowIds.length; position++) {
    if (keep(position)) positions.push(position);
  }
  return pickRows(dataset, positions);
}

export function replaceColumns(dataset: Dataset, replacements: ReadonlyMap<string, Column>): Dataset {
  if (replacements.size === 0) return dataset;
  return {
    rowIds: dataset.rowIds,
    columns: dataset.columns.map((column) => replacements.get(column.name) ?? column),
  };
}

export function countMissing(values: readonly CellValue[]): number {
  let missing = 0;
  for (const value of values) {
    if (value === null) missing++;
  }
  return missing;
}
