// ──────────────────────────────────────────────
// Scrubline - Statistics
// ──────────────────────────────────────────────

import type {
  CellValue,
  ColumnSummary,
  Dataset,
  DatasetSummary,
  SummaryComparison,
} from "@scrubline/types";
import { countMissing } from "./dataset.js";

export function numericValues(values: readonly CellValue[]): number[] {
  const numbers: number[] = [];
  for (const value of values) {
    if (typeof value === "number" && Number.isFinite(value)) numbers.push(value);
  }
  return numbers;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
}

/** Linear interpolation between closest ranks, `q` in [0, 1]. */
export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower]!;
  const upperValue = sorted[upper]!;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

export function median(values: readonly number[]): number | null {
  return quantile(values, 0.5);
}

export function populationStdDev(values: readonly number[]): number | null {
  const avg = mean(values);
  if (avg === null) return null;
  let squares = 0;
  for (const value of values) squares += (value - avg) ** 2;
  return Math.sqrt(squares / values.length);
}

function typeRank(value: Exclude<CellValue, null>): number {
  switch (typeof value) {
    case "number":
      return 0;
    case "string":
      return 1;
    default:
      return 2;
  }
}

/** Total order over non-missing cells: numbers, then strings, then booleans. */
export function compareCells(a: Exclude<CellValue, null>, b: Exclude<CellValue, null>): number {
  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) return rankDiff;
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Most frequent non-missing value; ties go to the smallest by `compareCells`. */
export function mode(values: readonly CellValue[]): Exclude<CellValue, null> | null {
  const counts = new Map<Exclude<CellValue, null>, number>();
  for (const value of values) {
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: Exclude<CellValue, null> | null = null;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (
      count > bestCount ||
      (count === bestCount && best !== null && compareCells(value, best) < 0)
    ) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export function summarizeDataset(dataset: Dataset): DatasetSummary {
  const columnSummaries: ColumnSummary[] = dataset.columns.map((column) => ({
    name: column.name,
    type: column.type,
    missing: countMissing(column.values),
    distinct: new Set(column.values.filter((value) => value !== null)).size,
  }));

  return {
    rows: dataset.rowIds.length,
    columns: dataset.columns.length,
    missingCells: columnSummaries.reduce((total, column) => total + column.missing, 0),
    columnSummaries,
  };
}

export function compareSummaries(before: Dataset, after: Dataset): SummaryComparison {
  const beforeSummary = summarizeDataset(before);
  const afterSummary = summarizeDataset(after);
  return {
    before: beforeSummary,
    after: afterSummary,
    rowsRemoved: beforeSummary.rows - afterSummary.rows,
    missingCellsDelta: afterSummary.missingCells - beforeSummary.missingCells,
  };
}
