// ──────────────────────────────────────────────
// Scrubline - Outlier Remover
// Bounds are computed once from the untouched in-scope values,
// then applied in a single row-removal pass
// ──────────────────────────────────────────────

import type { Column, Dataset, OutlierMethod, RemoveOutliersOperation } from "@scrubline/types";
import { pluralize } from "@scrubline/utils";
import { filterRows, getColumn } from "../dataset.js";
import { resolveScope } from "../scope.js";
import { mean, numericValues, populationStdDev, quantile } from "../statistics.js";
import type { OperationContext, OperationNote, OperationOutcome } from "./types.js";
import { unknownColumnNotes } from "./types.js";

export const DEFAULT_IQR_MULTIPLIER = 1.5;
export const DEFAULT_ZSCORE_THRESHOLD = 3;

export interface OutlierBounds {
  column: string;
  lower: number;
  upper: number;
}

export function computeBounds(
  column: Column,
  method: OutlierMethod,
  threshold: number
): OutlierBounds | null {
  const numbers = numericValues(column.values);

  if (method === "iqr") {
    const q1 = quantile(numbers, 0.25);
    const q3 = quantile(numbers, 0.75);
    if (q1 === null || q3 === null) return null;
    const iqr = q3 - q1;
    return { column: column.name, lower: q1 - threshold * iqr, upper: q3 + threshold * iqr };
  }

  const avg = mean(numbers);
  const stdDev = populationStdDev(numbers);
  if (avg === null || stdDev === null || stdDev === 0) return null;
  return { column: column.name, lower: avg - threshold * stdDev, upper: avg + threshold * stdDev };
}

export function removeOutliers(
  dataset: Dataset,
  operation: RemoveOutliersOperation,
  context: OperationContext
): OperationOutcome {
  const threshold =
    operation.threshold ??
    (operation.method === "iqr" ? DEFAULT_IQR_MULTIPLIER : DEFAULT_ZSCORE_THRESHOLD);
  if (!(threshold > 0)) {
    throw new Error(`Outlier threshold must be positive, got ${threshold}`);
  }

  const scope = resolveScope(dataset, operation.scope, {
    policy: context.policy,
    defaultColumns: (column) => column.type === "numeric",
  });
  const notes: OperationNote[] = unknownColumnNotes(scope);

  const checks: { values: Column["values"]; bounds: OutlierBounds }[] = [];
  for (const name of scope.columns) {
    const column = getColumn(scope.subset, name);
    if (!column) continue;
    if (column.type !== "numeric") {
      notes.push({ level: "info", message: `Skipped non-numeric column "${name}"` });
      continue;
    }
    const bounds = computeBounds(column, operation.method, threshold);
    if (!bounds) {
      notes.push({ level: "info", message: `Column "${name}" has no spread to measure outliers against` });
      continue;
    }
    checks.push({ values: column.values, bounds });
  }

  // zscore: |z| > t is the same as falling outside mean ± t·σ
  const kept = filterRows(scope.subset, (position) =>
    checks.every(({ values, bounds }) => {
      const value = values[position];
      if (typeof value !== "number") return true;
      return value >= bounds.lower && value <= bounds.upper;
    })
  );

  const result = scope.merge(kept);
  const removed = dataset.rowIds.length - result.rowIds.length;

  return {
    dataset: result,
    summary: `${pluralize(removed, "outlier row")} removed (${operation.method})`,
    notes,
  };
}
