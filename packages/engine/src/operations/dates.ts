// ──────────────────────────────────────────────
// Scrubline - Date Normalizer
// ──────────────────────────────────────────────

import type { CellValue, Column, Dataset, NormalizeDatesOperation } from "@scrubline/types";
import { pluralize } from "@scrubline/utils";
import { getColumn, replaceColumns } from "../dataset.js";
import { formatDate, isLikelyDateColumn, parseDate } from "../date-format.js";
import { resolveScope } from "../scope.js";
import type { OperationContext, OperationNote, OperationOutcome } from "./types.js";
import { unknownColumnNotes } from "./types.js";

export const DEFAULT_DATE_FORMAT = "%Y-%m-%d";

export function normalizeDateCell(value: CellValue, format: string): CellValue {
  if (value === null) return null;
  if (typeof value !== "string") return null;
  const parts = parseDate(value);
  return parts ? formatDate(parts, format) : null;
}

export function normalizeDates(
  dataset: Dataset,
  operation: NormalizeDatesOperation,
  context: OperationContext
): OperationOutcome {
  const format = operation.format ?? DEFAULT_DATE_FORMAT;
  const scope = resolveScope(dataset, operation.scope, {
    policy: context.policy,
    defaultColumns: (column) => isLikelyDateColumn(column, context.dateSampleSize),
  });
  const notes: OperationNote[] = unknownColumnNotes(scope);

  if (!scope.explicitColumns && scope.columns.length === 0) {
    notes.push({ level: "info", message: "No date-like columns detected" });
  }

  const replacements = new Map<string, Column>();
  let normalized = 0;
  let failed = 0;

  for (const name of scope.columns) {
    const column = getColumn(scope.subset, name);
    if (!column) continue;
    if (column.type === "numeric" || column.type === "boolean") {
      notes.push({ level: "info", message: `Skipped ${column.type} column "${name}"` });
      continue;
    }

    let columnFailures = 0;
    const values = column.values.map((value) => {
      if (value === null) return null;
      const result = normalizeDateCell(value, format);
      if (result === null) {
        columnFailures++;
      } else {
        normalized++;
      }
      return result;
    });

    if (columnFailures > 0) {
      notes.push({
        level: "warn",
        message: `Column "${name}": ${pluralize(columnFailures, "value")} set to missing (not parseable as a date)`,
      });
    }
    failed += columnFailures;
    replacements.set(name, { name, type: "date", values });
  }

  return {
    dataset: scope.merge(replaceColumns(scope.subset, replacements)),
    summary: `${pluralize(normalized, "date cell")} normalized to "${format}", ${failed} unparseable set to missing`,
    notes,
  };
}
