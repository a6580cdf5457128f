// ──────────────────────────────────────────────
// Scrubline - Missing-Value Handler
// ──────────────────────────────────────────────

import type {
  CellValue,
  Column,
  ColumnType,
  Dataset,
  HandleMissingOperation,
  MissingValueMethod,
} from "@scrubline/types";
import { pluralize } from "@scrubline/utils";
import { filterRows, getColumn, replaceColumns } from "../dataset.js";
import { resolveScope } from "../scope.js";
import { mean, median, mode, numericValues } from "../statistics.js";
import type { OperationContext, OperationNote, OperationOutcome } from "./types.js";
import { unknownColumnNotes } from "./types.js";

type FillMethod = Exclude<MissingValueMethod, "drop">;

interface FillResult {
  values: CellValue[];
  resolved: number;
}

function fillWith(values: readonly CellValue[], fill: CellValue): FillResult {
  if (fill === null) return { values: [...values], resolved: 0 };
  let resolved = 0;
  const filled = values.map((value) => {
    if (value !== null) return value;
    resolved++;
    return fill;
  });
  return { values: filled, resolved };
}

function fillForward(values: readonly CellValue[]): FillResult {
  let resolved = 0;
  let last: CellValue = null;
  const filled = values.map((value) => {
    if (value !== null) {
      last = value;
      return value;
    }
    if (last !== null) resolved++;
    return last;
  });
  return { values: filled, resolved };
}

function fillBackward(values: readonly CellValue[]): FillResult {
  const reversed = fillForward([...values].reverse());
  return { values: reversed.values.reverse(), resolved: reversed.resolved };
}

function valueType(value: Exclude<CellValue, null>): ColumnType {
  switch (typeof value) {
    case "number":
      return "numeric";
    case "boolean":
      return "boolean";
    default:
      return "text";
  }
}

function typeAfterConstant(column: Column, value: Exclude<CellValue, null>): ColumnType {
  const literal = valueType(value);
  if (column.type === literal) return column.type;
  if (column.type === "date" && literal === "text") return column.type;
  if (column.values.every((cell) => cell === null)) return literal;
  return "mixed";
}

function fillColumn(
  column: Column,
  method: FillMethod,
  operation: HandleMissingOperation,
  notes: OperationNote[]
): { column: Column; resolved: number } | null {
  switch (method) {
    case "fill_forward":
    case "fill_backward": {
      const result =
        method === "fill_forward" ? fillForward(column.values) : fillBackward(column.values);
      return { column: { ...column, values: result.values }, resolved: result.resolved };
    }

    case "fill_mean":
    case "fill_median": {
      if (column.type !== "numeric") {
        notes.push({ level: "info", message: `Skipped non-numeric column "${column.name}"` });
        return null;
      }
      const numbers = numericValues(column.values);
      const statistic = method === "fill_mean" ? mean(numbers) : median(numbers);
      if (statistic === null) {
        notes.push({
          level: "info",
          message: `Column "${column.name}" has no values in scope; missing cells left as-is`,
        });
        return null;
      }
      const result = fillWith(column.values, statistic);
      return { column: { ...column, values: result.values }, resolved: result.resolved };
    }

    case "fill_mode": {
      const result = fillWith(column.values, mode(column.values));
      return { column: { ...column, values: result.values }, resolved: result.resolved };
    }

    case "fill_constant": {
      const { value } = operation;
      if (value === undefined) {
        throw new Error("fill_constant requires a value");
      }
      const result = fillWith(column.values, value);
      const type = result.resolved > 0 ? typeAfterConstant(column, value) : column.type;
      return { column: { ...column, type, values: result.values }, resolved: result.resolved };
    }
  }
}

export function handleMissing(
  dataset: Dataset,
  operation: HandleMissingOperation,
  context: OperationContext
): OperationOutcome {
  const scope = resolveScope(dataset, operation.scope, { policy: context.policy });
  const notes = unknownColumnNotes(scope);
  const columns = scope.columns.flatMap((name) => getColumn(scope.subset, name) ?? []);
  const { method } = operation;

  if (method === "drop") {
    const kept = filterRows(scope.subset, (position) =>
      columns.every((column) => column.values[position] !== null)
    );
    const result = scope.merge(kept);
    const removed = dataset.rowIds.length - result.rowIds.length;
    return {
      dataset: result,
      summary: `${pluralize(removed, "row")} with missing values dropped`,
      notes,
    };
  }

  const replacements = new Map<string, Column>();
  let resolved = 0;
  for (const column of columns) {
    const filled = fillColumn(column, method, operation, notes);
    if (!filled) continue;
    replacements.set(column.name, filled.column);
    resolved += filled.resolved;
  }

  return {
    dataset: scope.merge(replaceColumns(scope.subset, replacements)),
    summary: `${pluralize(resolved, "missing cell")} filled (${method})`,
    notes,
  };
}
