// ──────────────────────────────────────────────
// Scrubline - Type Converter
// Cells that fail coercion become missing; a failing column
// never stops the rest of the batch
// ──────────────────────────────────────────────

import type {
  CellValue,
  Column,
  ConversionTarget,
  ConvertTypesOperation,
  Dataset,
} from "@scrubline/types";
import { pluralize } from "@scrubline/utils";
import { getColumn, replaceColumns } from "../dataset.js";
import { formatDate, parseDate } from "../date-format.js";
import { resolveScope } from "../scope.js";
import { DEFAULT_DATE_FORMAT } from "./dates.js";
import type { OperationContext, OperationNote, OperationOutcome } from "./types.js";
import { unknownColumnNotes } from "./types.js";

const NUMBER_PATTERN = /^[+-]?(?:\d{1,3}(?:,\d{3})+|\d+)?(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const TRUE_WORDS = new Set(["true", "yes", "y", "1"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0"]);

/** `undefined` means the value could not be coerced. */
export function convertValue(
  value: Exclude<CellValue, null>,
  to: ConversionTarget
): Exclude<CellValue, null> | undefined {
  switch (to) {
    case "text":
      return String(value);

    case "numeric": {
      if (typeof value === "number") return value;
      if (typeof value === "boolean") return value ? 1 : 0;
      const trimmed = value.trim();
      if (!/\d/.test(trimmed) || !NUMBER_PATTERN.test(trimmed)) return undefined;
      const parsed = Number(trimmed.replace(/,/g, ""));
      return Number.isFinite(parsed) ? parsed : undefined;
    }

    case "boolean": {
      if (typeof value === "boolean") return value;
      if (typeof value === "number") {
        if (value === 1) return true;
        if (value === 0) return false;
        return undefined;
      }
      const lowered = value.trim().toLowerCase();
      if (TRUE_WORDS.has(lowered)) return true;
      if (FALSE_WORDS.has(lowered)) return false;
      return undefined;
    }

    case "date": {
      if (typeof value !== "string") return undefined;
      const parts = parseDate(value);
      return parts ? formatDate(parts, DEFAULT_DATE_FORMAT) : undefined;
    }
  }
}

export function convertTypes(
  dataset: Dataset,
  operation: ConvertTypesOperation,
  context: OperationContext
): OperationOutcome {
  const scope = resolveScope(
    dataset,
    { columns: operation.conversions.map((conversion) => conversion.column), rows: operation.scope?.rows },
    { policy: context.policy }
  );
  const notes: OperationNote[] = unknownColumnNotes(scope);
  if (operation.scope?.columns !== undefined && operation.scope.columns !== "all") {
    notes.push({ level: "info", message: "Column scope is taken from the conversions list" });
  }

  const replacements = new Map<string, Column>();
  let failedCells = 0;

  for (const { column: name, to } of operation.conversions) {
    const column = getColumn(scope.subset, name);
    if (!column) continue;

    let failures = 0;
    const values = column.values.map((value): CellValue => {
      if (value === null) return null;
      const converted = convertValue(value, to);
      if (converted === undefined) {
        failures++;
        return null;
      }
      return converted;
    });

    if (failures > 0) {
      notes.push({
        level: "warn",
        message: `Column "${name}": ${pluralize(failures, "value")} set to missing (not convertible to ${to})`,
      });
    }
    failedCells += failures;
    replacements.set(name, { name, type: to, values });
  }

  return {
    dataset: scope.merge(replaceColumns(scope.subset, replacements)),
    summary: `${pluralize(replacements.size, "column")} converted, ${pluralize(failedCells, "cell")} set to missing`,
    notes,
  };
}
