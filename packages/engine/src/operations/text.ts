// ──────────────────────────────────────────────
// Scrubline - Text Standardizer
// ──────────────────────────────────────────────

import type { Column, Dataset, StandardizeTextOperation, TextStep } from "@scrubline/types";
import { pluralize } from "@scrubline/utils";
import { getColumn, replaceColumns } from "../dataset.js";
import { resolveScope } from "../scope.js";
import type { OperationContext, OperationNote, OperationOutcome } from "./types.js";
import { unknownColumnNotes } from "./types.js";

const NON_TEXT_TYPES = new Set(["numeric", "date", "boolean"]);

export function applyTextStep(value: string, step: TextStep): string {
  switch (step) {
    case "lowercase":
      return value.toLowerCase();
    case "uppercase":
      return value.toUpperCase();
    case "titlecase":
      return value.replace(
        /[\p{L}\p{N}]\S*/gu,
        (word) => {
          const [first = "", ...rest] = word;
          return first.toUpperCase() + rest.join("").toLowerCase();
        }
      );
    case "trim":
      return value.trim();
    case "strip_special_characters":
      return value.replace(/[^\p{L}\p{N}\s]/gu, "");
  }
}

export function standardizeText(
  dataset: Dataset,
  operation: StandardizeTextOperation,
  context: OperationContext
): OperationOutcome {
  const scope = resolveScope(dataset, operation.scope, {
    policy: context.policy,
    defaultColumns: (column) => column.type === "text",
  });
  const notes: OperationNote[] = unknownColumnNotes(scope);

  const replacements = new Map<string, Column>();
  let changed = 0;

  for (const name of scope.columns) {
    const column = getColumn(scope.subset, name);
    if (!column) continue;
    if (NON_TEXT_TYPES.has(column.type)) {
      notes.push({ level: "info", message: `Skipped ${column.type} column "${name}"` });
      continue;
    }

    const values = column.values.map((value) => {
      if (typeof value !== "string") return value;
      const standardized = operation.steps.reduce(applyTextStep, value);
      if (standardized !== value) changed++;
      return standardized;
    });
    replacements.set(name, { ...column, values });
  }

  return {
    dataset: scope.merge(replaceColumns(scope.subset, replacements)),
    summary: `${pluralize(changed, "text cell")} standardized (${operation.steps.join(", ") || "no steps"})`,
    notes,
  };
}
