// ──────────────────────────────────────────────
// Scrubline - Whitespace Trimmer
// ──────────────────────────────────────────────

import type { Column, Dataset, TrimWhitespaceOperation } from "@scrubline/types";
import { pluralize } from "@scrubline/utils";
import { getColumn, replaceColumns } from "../dataset.js";
import { resolveScope } from "../scope.js";
import type { OperationContext, OperationOutcome } from "./types.js";
import { unknownColumnNotes } from "./types.js";

export function trimWhitespace(
  dataset: Dataset,
  operation: TrimWhitespaceOperation,
  context: OperationContext
): OperationOutcome {
  const scope = resolveScope(dataset, operation.scope, { policy: context.policy });

  const replacements = new Map<string, Column>();
  let trimmed = 0;

  for (const name of scope.columns) {
    const column = getColumn(scope.subset, name);
    if (!column) continue;
    const values = column.values.map((value) => {
      if (typeof value !== "string") return value;
      const next = value.trim();
      if (next !== value) trimmed++;
      return next;
    });
    replacements.set(name, { ...column, values });
  }

  return {
    dataset: scope.merge(replaceColumns(scope.subset, replacements)),
    summary: `${pluralize(trimmed, "cell")} trimmed`,
    notes: unknownColumnNotes(scope),
  };
}
