// ──────────────────────────────────────────────
// Scrubline - Empty-Row Remover
// ──────────────────────────────────────────────

import type { Dataset, RemoveEmptyRowsOperation } from "@scrubline/types";
import { pluralize } from "@scrubline/utils";
import { filterRows } from "../dataset.js";
import { resolveScope } from "../scope.js";
import type { OperationContext, OperationNote, OperationOutcome } from "./types.js";

export function removeEmptyRows(
  dataset: Dataset,
  operation: RemoveEmptyRowsOperation,
  context: OperationContext
): OperationOutcome {
  // Whole-row decision: every column counts, whatever the column scope says
  const scope = resolveScope(dataset, { rows: operation.scope?.rows }, { policy: context.policy });
  const notes: OperationNote[] = [];
  if (operation.scope?.columns !== undefined && operation.scope.columns !== "all") {
    notes.push({ level: "info", message: "Column scope does not apply to empty-row removal" });
  }

  const { subset } = scope;
  const kept = filterRows(subset, (position) =>
    subset.columns.some((column) => (column.values[position] ?? null) !== null)
  );

  const result = scope.merge(kept);
  const removed = dataset.rowIds.length - result.rowIds.length;

  return {
    dataset: result,
    summary: `${pluralize(removed, "empty row")} removed`,
    notes,
  };
}
