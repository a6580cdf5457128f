// ──────────────────────────────────────────────
// Scrubline - Duplicate Remover
// ──────────────────────────────────────────────

import type { Column, Dataset, RemoveDuplicatesOperation } from "@scrubline/types";
import { pluralize } from "@scrubline/utils";
import { filterRows, getColumn } from "../dataset.js";
import { resolveScope } from "../scope.js";
import type { OperationContext, OperationOutcome } from "./types.js";
import { unknownColumnNotes } from "./types.js";

export function removeDuplicates(
  dataset: Dataset,
  operation: RemoveDuplicatesOperation,
  context: OperationContext
): OperationOutcome {
  const scope = resolveScope(dataset, operation.scope, { policy: context.policy });
  const { subset } = scope;

  // The column scope is the equality key; an empty key means every column
  const keyColumns: Column[] =
    scope.columns.length > 0
      ? scope.columns.flatMap((name) => getColumn(subset, name) ?? [])
      : [...subset.columns];

  const seen = new Set<string>();
  const deduplicated = filterRows(subset, (position) => {
    const key = JSON.stringify(keyColumns.map((column) => column.values[position] ?? null));
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const result = scope.merge(deduplicated);
  const removed = dataset.rowIds.length - result.rowIds.length;

  return {
    dataset: result,
    summary: `${pluralize(removed, "duplicate row")} removed`,
    notes: unknownColumnNotes(scope),
  };
}
