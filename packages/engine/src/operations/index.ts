// ──────────────────────────────────────────────
// Scrubline - Operation Dispatch
// ──────────────────────────────────────────────

import type { CleaningOperation, Dataset } from "@scrubline/types";
import { removeDuplicates } from "./duplicates.js";
import { handleMissing } from "./missing-values.js";
import { standardizeText } from "./text.js";
import { normalizeDates } from "./dates.js";
import { removeOutliers } from "./outliers.js";
import { trimWhitespace } from "./whitespace.js";
import { convertTypes } from "./type-conversion.js";
import { removeEmptyRows } from "./empty-rows.js";
import type { OperationContext, OperationOutcome } from "./types.js";

export function applyOperation(
  dataset: Dataset,
  operation: CleaningOperation,
  context: OperationContext
): OperationOutcome {
  switch (operation.kind) {
    case "remove_duplicates":
      return removeDuplicates(dataset, operation, context);
    case "handle_missing":
      return handleMissing(dataset, operation, context);
    case "standardize_text":
      return standardizeText(dataset, operation, context);
    case "normalize_dates":
      return normalizeDates(dataset, operation, context);
    case "remove_outliers":
      return removeOutliers(dataset, operation, context);
    case "trim_whitespace":
      return trimWhitespace(dataset, operation, context);
    case "convert_types":
      return convertTypes(dataset, operation, context);
    case "remove_empty_rows":
      return removeEmptyRows(dataset, operation, context);
    default: {
      const unhandled: never = operation;
      throw new Error(`Unsupported cleaning operation: ${JSON.stringify(unhandled)}`);
    }
  }
}

export {
  removeDuplicates,
  handleMissing,
  standardizeText,
  normalizeDates,
  removeOutliers,
  trimWhitespace,
  convertTypes,
  removeEmptyRows,
};
export type { OperationContext, OperationNote, OperationOutcome } from "./types.js";
