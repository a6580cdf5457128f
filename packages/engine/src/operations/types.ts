// ──────────────────────────────────────────────
// Scrubline - Operation Contracts
// ──────────────────────────────────────────────

import type { Dataset, ScopePolicy } from "@scrubline/types";
import type { ResolvedScope } from "../scope.js";

export interface OperationContext {
  policy: ScopePolicy;
  dateSampleSize: number;
}

export interface OperationNote {
  level: "info" | "warn";
  message: string;
}

export interface OperationOutcome {
  dataset: Dataset;
  summary: string;
  notes: OperationNote[];
}

export function unknownColumnNotes(scope: ResolvedScope): OperationNote[] {
  if (scope.unknownColumns.length === 0) return [];
  return [
    {
      level: "info",
      message: `Ignored columns not in the dataset: ${scope.unknownColumns.join(", ")}`,
    },
  ];
}
