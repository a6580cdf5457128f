// ──────────────────────────────────────────────
// Scrubline - Cleaning Types
// ──────────────────────────────────────────────

import type { CellValue, RowId } from "./dataset.js";

// ── Scope ─────────────────────────────────────

export type ColumnScope = "all" | readonly string[];

export type RowScope =
  | "all"
  | { readonly ids: readonly RowId[] }
  | { readonly range: { readonly start: number; readonly end: number } };

export interface OperationScope {
  columns?: ColumnScope;
  rows?: RowScope;
}

export const SCOPE_POLICIES = ["permissive", "strict"] as const;

export type ScopePolicy = (typeof SCOPE_POLICIES)[number];

// ── Operations ────────────────────────────────

export const MISSING_VALUE_METHODS = [
  "drop",
  "fill_forward",
  "fill_backward",
  "fill_mean",
  "fill_median",
  "fill_mode",
  "fill_constant",
] as const;

export type MissingValueMethod = (typeof MISSING_VALUE_METHODS)[number];

export const TEXT_STEPS = [
  "lowercase",
  "uppercase",
  "titlecase",
  "trim",
  "strip_special_characters",
] as const;

export type TextStep = (typeof TEXT_STEPS)[number];

export const OUTLIER_METHODS = ["iqr", "zscore"] as const;

export type OutlierMethod = (typeof OUTLIER_METHODS)[number];

export const CONVERSION_TARGETS = ["numeric", "text", "date", "boolean"] as const;

export type ConversionTarget = (typeof CONVERSION_TARGETS)[number];

export interface ColumnConversion {
  column: string;
  to: ConversionTarget;
}

interface ScopedOperation {
  scope?: OperationScope;
}

export interface RemoveDuplicatesOperation extends ScopedOperation {
  kind: "remove_duplicates";
}

export interface HandleMissingOperation extends ScopedOperation {
  kind: "handle_missing";
  method: MissingValueMethod;
  /** Required by `fill_constant`, ignored otherwise. */
  value?: Exclude<CellValue, null>;
}

export interface StandardizeTextOperation extends ScopedOperation {
  kind: "standardize_text";
  steps: TextStep[];
}

export interface NormalizeDatesOperation extends ScopedOperation {
  kind: "normalize_dates";
  /** strftime-style, e.g. `%Y-%m-%d` */
  format?: string;
}

export interface RemoveOutliersOperation extends ScopedOperation {
  kind: "remove_outliers";
  method: OutlierMethod;
  /** IQR fence multiplier for `iqr`, |z| cut-off for `zscore`. */
  threshold?: number;
}

export interface TrimWhitespaceOperation extends ScopedOperation {
  kind: "trim_whitespace";
}

export interface ConvertTypesOperation extends ScopedOperation {
  kind: "convert_types";
  conversions: ColumnConversion[];
}

export interface RemoveEmptyRowsOperation extends ScopedOperation {
  kind: "remove_empty_rows";
}

export type CleaningOperation =
  | RemoveDuplicatesOperation
  | HandleMissingOperation
  | StandardizeTextOperation
  | NormalizeDatesOperation
  | RemoveOutliersOperation
  | TrimWhitespaceOperation
  | ConvertTypesOperation
  | RemoveEmptyRowsOperation;

export type CleaningOperationKind = CleaningOperation["kind"];

// ── Change log ────────────────────────────────

export type ChangeLogStatus = "applied" | "failed";

export interface ChangeLogEntry {
  operation: CleaningOperationKind;
  summary: string;
  rowsBefore: number;
  rowsAfter: number;
  status: ChangeLogStatus;
  notes: string[];
  durationMs: number;
}

export interface CleaningOptions {
  scopePolicy?: ScopePolicy;
  /** Non-missing values inspected per column when auto-detecting date columns. */
  dateSampleSize?: number;
}
