// ──────────────────────────────────────────────
// Scrubline - Dataset Types
// ──────────────────────────────────────────────

export const COLUMN_TYPES = ["numeric", "text", "date", "boolean", "mixed"] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

/** `null` is the missing marker. It is never the same thing as `""` or `0`. */
export type CellValue = string | number | boolean | null;

export type RowId = number;

export interface Column {
  readonly name: string;
  readonly type: ColumnType;
  readonly values: readonly CellValue[];
}

export interface Dataset {
  readonly rowIds: readonly RowId[];
  readonly columns: readonly Column[];
}

export type DatasetRecord = Record<string, CellValue>;

export interface ColumnSummary {
  name: string;
  type: ColumnType;
  missing: number;
  distinct: number;
}

export interface DatasetSummary {
  rows: number;
  columns: number;
  missingCells: number;
  columnSummaries: ColumnSummary[];
}

export interface SummaryComparison {
  before: DatasetSummary;
  after: DatasetSummary;
  rowsRemoved: number;
  missingCellsDelta: number;
}
