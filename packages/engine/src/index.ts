// ──────────────────────────────────────────────
// Scrubline - Engine Package
// ──────────────────────────────────────────────

export {
  createDataset,
  toRecords,
  validateDataset,
  inferColumnType,
  getColumn,
} from "./dataset.js";
export type { CreateDatasetOptions, RecordInput } from "./dataset.js";
export { DatasetShapeError, ScopeError } from "./errors.js";
export { resolveScope } from "./scope.js";
export type { ResolvedScope, ResolveScopeOptions } from "./scope.js";
export {
  summarizeDataset,
  compareSummaries,
  mean,
  median,
  mode,
  quantile,
  populationStdDev,
} from "./statistics.js";
export { parseDate, formatDate, looksLikeDate, isLikelyDateColumn } from "./date-format.js";
export type { DateParts } from "./date-format.js";
export {
  applyOperation,
  removeDuplicates,
  handleMissing,
  standardizeText,
  normalizeDates,
  removeOutliers,
  trimWhitespace,
  convertTypes,
  removeEmptyRows,
} from "./operations/index.js";
export type { OperationContext, OperationNote, OperationOutcome } from "./operations/index.js";
export { runCleaningPipeline, DEFAULT_DATE_SAMPLE_SIZE } from "./pipeline.js";
export type { PipelineParams, PipelineResult } from "./pipeline.js";
export { createCleaningSession } from "./session.js";
export type { CleaningSession } from "./session.js";
