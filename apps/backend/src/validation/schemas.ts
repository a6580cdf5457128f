// ──────────────────────────────────────────────
// Scrubline - Zod Validation Schemas
// ──────────────────────────────────────────────

import { z } from "zod";
import {
  COLUMN_TYPES,
  CONVERSION_TARGETS,
  MISSING_VALUE_METHODS,
  OUTLIER_METHODS,
  SCOPE_POLICIES,
  TEXT_STEPS,
} from "@scrubline/types";

// Dataset schemas
export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const columnTypeSchema = z.enum(COLUMN_TYPES);

export const columnInputSchema = z.object({
  name: z.string().min(1, "Column name is required"),
  type: columnTypeSchema.optional(),
  values: z.array(cellValueSchema),
});

// Column-oriented form. Column lengths are checked by the engine (INVALID_DATASET).
export const columnsDatasetSchema = z.object({
  columns: z.array(columnInputSchema),
  rowIds: z.array(z.number().int()).optional(),
});

export const recordsDatasetSchema = z.object({
  records: z.array(z.record(cellValueSchema)),
  columns: z.array(z.string().min(1)).optional(),
  types: z.record(columnTypeSchema).optional(),
});

export const datasetInputSchema = z.union([columnsDatasetSchema, recordsDatasetSchema]);

// Scope schemas
export const rowScopeSchema = z.union([
  z.literal("all"),
  z.object({ ids: z.array(z.number().int()) }),
  z.object({
    range: z.object({
      start: z.number().int(),
      end: z.number().int(),
    }),
  }),
]);

export const operationScopeSchema = z.object({
  columns: z.union([z.literal("all"), z.array(z.string().min(1))]).optional(),
  rows: rowScopeSchema.optional(),
});

// Operation schemas
const scoped = { scope: operationScopeSchema.optional() };

export const cleaningOperationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("remove_duplicates"), ...scoped }),
  z.object({
    kind: z.literal("handle_missing"),
    method: z.enum(MISSING_VALUE_METHODS),
    value: z.union([z.string(), z.number(), z.boolean()]).optional(),
    ...scoped,
  }),
  z.object({
    kind: z.literal("standardize_text"),
    steps: z.array(z.enum(TEXT_STEPS)),
    ...scoped,
  }),
  z.object({
    kind: z.literal("normalize_dates"),
    format: z.string().min(1).max(64).optional(),
    ...scoped,
  }),
  z.object({
    kind: z.literal("remove_outliers"),
    method: z.enum(OUTLIER_METHODS),
    threshold: z.number().optional(),
    ...scoped,
  }),
  z.object({ kind: z.literal("trim_whitespace"), ...scoped }),
  z.object({
    kind: z.literal("convert_types"),
    conversions: z.array(
      z.object({
        column: z.string().min(1),
        to: z.enum(CONVERSION_TARGETS),
      })
    ),
    ...scoped,
  }),
  z.object({ kind: z.literal("remove_empty_rows"), ...scoped }),
]);

export const cleaningOptionsSchema = z.object({
  scopePolicy: z.enum(SCOPE_POLICIES).optional(),
  dateSampleSize: z.number().int().min(1).max(10000).optional(),
});

// Request bodies
export const summarizeDatasetSchema = z.object({
  dataset: datasetInputSchema,
});

export const cleanDatasetSchema = z.object({
  dataset: datasetInputSchema,
  operations: z.array(cleaningOperationSchema),
  options: cleaningOptionsSchema.optional(),
});

export type DatasetInput = z.infer<typeof datasetInputSchema>;
export type CleanDatasetInput = z.infer<typeof cleanDatasetSchema>;
