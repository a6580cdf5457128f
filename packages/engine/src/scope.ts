// ──────────────────────────────────────────────
// Scrubline - Scope Resolver
// Splits a dataset into the rows an operation may touch and the
// rows it may not, and stitches the two back together
// ──────────────────────────────────────────────

import type {
  Column,
  ColumnScope,
  Dataset,
  OperationScope,
  RowScope,
  ScopePolicy,
} from "@scrubline/types";
import { pickRows } from "./dataset.js";
import { ScopeError } from "./errors.js";

export interface ResolveScopeOptions {
  policy?: ScopePolicy;
  /** Which columns an unscoped operation acts on. Defaults to every column. */
  defaultColumns?: (column: Column) => boolean;
}

export interface ResolvedScope {
  /** In-scope column names that exist in the dataset, in the order requested. */
  columns: string[];
  /** True when the caller named the columns rather than relying on the default. */
  explicitColumns: boolean;
  /** Requested column names that do not exist in the dataset. */
  unknownColumns: string[];
  /** In-scope rows, with every column present. */
  subset: Dataset;
  /** Out-of-scope rows, never handed to an operation. */
  rest: Dataset;
  /**
   * Recombines a transformed subset with `rest` in the pre-split row order.
   * Only in-scope columns are taken from `transformed`; rows missing from it
   * are treated as removed.
   */
  merge(transformed: Dataset): Dataset;
}

function resolveColumns(
  dataset: Dataset,
  scope: ColumnScope | undefined,
  options: ResolveScopeOptions
): { columns: string[]; unknown: string[]; explicit: boolean } {
  if (scope === undefined || scope === "all") {
    const predicate = options.defaultColumns;
    const columns = dataset.columns
      .filter((column) => (predicate ? predicate(column) : true))
      .map((column) => column.name);
    return { columns, unknown: [], explicit: false };
  }

  const existing = new Set(dataset.columns.map((column) => column.name));
  const columns: string[] = [];
  const unknown: string[] = [];
  for (const name of scope) {
    if (!existing.has(name)) {
      unknown.push(name);
    } else if (!columns.includes(name)) {
      columns.push(name);
    }
  }

  if (unknown.length > 0 && options.policy === "strict") {
    throw new ScopeError(`Unknown columns in scope: ${unknown.join(", ")}`);
  }

  return { columns, unknown, explicit: true };
}

function resolveRowMask(
  dataset: Dataset,
  scope: RowScope | undefined,
  policy: ScopePolicy
): boolean[] {
  const total = dataset.rowIds.length;

  if (scope === undefined || scope === "all") {
    return new Array<boolean>(total).fill(true);
  }

  if ("ids" in scope) {
    // Ids removed by an earlier operation are expected here, so they are
    // ignored under either policy.
    const wanted = new Set(scope.ids);
    return dataset.rowIds.map((id) => wanted.has(id));
  }

  const { start, end } = scope.range;
  if (policy === "strict" && (start < 0 || end > total || start > end)) {
    throw new ScopeError(`Row range [${start}, ${end}) is outside 0..${total}`);
  }
  const from = Math.max(0, Math.min(start, total));
  const to = Math.max(from, Math.min(end, total));
  return dataset.rowIds.map((_, position) => position >= from && position < to);
}

export function resolveScope(
  dataset: Dataset,
  scope: OperationScope = {},
  options: ResolveScopeOptions = {}
): ResolvedScope {
  const policy = options.policy ?? "permissive";
  const { columns, unknown, explicit } = resolveColumns(dataset, scope.columns, {
    ...options,
    policy,
  });
  const mask = resolveRowMask(dataset, scope.rows, policy);

  const inPositions: number[] = [];
  const outPositions: number[] = [];
  mask.forEach((inScope, position) => {
    (inScope ? inPositions : outPositions).push(position);
  });

  const subset = outPositions.length === 0 ? dataset : pickRows(dataset, inPositions);
  const rest = pickRows(dataset, outPositions);
  const scopedColumns = new Set(columns);

  const merge = (transformed: Dataset): Dataset => {
    const transformedPosition = new Map<number, number>();
    transformed.rowIds.forEach((id, position) => transformedPosition.set(id, position));

    const kept: { position: number; source: number | null }[] = [];
    dataset.rowIds.forEach((id, position) => {
      if (!mask[position]) {
        kept.push({ position, source: null });
        return;
      }
      const source = transformedPosition.get(id);
      if (source !== undefined) {
        kept.push({ position, source });
      }
    });

    const untouchedRowsRemain = kept.some(({ source }) => source === null);

    const mergedColumns = dataset.columns.map((column): Column => {
      const replacement = scopedColumns.has(column.name)
        ? transformed.columns.find((candidate) => candidate.name === column.name)
        : undefined;
      if (!replacement) {
        return {
          ...column,
          values: kept.map(({ position }) => column.values[position] ?? null),
        };
      }

      const type =
        replacement.type === column.type || !untouchedRowsRemain ? replacement.type : "mixed";

      return {
        name: column.name,
        type,
        values: kept.map(({ position, source }) =>
          source === null
            ? (column.values[position] ?? null)
            : (replacement.values[source] ?? null)
        ),
      };
    });

    return {
      rowIds: kept.map(({ position }) => dataset.rowIds[position]!),
      columns: mergedColumns,
    };
  };

  return {
    columns,
    explicitColumns: explicit,
    unknownColumns: unknown,
    subset,
    rest,
    merge,
  };
}
