import test from "node:test";
import assert from "node:assert/strict";
import { createDataset, getColumn } from "../dataset.js";
import { trimWhitespace } from "./whitespace.js";
import { removeEmptyRows } from "./empty-rows.js";
import type { OperationContext } from "./types.js";

const context: OperationContext = { policy: "permissive", dateSampleSize: 100 };

test("trimming twice gives the same result as trimming once", () => {
  const dataset = createDataset([{ s: " a " }, { s: "b\t" }, { s: 3 }, { s: null }]);

  const once = trimWhitespace(dataset, { kind: "trim_whitespace" }, context);
  const twice = trimWhitespace(once.dataset, { kind: "trim_whitespace" }, context);

  assert.deepEqual(getColumn(once.dataset, "s")?.values, ["a", "b", 3, null]);
  assert.deepEqual(twice.dataset, once.dataset);
  assert.equal(once.summary, "2 cells trimmed");
  assert.equal(twice.summary, "0 cells trimmed");
});

test("trim leaves out-of-scope columns untouched", () => {
  const dataset = createDataset([{ a: " x ", b: " y " }]);
  const outcome = trimWhitespace(
    dataset,
    { kind: "trim_whitespace", scope: { columns: ["a"] } },
    context
  );

  assert.deepEqual(getColumn(outcome.dataset, "a")?.values, ["x"]);
  assert.deepEqual(getColumn(outcome.dataset, "b")?.values, [" y "]);
});

test("removes rows where every column is missing, within the row scope", () => {
  const dataset = createDataset([
    { a: null, b: null },
    { a: 1, b: null },
    { a: null, b: null },
  ]);
  const outcome = removeEmptyRows(
    dataset,
    { kind: "remove_empty_rows", scope: { rows: { ids: [0, 1] } } },
    context
  );

  assert.deepEqual(outcome.dataset.rowIds, [1, 2]);
  assert.equal(outcome.summary, "1 empty row removed");
});

test("empty-row removal looks at every column regardless of column scope", () => {
  const dataset = createDataset([
    { a: null, b: "kept" },
    { a: null, b: null },
  ]);
  const outcome = removeEmptyRows(
    dataset,
    { kind: "remove_empty_rows", scope: { columns: ["a"] } },
    context
  );

  assert.deepEqual(outcome.dataset.rowIds, [0]);
  assert.deepEqual(
    outcome.notes.map((note) => note.message),
    ["Column scope does not apply to empty-row removal"]
  );
});
