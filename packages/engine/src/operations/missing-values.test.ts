import test from "node:test";
import assert from "node:assert/strict";
import { createDataset, getColumn } from "../dataset.js";
import { handleMissing } from "./missing-values.js";
import type { OperationContext } from "./types.js";

const context: OperationContext = { policy: "permissive", dateSampleSize: 100 };

test("fill_mean replaces missing numbers with the in-scope mean", () => {
  const dataset = createDataset([{ x: 10 }, { x: null }, { x: 30 }]);
  const outcome = handleMissing(dataset, { kind: "handle_missing", method: "fill_mean" }, context);

  assert.deepEqual(getColumn(outcome.dataset, "x")?.values, [10, 20, 30]);
  assert.equal(outcome.summary, "1 missing cell filled (fill_mean)");
});

test("fill_mean over an all-missing column leaves the cells missing", () => {
  const dataset = createDataset([{ x: null }, { x: null }], { types: { x: "numeric" } });
  const outcome = handleMissing(dataset, { kind: "handle_missing", method: "fill_mean" }, context);

  assert.deepEqual(getColumn(outcome.dataset, "x")?.values, [null, null]);
  assert.equal(outcome.summary, "0 missing cells filled (fill_mean)");
  assert.deepEqual(
    outcome.notes.map((note) => note.message),
    ['Column "x" has no values in scope; missing cells left as-is']
  );
});

test("fill_median skips non-numeric columns", () => {
  const dataset = createDataset([
    { n: 1, s: "a" },
    { n: null, s: null },
    { n: 5, s: "b" },
    { n: 9, s: "c" },
  ]);
  const outcome = handleMissing(dataset, { kind: "handle_missing", method: "fill_median" }, context);

  assert.deepEqual(getColumn(outcome.dataset, "n")?.values, [1, 5, 5, 9]);
  assert.deepEqual(getColumn(outcome.dataset, "s")?.values, ["a", null, "b", "c"]);
  assert.deepEqual(
    outcome.notes.map((note) => note.message),
    ['Skipped non-numeric column "s"']
  );
});

test("forward and backward fill only draw on in-scope rows", () => {
  const dataset = createDataset([{ x: 1 }, { x: null }, { x: null }, { x: 4 }]);
  const scope = { rows: { ids: [2, 3] } };

  const forward = handleMissing(
    dataset,
    { kind: "handle_missing", method: "fill_forward", scope },
    context
  );
  assert.deepEqual(getColumn(forward.dataset, "x")?.values, [1, null, null, 4]);
  assert.equal(forward.summary, "0 missing cells filled (fill_forward)");

  const backward = handleMissing(
    dataset,
    { kind: "handle_missing", method: "fill_backward", scope },
    context
  );
  assert.deepEqual(getColumn(backward.dataset, "x")?.values, [1, null, 4, 4]);
  assert.equal(backward.summary, "1 missing cell filled (fill_backward)");
});

test("fill_mode breaks ties with the smallest value", () => {
  const dataset = createDataset([{ s: "b" }, { s: "a" }, { s: "b" }, { s: "a" }, { s: null }]);
  const outcome = handleMissing(dataset, { kind: "handle_missing", method: "fill_mode" }, context);

  assert.deepEqual(getColumn(outcome.dataset, "s")?.values, ["b", "a", "b", "a", "a"]);
});

test("fill_constant applies the literal verbatim", () => {
  const dataset = createDataset([{ s: "x" }, { s: null }]);
  const outcome = handleMissing(
    dataset,
    { kind: "handle_missing", method: "fill_constant", value: 0 },
    context
  );

  const column = getColumn(outcome.dataset, "s");
  assert.deepEqual(column?.values, ["x", 0]);
  assert.equal(column?.type, "mixed");
});

test("fill_constant without a value fails the operation", () => {
  const dataset = createDataset([{ s: null }]);
  assert.throws(
    () => handleMissing(dataset, { kind: "handle_missing", method: "fill_constant" }, context),
    { message: "fill_constant requires a value" }
  );
});

test("drop removes rows missing a value in any in-scope column", () => {
  const dataset = createDataset([
    { a: 1, b: null },
    { a: null, b: 2 },
    { a: 3, b: 4 },
  ]);
  const outcome = handleMissing(
    dataset,
    { kind: "handle_missing", method: "drop", scope: { columns: ["a"] } },
    context
  );

  assert.deepEqual(outcome.dataset.rowIds, [0, 2]);
  assert.equal(outcome.summary, "1 row with missing values dropped");
});

test("fill statistics ignore values outside the row scope", () => {
  const dataset = createDataset([{ x: 1000 }, { x: 10 }, { x: null }, { x: 30 }]);
  const scope = { rows: { ids: [1, 2, 3] } };

  for (const method of ["fill_mean", "fill_median"] as const) {
    const outcome = handleMissing(dataset, { kind: "handle_missing", method, scope }, context);
    assert.deepEqual(getColumn(outcome.dataset, "x")?.values, [1000, 10, 20, 30]);
  }
});

test("drop only removes in-scope rows", () => {
  const dataset = createDataset([{ x: null }, { x: 1 }, { x: null }]);
  const outcome = handleMissing(
    dataset,
    { kind: "handle_missing", method: "drop", scope: { rows: { ids: [1, 2] } } },
    context
  );

  assert.deepEqual(outcome.dataset.rowIds, [0, 1]);
  assert.deepEqual(getColumn(outcome.dataset, "x")?.values, [null, 1]);
  assert.equal(outcome.summary, "1 row with missing values dropped");
});
