import test from "node:test";
import assert from "node:assert/strict";
import { createDataset } from "./dataset.js";
import {
  compareCells,
  compareSummaries,
  mean,
  median,
  mode,
  populationStdDev,
  quantile,
  summarizeDataset,
} from "./statistics.js";

test("basic statistics over numbers", () => {
  assert.equal(mean([10, 30]), 20);
  assert.equal(mean([]), null);
  assert.equal(median([9, 1, 5]), 5);
  assert.equal(median([4, 1, 3, 2]), 2.5);
  assert.equal(quantile([1, 2, 3, 4, 5, 100], 0.25), 2.25);
  assert.equal(populationStdDev([2, 4, 4, 4, 5, 5, 7, 9]), 2);
});

test("mode counts values exactly and breaks ties deterministically", () => {
  assert.equal(mode([3, 1, 3, 1]), 1);
  assert.equal(mode(["1", 1, "1"]), "1");
  assert.equal(mode(["z", 5]), 5);
  assert.equal(mode([null, null]), null);
});

test("compareCells orders numbers, then strings, then booleans", () => {
  const values = [true, "b", 10, "a", 2, false];
  assert.deepEqual([...values].sort(compareCells), [2, 10, "a", "b", false, true]);
});

test("summaries count rows, missing cells and distinct values", () => {
  const before = createDataset([
    { a: 1, b: "x" },
    { a: null, b: "x" },
    { a: 3, b: null },
  ]);
  const after = createDataset([{ a: 1, b: "x" }]);

  assert.deepEqual(summarizeDataset(before), {
    rows: 3,
    columns: 2,
    missingCells: 2,
    columnSummaries: [
      { name: "a", type: "numeric", missing: 1, distinct: 2 },
      { name: "b", type: "text", missing: 1, distinct: 1 },
    ],
  });

  const comparison = compareSummaries(before, after);
  assert.equal(comparison.rowsRemoved, 2);
  assert.equal(comparison.missingCellsDelta, -2);
});
