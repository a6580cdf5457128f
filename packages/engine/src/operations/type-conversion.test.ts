import test from "node:test";
import assert from "node:assert/strict";
import { createDataset, getColumn } from "../dataset.js";
import { convertTypes, convertValue } from "./type-conversion.js";
import type { OperationContext } from "./types.js";

const context: OperationContext = { policy: "permissive", dateSampleSize: 100 };

test("numeric conversion turns unparseable values into missing", () => {
  const dataset = createDataset([{ v: "1,234" }, { v: " 42 " }, { v: "abc" }, { v: null }]);
  const outcome = convertTypes(
    dataset,
    { kind: "convert_types", conversions: [{ column: "v", to: "numeric" }] },
    context
  );

  const column = getColumn(outcome.dataset, "v");
  assert.deepEqual(column?.values, [1234, 42, null, null]);
  assert.equal(column?.type, "numeric");
  assert.equal(outcome.summary, "1 column converted, 1 cell set to missing");
  assert.deepEqual(outcome.notes, [
    { level: "warn", message: 'Column "v": 1 value set to missing (not convertible to numeric)' },
  ]);
});

test("a failing column does not stop the rest of the batch", () => {
  const dataset = createDataset([
    { flag: "maybe", when: "Jan 5, 2024", n: 7 },
    { flag: "Yes", when: "2024-02-30", n: 8 },
  ]);
  const outcome = convertTypes(
    dataset,
    {
      kind: "convert_types",
      conversions: [
        { column: "flag", to: "boolean" },
        { column: "ghost", to: "text" },
        { column: "when", to: "date" },
        { column: "n", to: "text" },
      ],
    },
    context
  );

  assert.deepEqual(getColumn(outcome.dataset, "flag")?.values, [null, true]);
  assert.deepEqual(getColumn(outcome.dataset, "when")?.values, ["2024-01-05", null]);
  assert.deepEqual(getColumn(outcome.dataset, "n")?.values, ["7", "8"]);
  assert.equal(outcome.summary, "3 columns converted, 2 cells set to missing");
  assert.deepEqual(
    outcome.notes.map((note) => note.message),
    [
      "Ignored columns not in the dataset: ghost",
      'Column "flag": 1 value set to missing (not convertible to boolean)',
      'Column "when": 1 value set to missing (not convertible to date)',
    ]
  );
});

test("converting part of the rows leaves a mixed column", () => {
  const dataset = createDataset([{ v: "1" }, { v: "2" }]);
  const outcome = convertTypes(
    dataset,
    {
      kind: "convert_types",
      conversions: [{ column: "v", to: "numeric" }],
      scope: { rows: { ids: [1] } },
    },
    context
  );

  const column = getColumn(outcome.dataset, "v");
  assert.deepEqual(column?.values, ["1", 2]);
  assert.equal(column?.type, "mixed");
});

test("convertValue coercions", () => {
  assert.equal(convertValue(true, "numeric"), 1);
  assert.equal(convertValue("-3.5e2", "numeric"), -350);
  assert.equal(convertValue("12,34", "numeric"), undefined);
  assert.equal(convertValue(0, "boolean"), false);
  assert.equal(convertValue(2, "boolean"), undefined);
  assert.equal(convertValue(false, "text"), "false");
  assert.equal(convertValue(20240105, "date"), undefined);
});
