import test from "node:test";
import assert from "node:assert/strict";
import { createDataset, getColumn } from "../dataset.js";
import { normalizeDates } from "./dates.js";
import type { OperationContext } from "./types.js";

const context: OperationContext = { policy: "permissive", dateSampleSize: 100 };

test("normalizes mixed date formats and blanks out unparseable cells", () => {
  const dataset = createDataset([
    { when: "2024-01-05", who: "ann" },
    { when: "01/06/2024", who: "ben" },
    { when: "not-a-date", who: "cat" },
  ]);
  const outcome = normalizeDates(
    dataset,
    { kind: "normalize_dates", format: "%Y-%m-%d" },
    context
  );

  const when = getColumn(outcome.dataset, "when");
  assert.deepEqual(when?.values, ["2024-01-05", "2024-01-06", null]);
  assert.equal(when?.type, "date");
  assert.deepEqual(getColumn(outcome.dataset, "who")?.values, ["ann", "ben", "cat"]);
  assert.equal(
    outcome.summary,
    '2 date cells normalized to "%Y-%m-%d", 1 unparseable set to missing'
  );
  assert.deepEqual(outcome.notes, [
    { level: "warn", message: 'Column "when": 1 value set to missing (not parseable as a date)' },
  ]);
});

test("uses the requested output format", () => {
  const dataset = createDataset([{ d: "2024-03-09" }, { d: "Jan 5, 2024" }]);
  const outcome = normalizeDates(
    dataset,
    { kind: "normalize_dates", format: "%d %b %Y", scope: { columns: ["d"] } },
    context
  );

  assert.deepEqual(getColumn(outcome.dataset, "d")?.values, ["09 Mar 2024", "05 Jan 2024"]);
});

test("reports when auto-detection finds nothing", () => {
  const dataset = createDataset([{ name: "ann" }, { name: "2024-01-01" }]);
  const outcome = normalizeDates(dataset, { kind: "normalize_dates" }, context);

  assert.deepEqual(getColumn(outcome.dataset, "name")?.values, ["ann", "2024-01-01"]);
  assert.deepEqual(
    outcome.notes.map((note) => note.message),
    ["No date-like columns detected"]
  );
});

test("cells outside the row scope keep their original text", () => {
  const dataset = createDataset([{ d: "01/02/2024" }, { d: "03/04/2024" }]);
  const outcome = normalizeDates(
    dataset,
    { kind: "normalize_dates", scope: { rows: { ids: [1] } } },
    context
  );

  const column = getColumn(outcome.dataset, "d");
  assert.deepEqual(column?.values, ["01/02/2024", "2024-03-04"]);
  assert.equal(column?.type, "mixed");
});
