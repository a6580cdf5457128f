import test from "node:test";
import assert from "node:assert/strict";
import { createDataset } from "./dataset.js";
import { createCleaningSession } from "./session.js";

const records = [
  { name: " Ann ", score: 10 },
  { name: " Ann ", score: 10 },
  { name: "Bo", score: null },
];

test("each batch sees the previous one and history accumulates", () => {
  const session = createCleaningSession(createDataset(records));

  session.apply([{ kind: "remove_duplicates" }]);
  session.apply([
    { kind: "trim_whitespace" },
    { kind: "handle_missing", method: "fill_mean" },
  ]);

  assert.deepEqual(session.current.rowIds, [0, 2]);
  assert.deepEqual(
    session.history.map((entry) => entry.operation),
    ["remove_duplicates", "trim_whitespace", "handle_missing"]
  );
  assert.equal(session.summary().rowsRemoved, 1);
  assert.equal(session.summary().after.missingCells, 0);
});

test("undo restores the snapshot from before the last batch", () => {
  const original = createDataset(records);
  const session = createCleaningSession(original);

  session.apply([{ kind: "remove_duplicates" }]);
  const afterFirst = session.current;
  session.apply([{ kind: "handle_missing", method: "drop" }]);

  assert.equal(session.undo(), true);
  assert.equal(session.current, afterFirst);
  assert.equal(session.history.length, 1);

  assert.equal(session.undo(), true);
  assert.equal(session.current, original);
  assert.equal(session.undo(), false);
});

test("reset returns to the original dataset and clears history", () => {
  const original = createDataset(records);
  const session = createCleaningSession(original);

  session.apply([{ kind: "remove_duplicates" }]);
  session.reset();

  assert.equal(session.current, original);
  assert.deepEqual(session.history, []);
  assert.equal(session.original, original);
});

test("sessions over the same dataset do not share state", () => {
  const dataset = createDataset(records);
  const first = createCleaningSession(dataset);
  const second = createCleaningSession(dataset);

  first.apply([{ kind: "remove_duplicates" }]);

  assert.equal(first.current.rowIds.length, 2);
  assert.equal(second.current.rowIds.length, 3);
  assert.notEqual(first.id, second.id);
});
