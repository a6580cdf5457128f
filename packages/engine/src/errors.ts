// ──────────────────────────────────────────────
// Scrubline - Engine Errors
// ──────────────────────────────────────────────

export class DatasetShapeError extends Error {
  readonly code = "INVALID_DATASET";
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid dataset: ${problems.join("; ")}`);
    this.name = "DatasetShapeError";
    this.problems = problems;
  }
}

export class ScopeError extends Error {
  readonly code = "INVALID_SCOPE";

  constructor(message: string) {
    super(message);
    this.name = "ScopeError";
  }
}
