// ──────────────────────────────────────────────
// Scrubline - Shared Types
// ──────────────────────────────────────────────

export * from "./dataset.js";
export * from "./cleaning.js";
export * from "./api.js";
