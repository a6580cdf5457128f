// ──────────────────────────────────────────────
// Scrubline - Utils Package
// ──────────────────────────────────────────────

export {
  rootLogger,
  createLogger,
  createCorrelationId,
  createSessionLogger,
} from "./logger.js";
export type { Logger } from "./logger.js";
export {
  loadConfig,
  getEnvAsPositiveInt,
  getEnvOrDefault,
  getEnvAsNumber,
  getEnvAsScopePolicy,
} from "./config.js";
export type { AppConfig } from "./config.js";
export {
  generateId,
  truncateString,
  measureDuration,
  startTimer,
  sanitizeErrorMessage,
  pluralize,
} from "./helpers.js";
