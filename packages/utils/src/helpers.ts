// ──────────────────────────────────────────────
// Scrubline - Utility Helpers
// ──────────────────────────────────────────────

import { randomUUID } from "node:crypto";

export function generateId(): string {
  return randomUUID();
}

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + "...";
}

export function measureDuration(startTime: bigint): number {
  const duration = process.hrtime.bigint() - startTime;
  return Number(duration / 1_000_000n); // Convert nanoseconds to milliseconds
}

export function startTimer(): bigint {
  return process.hrtime.bigint();
}

export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    // Keep log lines bounded when a failing cell carries a huge string
    return truncateString(error.message.replace(/\s+/g, " "), 500);
  }
  return "An unexpected error occurred";
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
