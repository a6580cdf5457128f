// ──────────────────────────────────────────────
// Scrubline - Date Parsing & Formatting
// Best-effort parser, strftime-style formatter and the
// date-column detection heuristic
// ──────────────────────────────────────────────

import type { Column } from "@scrubline/types";

export interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const TIME_SUFFIX = String.raw`(?:[T\s]+(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:\s*(?:Z|[+-]\d{2}:?\d{2}))?)?`;

const ISO_PATTERN = new RegExp(String.raw`^(\d{4})[-/](\d{1,2})[-/](\d{1,2})${TIME_SUFFIX}$`);
const MONTH_FIRST_PATTERN = new RegExp(String.raw`^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})${TIME_SUFFIX}$`);
const NAME_FIRST_PATTERN = /^([A-Za-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;
const DAY_FIRST_NAME_PATTERN = /^(\d{1,2})(?:st|nd|rd|th)?\s+([A-Za-z]+)\.?,?\s+(\d{4})$/;

/** Literal shapes the column detector counts as date-like. */
const DETECTION_PATTERNS = [
  /^\d{4}-\d{2}-\d{2}$/,
  /^\d{1,2}\/\d{1,2}\/\d{4}$/,
  /^\d{1,2}-\d{1,2}-\d{4}$/,
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function monthFromName(name: string): number | null {
  const lowered = name.toLowerCase();
  if (lowered.length < 3) return null;
  const index = MONTH_NAMES.findIndex((month) => month.toLowerCase().startsWith(lowered));
  return index === -1 ? null : index + 1;
}

function buildParts(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): DateParts | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { year, month, day, hour, minute, second };
}

function timeOf(match: RegExpMatchArray): [number, number, number] {
  return [Number(match[4] ?? 0), Number(match[5] ?? 0), Number(match[6] ?? 0)];
}

export function parseDate(input: string): DateParts | null {
  const value = input.trim();
  if (value.length === 0) return null;

  const iso = value.match(ISO_PATTERN);
  if (iso) {
    return buildParts(Number(iso[1]), Number(iso[2]), Number(iso[3]), ...timeOf(iso));
  }

  const monthFirst = value.match(MONTH_FIRST_PATTERN);
  if (monthFirst) {
    const first = Number(monthFirst[1]);
    const second = Number(monthFirst[2]);
    const year = Number(monthFirst[3]);
    // Month first, unless the first field cannot be a month
    const [month, day] = first > 12 && second <= 12 ? [second, first] : [first, second];
    return buildParts(year, month, day, ...timeOf(monthFirst));
  }

  const nameFirst = value.match(NAME_FIRST_PATTERN);
  if (nameFirst) {
    const month = monthFromName(nameFirst[1] ?? "");
    return month === null ? null : buildParts(Number(nameFirst[3]), month, Number(nameFirst[2]));
  }

  const dayFirst = value.match(DAY_FIRST_NAME_PATTERN);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2] ?? "");
    return month === null ? null : buildParts(Number(dayFirst[3]), month, Number(dayFirst[1]));
  }

  return null;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatDate(parts: DateParts, format: string): string {
  return format.replace(/%([%YymdHMSbB])/g, (_, token: string) => {
    switch (token) {
      case "Y":
        return pad(parts.year, 4);
      case "y":
        return pad(parts.year % 100);
      case "m":
        return pad(parts.month);
      case "d":
        return pad(parts.day);
      case "H":
        return pad(parts.hour);
      case "M":
        return pad(parts.minute);
      case "S":
        return pad(parts.second);
      case "b":
        return (MONTH_NAMES[parts.month - 1] ?? "").slice(0, 3);
      case "B":
        return MONTH_NAMES[parts.month - 1] ?? "";
      default:
        return "%";
    }
  });
}

export function looksLikeDate(value: string): boolean {
  const trimmed = value.trim();
  return DETECTION_PATTERNS.some((pattern) => pattern.test(trimmed));
}

/**
 * Heuristic: a column is date-like when a strict majority of the first
 * `sampleSize` non-missing values look like dates. Numeric-looking text can
 * pass and a minority format in a mixed column can fail; both are accepted.
 */
export function isLikelyDateColumn(column: Column, sampleSize: number): boolean {
  if (column.type === "numeric" || column.type === "boolean") return false;

  let sampled = 0;
  let matches = 0;
  for (const value of column.values) {
    if (sampled >= sampleSize) break;
    if (value === null) continue;
    sampled++;
    if (typeof value === "string" && looksLikeDate(value)) matches++;
  }
  return sampled > 0 && matches * 2 > sampled;
}
