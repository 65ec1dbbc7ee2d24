// ══ Cell Value Normalization ══════════════════════════════════════════════
// Best-effort parsers for marketplace spreadsheet cells → typed values.
// None of these throw: a bad cell becomes "" or the caller's default.

import { format, isValid, parse } from "date-fns";
import type { CellValue } from "../types/canonical";

/**
 * Layouts tried in order after the ISO check. Month-first comes before
 * day-first, so "01/02/2024" is 2 Jan while "15/01/2024" can only be 15 Jan.
 * Four-digit years come first; the "yy" layouts only see inputs whose year
 * was too short for them (see parseLayout).
 */
const DATE_LAYOUTS = [
  "MM/dd/yyyy",
  "dd/MM/yyyy",
  "MM-dd-yyyy",
  "dd-MM-yyyy",
  "dd.MM.yyyy",
  "yyyy/MM/dd",
  "dd MMM yyyy",
  "d-MMM-yyyy",
  "MMM d, yyyy",
  "d MMMM yyyy",
  "MMMM d, yyyy",
  "MM/dd/yy",
  "dd/MM/yy",
  "MM-dd-yy",
  "dd-MM-yy",
  "dd.MM.yy",
  "dd MMM yy",
  "d-MMM-yy",
];

// "yyyy" also takes 1-3 digits; anything before this is a short year, not year 24.
const MIN_FULL_YEAR = 1000;

// Leading calendar date of an ISO timestamp: "2024-01-15T10:20:30+05:30" → 2024-01-15
const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:$|[T\s])/;

const CURRENCY_PREFIX = /^(?:₹|rs\.?|inr)\s*/i;

// Fixed reference so parsing never depends on the clock.
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse any date-like cell into "YYYY-MM-DD".
 * Returns "" for empty, unparseable or non-date values (numbers included).
 */
export function parseDate(value: CellValue): string {
  if (value instanceof Date) {
    return isValid(value) ? format(value, "yyyy-MM-dd") : "";
  }
  if (typeof value !== "string") return "";

  const trimmed = value.trim();
  if (trimmed === "") return "";

  const iso = ISO_DATE_PREFIX.exec(trimmed);
  if (iso?.[1]) {
    const d = parseLayout(iso[1], "yyyy-MM-dd");
    return d ? format(d, "yyyy-MM-dd") : "";
  }

  for (const layout of DATE_LAYOUTS) {
    const d = parseLayout(trimmed, layout);
    if (d) return format(d, "yyyy-MM-dd");
  }
  return "";
}

function parseLayout(text: string, layout: string): Date | undefined {
  const d = parse(text, layout, REFERENCE_DATE);
  return isValid(d) && d.getFullYear() >= MIN_FULL_YEAR ? d : undefined;
}

/**
 * Convert a cell to a finite number, or return `fallback` unchanged.
 * Accepts "1,234.50", "₹ 999", "Rs. 10". Rejects partial numbers like "12abc".
 */
export function coerceNumber(value: CellValue, fallback: number): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value !== "string") return fallback;

  const cleaned = value.trim().replace(CURRENCY_PREFIX, "").replace(/,/g, "").trim();
  if (cleaned === "") return fallback;

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Round to two decimals, ties to even: 90.125 → 90.12, 90.375 → 90.38.
 * Only exact binary ties count as ties.
 */
export function round2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Math.round(scaled) / 100;
}

/**
 * Normalize a header or state name for comparison: trim + lowercase.
 */
export function normalizeKey(val: string | undefined | null): string {
  if (!val) return "";
  return val.trim().toLowerCase();
}

/**
 * Cell → display text. Blank cells (null, NaN, whitespace) become "".
 */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number") return Number.isNaN(value) ? "" : String(value);
  if (value instanceof Date) return parseDate(value);
  return String(value).trim();
}

export function isBlank(value: CellValue): boolean {
  return cellText(value) === "";
}
