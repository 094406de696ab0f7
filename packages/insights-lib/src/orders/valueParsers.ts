const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
// Date and time without an offset, e.g. "2023-05-02 10:00" or "2023-05-02T10:00:00.5"
const NAIVE_DATE_TIME_TEXT =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * Best-effort integer conversion. Returns `fallback` for anything that is not
 * an integer, a finite number (truncated toward zero), a boolean, or integer
 * text.
 */
export function toInt(value: unknown, fallback = 0): number {
  switch (typeof value) {
    case "number":
      return Number.isFinite(value) ? Math.trunc(value) : fallback;
    case "boolean":
      return value ? 1 : 0;
    case "bigint":
      return Number.isSafeInteger(Number(value)) ? Number(value) : fallback;
    case "string": {
      const text = value.trim();
      if (!INTEGER_TEXT.test(text)) return fallback;
      const parsed = Number(text);
      return Number.isSafeInteger(parsed) ? parsed : fallback;
    }
    default:
      return fallback;
  }
}

/**
 * Reads a price such as `"$1,234.50"`, `"  19.99 "` or `12`.
 * Every `$` and `,` is dropped before parsing; anything left that is not a
 * decimal literal yields `0`.
 */
export function parsePrice(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== "string") {
    return 0;
  }
  const text = value.replace(/[$,]/g, "").trim();
  if (!DECIMAL_TEXT.test(text)) {
    return 0;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Parses timestamp text. Date-time text without an offset is read as UTC, so
 * the result does not depend on the host's time zone.
 */
export function parseTimestampText(text: string): Date {
  const trimmed = text.trim();
  const naive = NAIVE_DATE_TIME_TEXT.exec(trimmed);
  return new Date(naive ? `${naive[1]}T${naive[2]}Z` : trimmed);
}

/**
 * Lenient timestamp coercion: Date instances, ISO/RFC strings and epoch
 * milliseconds become Dates, anything unparsable becomes `null`.
 */
export function parseTimestamp(value: unknown): Date | null {
  let parsed: Date;
  if (value instanceof Date) {
    parsed = new Date(value.getTime());
  } else if (typeof value === "string" && value.trim().length > 0) {
    parsed = parseTimestampText(value);
  } else if (typeof value === "number" && Number.isFinite(value)) {
    parsed = new Date(value);
  } else {
    return null;
  }
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Trimmed text, or `""` when the value is not a string.
 */
export function parseText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}
