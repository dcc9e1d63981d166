/**
 * Timestamp normalization for ingested measurements.
 *
 * Devices send ISO-8601 strings in a handful of shapes. Everything is stored as an
 * absolute instant, so strings without an explicit offset are read as UTC and
 * date-only strings (`YYYY`, `YYYY-MM`, `YYYY-MM-DD`) as UTC midnight on their first day.
 */
import { isValid, parseISO } from "date-fns";

const DATE_ONLY = /^(\d{4})(?:-(\d{2}))?(?:-(\d{2}))?$/;
// An offset only counts after a time part, so the "-01" of "2025-01" is not read as one.
const HAS_OFFSET = /[T ][\d:.,]+(Z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * Parse an ISO-8601 string (or pass through a Date) into an absolute instant.
 * @returns the instant, or null when the input cannot be read as a timestamp
 */
export function normalizeTimestamp(input: string | Date): Date | null {
  if (input instanceof Date) {
    return isValid(input) ? new Date(input.getTime()) : null;
  }

  const trimmed = input.trim();
  if (!trimmed) {
    return null;
  }

  let candidate = trimmed;
  const dateOnly = DATE_ONLY.exec(trimmed);
  if (dateOnly) {
    const [, year, month = "01", day = "01"] = dateOnly;
    candidate = `${year}-${month}-${day}T00:00:00Z`;
  } else if (!HAS_OFFSET.test(trimmed)) {
    candidate = `${trimmed}Z`;
  }

  const parsed = parseISO(candidate);
  return isValid(parsed) ? parsed : null;
}
