import { DateTime } from "luxon";

const EPOCH_SECONDS_REGEX = /^\s*-?\d+(\.\d+)?\s*$/;
const YEAR_ONLY_REGEX = /^\s*\d{4}\s*$/;

function firstValid(candidates: ReadonlyArray<() => DateTime>): DateTime | null {
  for (const candidate of candidates) {
    const parsed = candidate();
    if (parsed.isValid) return parsed;
  }
  return null;
}

/**
 * Accepts a Date, epoch seconds (number or digit string), an ISO date or
 * datetime, an SQL-style `YYYY-MM-DD HH:MM:SS` stamp or an RFC 2822 / HTTP
 * date. Values without an explicit offset are read in `zone`; the result is
 * always expressed in `zone`.
 */
export function parseDateTimeValue(value: unknown, zone = "utc"): DateTime | null {
  if (value instanceof Date) {
    const parsed = DateTime.fromJSDate(value, { zone });
    return parsed.isValid ? parsed : null;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    return DateTime.fromSeconds(value, { zone });
  }

  if (typeof value !== "string") return null;

  const text = value.trim();
  if (text.length === 0) return null;

  if (YEAR_ONLY_REGEX.test(text)) {
    const parsed = DateTime.fromISO(text, { zone });
    return parsed.isValid ? parsed : null;
  }

  if (EPOCH_SECONDS_REGEX.test(text)) {
    return DateTime.fromSeconds(Number(text), { zone });
  }

  const parsed = firstValid([
    () => DateTime.fromISO(text, { zone }),
    () => DateTime.fromSQL(text, { zone }),
    () => DateTime.fromRFC2822(text, { zone }),
    () => DateTime.fromHTTP(text, { zone }),
  ]);

  return parsed ? parsed.setZone(zone) : null;
}

export function isValidTimeZone(zone: string): boolean {
  return DateTime.local().setZone(zone).isValid;
}
