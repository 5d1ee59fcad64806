import type { DateTime } from "luxon";
import { parseDateTimeValue } from "@loctext/shared";

export type DateTimeStyle = "YEAR" | "DATE" | "TIME" | "DT";

const YEAR_ONLY_REGEX = /^\s*(\d{4})\s*$/;
const DISPLAY_LOCALE = "en-US";

const DT_FORMATS: Record<string, (stamp: DateTime) => string> = {
  ASC: (stamp) => stamp.setLocale(DISPLAY_LOCALE).toFormat("EEE MMM d HH:mm:ss yyyy"),
  ISO: (stamp) => stamp.toISO({ suppressMilliseconds: true }) ?? "",
  RFC2822: (stamp) => stamp.toRFC2822() ?? "",
  RFC822: (stamp) =>
    stamp.setLocale(DISPLAY_LOCALE).toFormat("EEE, dd MMM yy HH:mm:ss ZZZ"),
  FT: (stamp) => stamp.toFormat("yyyy-MM-dd HH:mm:ss"),
};

export const DEFAULT_DT_FORMAT = "FT";

function yearOnly(value: unknown): string | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 1000 && value <= 9999
      ? String(value)
      : undefined;
  }
  if (typeof value === "string") return YEAR_ONLY_REGEX.exec(value)?.[1];
  return undefined;
}

export function isDateTimeKeyword(keyword: string): boolean {
  return Object.prototype.hasOwnProperty.call(DT_FORMATS, keyword);
}

/**
 * Returns null when the value cannot be read as a moment in time. A plain
 * four digit value is taken as a year as-is for YEAR.
 */
export function formatDateTime(
  value: unknown,
  style: DateTimeStyle,
  timeZone: string,
  keyword: string = DEFAULT_DT_FORMAT,
): string | null {
  if (style === "YEAR") {
    const year = yearOnly(value);
    if (year !== undefined) return year;
  }

  const stamp = parseDateTimeValue(value, timeZone);
  if (!stamp) return null;

  switch (style) {
    case "YEAR":
      return stamp.toFormat("yyyy");
    case "DATE":
      return stamp.toFormat("yyyy-MM-dd");
    case "TIME":
      return stamp.toFormat("HH:mm:ss");
    case "DT": {
      const render = isDateTimeKeyword(keyword)
        ? DT_FORMATS[keyword]
        : DT_FORMATS[DEFAULT_DT_FORMAT];
      return render(stamp);
    }
  }
}
