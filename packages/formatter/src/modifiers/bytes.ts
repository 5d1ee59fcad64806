const UNITS = ["B", "KB", "MB", "GB", "TB", "PB", "EB"] as const;
const STEP = 1024;

export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Whole bytes below 1 KB, one decimal for every larger unit. */
export function humanizeBytes(bytes: number): string {
  let magnitude = Math.abs(bytes);
  let unit = 0;

  while (magnitude >= STEP && unit < UNITS.length - 1) {
    magnitude /= STEP;
    unit += 1;
  }

  if (unit > 0 && Number(magnitude.toFixed(1)) >= STEP && unit < UNITS.length - 1) {
    magnitude /= STEP;
    unit += 1;
  }

  const sign = bytes < 0 ? "-" : "";
  return unit === 0
    ? `${sign}${Math.trunc(magnitude)} ${UNITS[unit]}`
    : `${sign}${magnitude.toFixed(1)} ${UNITS[unit]}`;
}
