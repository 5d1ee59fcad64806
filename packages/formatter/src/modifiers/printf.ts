import { sprintf } from "sprintf-js";
import { toFiniteNumber } from "./bytes.js";

const NUMERIC_CONVERSIONS = new Set(["b", "c", "d", "i", "e", "f", "g", "o", "u", "x", "X"]);

function printfArgument(spec: string, value: unknown): unknown {
  const conversion = spec[spec.length - 1] ?? "";
  if (!NUMERIC_CONVERSIONS.has(conversion)) {
    return value === undefined || value === null ? "" : value;
  }
  return toFiniteNumber(value) ?? value;
}

/** C-style formatting of a single value; throws on a spec sprintf rejects. */
export function formatPrintf(spec: string, value: unknown): string {
  return sprintf(spec, printfArgument(spec, value));
}
