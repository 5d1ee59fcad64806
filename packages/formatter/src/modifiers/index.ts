import type { ModifierSpec } from "@loctext/contracts";
import { ConsoleDiagnosticsSink, type DiagnosticsSink } from "@loctext/shared";

import { humanizeBytes, toFiniteNumber } from "./bytes.js";
import {
  DEFAULT_DT_FORMAT,
  formatDateTime,
  isDateTimeKeyword,
  type DateTimeStyle,
} from "./datetime.js";
import { formatPrintf } from "./printf.js";

export { humanizeBytes, toFiniteNumber } from "./bytes.js";
export { formatDateTime, isDateTimeKeyword, type DateTimeStyle } from "./datetime.js";
export { formatPrintf } from "./printf.js";

export interface ModifierContext {
  /** The format string being expanded. */
  format: string;
  timeZone: string;
  diagnostics: DiagnosticsSink;
}

export type ModifierFn = (
  value: unknown,
  args: readonly string[],
  context: ModifierContext,
) => unknown;

export type CustomModifiers = Readonly<Record<string, ModifierFn>>;

export interface ModifierEngineOptions {
  custom?: CustomModifiers;
  timeZone?: string;
  diagnostics?: DiagnosticsSink;
}

function isEmptyValue(value: unknown): boolean {
  return value === undefined || value === null || value === "";
}

export function stringifyValue(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (Array.isArray(value)) return value.map(stringifyValue).join(", ");
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function dateTimeModifier(style: DateTimeStyle): ModifierFn {
  return (value, args, context) => {
    if (isEmptyValue(value)) return value;

    let keyword: string = DEFAULT_DT_FORMAT;
    const requested = args[0];
    if (style === "DT" && requested !== undefined) {
      if (isDateTimeKeyword(requested)) {
        keyword = requested;
      } else {
        context.diagnostics.warning({
          type: "unknown_modifier",
          modifier: `DT(${requested})`,
          format: context.format,
        });
      }
    }

    const formatted = formatDateTime(value, style, context.timeZone, keyword);
    if (formatted === null) {
      context.diagnostics.warning({
        type: "modifier_failed",
        modifier: style,
        value: stringifyValue(value),
        reason: "not a date or time",
      });
      return value;
    }
    return formatted;
  };
}

const bytesModifier: ModifierFn = (value) => {
  if (isEmptyValue(value)) return value;
  const bytes = toFiniteNumber(value);
  return bytes === null ? value : humanizeBytes(bytes);
};

const BUILT_IN_MODIFIERS: CustomModifiers = {
  BYTES: bytesModifier,
  YEAR: dateTimeModifier("YEAR"),
  DATE: dateTimeModifier("DATE"),
  TIME: dateTimeModifier("TIME"),
  DT: dateTimeModifier("DT"),
};

/**
 * Applies modifier chains left to right. Built-in modifiers win over custom
 * ones registered under the same name.
 */
export class ModifierEngine {
  private readonly custom: CustomModifiers;
  private readonly timeZone: string;
  private readonly diagnostics: DiagnosticsSink;

  constructor(options: ModifierEngineOptions = {}) {
    this.custom = options.custom ?? {};
    this.timeZone = options.timeZone ?? "utc";
    this.diagnostics = options.diagnostics ?? new ConsoleDiagnosticsSink();
  }

  lookup(name: string): ModifierFn | undefined {
    if (Object.prototype.hasOwnProperty.call(BUILT_IN_MODIFIERS, name)) {
      return BUILT_IN_MODIFIERS[name];
    }
    if (Object.prototype.hasOwnProperty.call(this.custom, name)) {
      return this.custom[name];
    }
    return undefined;
  }

  apply(value: unknown, modifiers: readonly ModifierSpec[], format: string): unknown {
    const context: ModifierContext = {
      format,
      timeZone: this.timeZone,
      diagnostics: this.diagnostics,
    };

    return modifiers.reduce<unknown>(
      (current, modifier) => this.applyOne(current, modifier, context),
      value,
    );
  }

  private applyOne(
    value: unknown,
    modifier: ModifierSpec,
    context: ModifierContext,
  ): unknown {
    if (modifier.kind === "printf") {
      if (isEmptyValue(value)) return "";
      try {
        return formatPrintf(modifier.spec, value);
      } catch (error) {
        this.diagnostics.warning({
          type: "modifier_failed",
          modifier: modifier.spec,
          value: stringifyValue(value),
          reason: describeFailure(error),
        });
        return value;
      }
    }

    const transform = this.lookup(modifier.name);
    if (!transform) {
      this.diagnostics.warning({
        type: "unknown_modifier",
        modifier: modifier.source,
        format: context.format,
      });
      return value;
    }

    return transform(value, modifier.args, context);
  }
}
