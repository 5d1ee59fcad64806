export type LogLevel = "info" | "warning" | "error";

export function logEvent(
  level: LogLevel,
  type: string,
  fields: Record<string, unknown> = {},
): void {
  const line = JSON.stringify({ type, ...fields });
  if (level === "error") {
    console.error(line);
  } else if (level === "warning") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export interface MissingKeyWarning {
  type: "missing_key";
  key: string;
  format: string;
  target: string;
}

export interface HtmlEscapeWarning {
  type: "html_escape_in_msgid";
  msgid: string;
  file: string;
  line: number;
}

export interface UnknownModifierWarning {
  type: "unknown_modifier";
  modifier: string;
  format: string;
}

export interface ModifierFailedWarning {
  type: "modifier_failed";
  modifier: string;
  value: string;
  reason: string;
}

export type DiagnosticWarning =
  | MissingKeyWarning
  | HtmlEscapeWarning
  | UnknownModifierWarning
  | ModifierFailedWarning;

export interface DiagnosticsSink {
  warning(event: DiagnosticWarning): void;
  info(type: string, fields: Record<string, unknown>): void;
  error(type: string, fields: Record<string, unknown>): void;
}

export class ConsoleDiagnosticsSink implements DiagnosticsSink {
  warning(event: DiagnosticWarning): void {
    const { type, ...fields } = event;
    logEvent("warning", type, fields);
  }

  info(type: string, fields: Record<string, unknown>): void {
    logEvent("info", type, fields);
  }

  error(type: string, fields: Record<string, unknown>): void {
    logEvent("error", type, fields);
  }
}

/** Keeps every diagnostic in memory; handy for inspection after a run. */
export class CollectingDiagnosticsSink implements DiagnosticsSink {
  readonly warnings: DiagnosticWarning[] = [];
  readonly infos: { type: string; fields: Record<string, unknown> }[] = [];
  readonly errors: { type: string; fields: Record<string, unknown> }[] = [];

  warning(event: DiagnosticWarning): void {
    this.warnings.push(event);
  }

  info(type: string, fields: Record<string, unknown>): void {
    this.infos.push({ type, fields });
  }

  error(type: string, fields: Record<string, unknown>): void {
    this.errors.push({ type, fields });
  }
}
