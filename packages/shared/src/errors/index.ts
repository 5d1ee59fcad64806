import { t } from "../i18n/index.js";

export type LoctextErrorCode =
  | "CONFIGURATION_ERROR"
  | "UNKNOWN_PATTERN"
  | "SCAN_SYNTAX_ERROR"
  | "MISSING_COUNT"
  | "UNEXPECTED_COUNT"
  | "SUPERFLUOUS_PARAMETERS"
  | "CATALOG_WRITE_FAILED"
  | "EXTRACTION_FAILED"
  | "INTERNAL_ERROR";

export interface LoctextErrorInput {
  message: string;
  code: LoctextErrorCode;
  details?: unknown;
  cause?: unknown;
}

export class LoctextError extends Error {
  readonly code: LoctextErrorCode;
  readonly details?: unknown;

  constructor(input: LoctextErrorInput) {
    super(input.message);
    this.name = new.target.name;
    this.code = input.code;
    if (input.details !== undefined) this.details = input.details;
    if (input.cause !== undefined) {
      this.cause = input.cause;
    }
  }
}

export class ConfigurationError extends LoctextError {
  constructor(message = t("error.configuration"), details?: unknown) {
    super({
      message,
      code: "CONFIGURATION_ERROR",
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class UnknownPatternError extends LoctextError {
  readonly pattern: string;

  constructor(pattern: string) {
    super({
      message: `${t("error.unknown_pattern")} '${pattern}'`,
      code: "UNKNOWN_PATTERN",
      details: { pattern },
    });
    this.pattern = pattern;
  }
}

export class ScanSyntaxError extends LoctextError {
  readonly file: string;
  readonly line: number;

  constructor(file: string, line: number) {
    super({
      message: `${t("error.scan_no_end")} in ${file} line ${line}`,
      code: "SCAN_SYNTAX_ERROR",
      details: { file, line },
    });
    this.file = file;
    this.line = line;
  }
}

export class MissingCountError extends LoctextError {
  constructor(msgid: string) {
    super({
      message: `${t("error.missing_count")}: '${msgid}'`,
      code: "MISSING_COUNT",
      details: { msgid },
    });
  }
}

export class UnexpectedCountError extends LoctextError {
  constructor(msgid: string) {
    super({
      message: `${t("error.unexpected_count")}: '${msgid}'`,
      code: "UNEXPECTED_COUNT",
      details: { msgid },
    });
  }
}

export class SuperfluousParametersError extends LoctextError {
  constructor(msgid: string, superfluous: number) {
    super({
      message: `${t("error.superfluous_parameters")}: '${msgid}'`,
      code: "SUPERFLUOUS_PARAMETERS",
      details: { msgid, superfluous },
    });
  }
}

export class CatalogWriteError extends LoctextError {
  readonly domain: string;

  constructor(domain: string, cause: unknown) {
    super({
      message: `${t("error.catalog_write")} for domain '${domain}'`,
      code: "CATALOG_WRITE_FAILED",
      details: { domain },
      cause,
    });
    this.domain = domain;
  }
}

export class ExtractionFailedError extends LoctextError {
  readonly failures: readonly CatalogWriteError[];

  constructor(failures: readonly CatalogWriteError[]) {
    super({
      message: `${t("error.extraction_failed")}: ${failures
        .map((failure) => failure.domain)
        .join(", ")}`,
      code: "EXTRACTION_FAILED",
      details: { domains: failures.map((failure) => failure.domain) },
    });
    this.failures = failures;
  }
}

export interface ErrorReport {
  message: string;
  code: string;
  details?: unknown;
}

export function toErrorReport(error: unknown): ErrorReport {
  if (error instanceof LoctextError) {
    return {
      message: error.message,
      code: error.code,
      ...(error.details !== undefined ? { details: error.details } : {}),
    };
  }

  return {
    message: t("error.unexpected"),
    code: "INTERNAL_ERROR",
  };
}
