import { ConfigurationError } from "./errors/index.js";
import { isValidTimeZone } from "./time.js";

export type TemplateSyntax = "HTML" | "TEXT";

export interface LoctextRuntimeConfig {
  templateSyntax: TemplateSyntax;
  translateTo?: string;
  timeZone: string;
  templateCacheSize: number;
}

const DEFAULT_TIME_ZONE = "utc";
const DEFAULT_TEMPLATE_CACHE_SIZE = 500;

function parsePositiveInt(
  raw: string | undefined,
  envName: string,
  fallback: number,
): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${envName} must be a positive integer`);
  }

  return value;
}

function parseTemplateSyntax(raw: string | undefined): TemplateSyntax {
  const value = raw?.trim().toUpperCase();
  if (!value) return "HTML";
  if (value === "HTML" || value === "TEXT") return value;
  throw new ConfigurationError("LOCTEXT_TEMPLATE_SYNTAX must be HTML or TEXT");
}

export function resolveRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
): LoctextRuntimeConfig {
  const templateSyntax = parseTemplateSyntax(env.LOCTEXT_TEMPLATE_SYNTAX);
  const translateTo = env.LOCTEXT_TRANSLATE_TO?.trim() || undefined;
  const timeZone = env.LOCTEXT_TIME_ZONE?.trim() || DEFAULT_TIME_ZONE;
  const templateCacheSize = parsePositiveInt(
    env.LOCTEXT_TEMPLATE_CACHE_SIZE,
    "LOCTEXT_TEMPLATE_CACHE_SIZE",
    DEFAULT_TEMPLATE_CACHE_SIZE,
  );

  if (!isValidTimeZone(timeZone)) {
    throw new ConfigurationError(
      `LOCTEXT_TIME_ZONE '${timeZone}' is not a known time zone`,
    );
  }

  return {
    templateSyntax,
    ...(translateTo !== undefined ? { translateTo } : {}),
    timeZone,
    templateCacheSize,
  };
}
