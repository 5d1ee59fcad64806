import { enUSMessages, type EnUSMessageKey } from "./messages.en-US.js";

export type SupportedLocale = "en-US";

export type MessageKey = EnUSMessageKey;

const catalogs: Record<SupportedLocale, Record<string, string>> = {
  "en-US": enUSMessages,
};

const DEFAULT_LOCALE: SupportedLocale = "en-US";

export function resolveLocale(input?: string): SupportedLocale {
  const normalized = input?.trim().toLowerCase().replace("_", "-");
  return normalized === "en-us" ? "en-US" : DEFAULT_LOCALE;
}

/** Message texts of the library itself (errors, configuration problems). */
export function t(
  key: MessageKey,
  options?: { locale?: string; fallback?: string },
): string {
  const locale = resolveLocale(options?.locale);
  const catalog = catalogs[locale];
  return catalog[key] ?? options?.fallback ?? key;
}
