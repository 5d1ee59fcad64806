export const enUSMessages = {
  "error.configuration": "Invalid configuration",
  "error.unknown_pattern": "unknown pattern",
  "error.scan_no_end": "template syntax error, no END",
  "error.missing_count": "missing count for plural message",
  "error.unexpected_count": "count given for message without plural",
  "error.superfluous_parameters":
    "superfluous positional parameters, only named parameters expected",
  "error.catalog_write": "failed to write translation tables",
  "error.extraction_failed": "extraction failed for domains",
  "error.unexpected": "Unexpected error",
  "config.duplicate_function": "translation function already in use",
  "config.directory_not_included": "directory not in include path",
} as const;

export type EnUSMessageKey = keyof typeof enUSMessages;
