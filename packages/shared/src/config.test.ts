import { describe, expect, it } from "vitest";
import { resolveRuntimeConfig } from "./config.js";

describe("resolveRuntimeConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(resolveRuntimeConfig({})).toEqual({
      templateSyntax: "HTML",
      timeZone: "utc",
      templateCacheSize: 500,
    });
  });

  it("reads values from the environment", () => {
    expect(
      resolveRuntimeConfig({
        LOCTEXT_TEMPLATE_SYNTAX: "text",
        LOCTEXT_TRANSLATE_TO: " nl_NL ",
        LOCTEXT_TIME_ZONE: "Europe/Amsterdam",
        LOCTEXT_TEMPLATE_CACHE_SIZE: "20",
      }),
    ).toEqual({
      templateSyntax: "TEXT",
      translateTo: "nl_NL",
      timeZone: "Europe/Amsterdam",
      templateCacheSize: 20,
    });
  });

  it("rejects invalid values", () => {
    expect(() =>
      resolveRuntimeConfig({ LOCTEXT_TEMPLATE_CACHE_SIZE: "0" }),
    ).toThrow("LOCTEXT_TEMPLATE_CACHE_SIZE must be a positive integer");
    expect(() =>
      resolveRuntimeConfig({ LOCTEXT_TEMPLATE_SYNTAX: "XML" }),
    ).toThrow("LOCTEXT_TEMPLATE_SYNTAX must be HTML or TEXT");
    expect(() => resolveRuntimeConfig({ LOCTEXT_TIME_ZONE: "Nowhere/Land" }))
      .toThrow("LOCTEXT_TIME_ZONE 'Nowhere/Land' is not a known time zone");
  });
});
