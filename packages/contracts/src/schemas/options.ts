import { z } from "zod";

import {
  nonEmptyStringSchema,
  pathListSchema,
  templateSyntaxSchema,
  templateVersionSchema,
  timeZoneSchema,
  translationFunctionNameSchema,
} from "./common.js";

export const templaterSettingsSchema = z
  .object({
    templateSyntax: templateSyntaxSchema.optional(),
    translateTo: nonEmptyStringSchema.optional(),
    timeZone: timeZoneSchema.optional(),
    templateCacheSize: z.number().int().positive().optional(),
    includePath: pathListSchema.optional(),
    delimiter: z.string().min(1).default(":"),
    templateVersion: templateVersionSchema.default(2),
  })
  .strict();

export type TemplaterSettings = z.infer<typeof templaterSettingsSchema>;
export type TemplaterSettingsInput = z.input<typeof templaterSettingsSchema>;

export const textdomainSettingsSchema = z
  .object({
    name: nonEmptyStringSchema,
    translationFunction: translationFunctionNameSchema.default("loc"),
    lexicon: nonEmptyStringSchema.optional(),
    onlyInDirectory: pathListSchema.optional(),
    lang: nonEmptyStringSchema.optional(),
  })
  .strict();

export type TextdomainSettings = z.infer<typeof textdomainSettingsSchema>;
export type TextdomainSettingsInput = z.input<typeof textdomainSettingsSchema>;

export const extractRunSettingsSchema = z
  .object({
    writeTables: z.boolean().default(true),
    showStats: z.boolean().default(false),
  })
  .strict();

export type ExtractRunSettings = z.infer<typeof extractRunSettingsSchema>;
export type ExtractRunSettingsInput = z.input<typeof extractRunSettingsSchema>;
