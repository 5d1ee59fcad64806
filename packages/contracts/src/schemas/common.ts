import { z } from "zod";
import { isValidTimeZone } from "@loctext/shared";

export const nonEmptyStringSchema = z.string().trim().min(1);

export const timeZoneSchema = nonEmptyStringSchema.refine(
  isValidTimeZone,
  "Time zone must be an IANA zone name, utc or local",
);

export const templateSyntaxSchema = z.enum(["HTML", "TEXT"]);

export const templateVersionSchema = z.union([z.literal(1), z.literal(2)]);

export const translationFunctionNameSchema = z
  .string()
  .regex(/^\w+$/, "Translation function must be a single word");

export const pathListSchema = z.union([
  nonEmptyStringSchema,
  z.array(nonEmptyStringSchema),
]);
