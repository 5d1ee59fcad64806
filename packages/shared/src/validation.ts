import { type ZodTypeAny } from "zod";
import { ConfigurationError } from "./errors/index.js";

function formatZodError(
  issues: { path: PropertyKey[]; message: string }[],
): string {
  return issues
    .map((issue) => {
      const field =
        issue.path.length > 0
          ? issue.path.map((part) => String(part)).join(".")
          : "options";
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}

export function parseOrThrowConfig<TSchema extends ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  message = "Invalid options",
): TSchema["_output"] {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    const details = formatZodError(parsed.error.issues);
    throw new ConfigurationError(`${message} - ${details}`);
  }

  return parsed.data;
}
