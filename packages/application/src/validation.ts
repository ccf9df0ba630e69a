import { type ZodTypeAny } from "zod";
import { BadRequestError } from "./errors.js";

export function formatZodIssues(
  issues: { path: PropertyKey[]; message: string }[],
): string {
  return issues
    .map((issue) => {
      const field =
        issue.path.length > 0
          ? issue.path.map((part) => String(part)).join(".")
          : "value";
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}

export function parseOrThrowBadRequest<TSchema extends ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  message = "Invalid input",
): TSchema["_output"] {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    const details = formatZodIssues(parsed.error.issues);
    throw new BadRequestError(`${message} - ${details}`);
  }

  return parsed.data;
}
