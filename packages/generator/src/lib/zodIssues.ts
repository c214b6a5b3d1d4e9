import type { z } from "zod";
import { InvalidArgumentError } from "./errors";

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

export function parseOrThrow<TOutput>(schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>, input: unknown): TOutput {
  const parsed = schema.safeParse(input);

  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues.map(formatIssue);
  throw new InvalidArgumentError(issues[0] ?? "Invalid input.", issues);
}
