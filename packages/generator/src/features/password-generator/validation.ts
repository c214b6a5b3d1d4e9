import { z } from "zod";
import { parseOrThrow } from "../../lib/zodIssues";

export const PASSWORD_LENGTH_MAX = 1024;
export const PASSWORD_CATEGORY_COUNT_MAX = PASSWORD_LENGTH_MAX;

const countSchema = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number.` })
    .int(`${label} must be a whole number.`)
    .min(0, `${label} cannot be negative.`)
    .max(PASSWORD_CATEGORY_COUNT_MAX, `${label} cannot exceed ${PASSWORD_CATEGORY_COUNT_MAX}.`);

export const generationRequestSchema = z.object({
  length: z
    .number({ invalid_type_error: "Length must be a number." })
    .int("Length must be a whole number.")
    .min(0, "Length cannot be negative.")
    .max(PASSWORD_LENGTH_MAX, `Length cannot exceed ${PASSWORD_LENGTH_MAX}.`),
  lowercase: z.boolean(),
  uppercase: z.boolean(),
  digits: countSchema("Digit count"),
  symbols: countSchema("Symbol count"),
  excludeAmbiguous: z.boolean(),
  customSymbols: z.string().optional()
});

export type GenerationRequest = z.infer<typeof generationRequestSchema>;

export function parseGenerationRequest(input: unknown): GenerationRequest {
  return parseOrThrow(generationRequestSchema, input);
}
