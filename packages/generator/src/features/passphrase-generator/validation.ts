import { z } from "zod";
import { parseOrThrow } from "../../lib/zodIssues";

const insertCountSchema = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number.` })
    .int(`${label} must be a whole number.`)
    .min(0, `${label} cannot be negative.`);

// Word count has no upper bound here; the word list size bounds it.
export const passphraseRequestSchema = z.object({
  wordCount: z
    .number({ invalid_type_error: "Word count must be a number." })
    .int("Word count must be a whole number.")
    .min(1, "Word count must be at least 1."),
  separator: z.string(),
  capitalize: z.boolean(),
  digits: insertCountSchema("Digit count"),
  symbols: insertCountSchema("Symbol count")
});

export type PassphraseRequest = z.infer<typeof passphraseRequestSchema>;

export function parsePassphraseRequest(input: unknown): PassphraseRequest {
  return parseOrThrow(passphraseRequestSchema, input);
}
