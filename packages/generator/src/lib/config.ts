import { z } from "zod";
import { parseOrThrow } from "./zodIssues";

export const DEFAULT_WORDLIST_TIMEOUT_MS = 10_000;

const generatorEnvSchema = z.object({
  KEYSMITH_WORDLIST_URL: z
    .string()
    .trim()
    .url("KEYSMITH_WORDLIST_URL must be an absolute URL.")
    .optional()
    .or(z.literal("").transform(() => undefined)),
  KEYSMITH_WORDLIST_TIMEOUT_MS: z.coerce
    .number()
    .int("KEYSMITH_WORDLIST_TIMEOUT_MS must be a whole number of milliseconds.")
    .positive("KEYSMITH_WORDLIST_TIMEOUT_MS must be positive.")
    .default(DEFAULT_WORDLIST_TIMEOUT_MS)
});

export type GeneratorConfig = {
  wordlistUrl?: string;
  wordlistTimeoutMs: number;
};

export function loadGeneratorConfig(env: Record<string, string | undefined> = process.env): GeneratorConfig {
  const parsed = parseOrThrow(generatorEnvSchema, {
    KEYSMITH_WORDLIST_URL: env.KEYSMITH_WORDLIST_URL,
    KEYSMITH_WORDLIST_TIMEOUT_MS: env.KEYSMITH_WORDLIST_TIMEOUT_MS
  });

  return {
    wordlistUrl: parsed.KEYSMITH_WORDLIST_URL,
    wordlistTimeoutMs: parsed.KEYSMITH_WORDLIST_TIMEOUT_MS
  };
}
