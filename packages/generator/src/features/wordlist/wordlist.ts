import bundledWords from "./words.json";
import { type GeneratorLogger, silentLogger } from "../../lib/logger";

/** Read-only, caller-owned list of lowercase words. */
export type Wordlist = readonly string[];

const WORD_PATTERN = /^[a-z]+$/;

/**
 * Parses a newline-separated word list.
 *
 * Dice-numbered lines (`11111\tword`) keep only their last token. Entries that
 * are not plain lowercase ASCII after lowercasing are dropped, as are repeats.
 */
export function parseWordlist(text: string, logger: GeneratorLogger = silentLogger): Wordlist {
  const seen = new Set<string>();
  let dropped = 0;

  for (const line of text.split(/\r?\n/)) {
    const tokens = line.trim().split(/\s+/);
    const candidate = (tokens[tokens.length - 1] ?? "").toLowerCase();

    if (!candidate) {
      continue;
    }
    if (!WORD_PATTERN.test(candidate) || seen.has(candidate)) {
      dropped += 1;
      continue;
    }
    seen.add(candidate);
  }

  if (dropped > 0) {
    logger.warn("Dropped word list entries", { dropped, kept: seen.size });
  }

  return Object.freeze([...seen]);
}

export function loadBundledWordlist(): Wordlist {
  return parseWordlist(bundledWords.join("\n"));
}
