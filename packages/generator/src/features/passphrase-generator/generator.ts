import { ValidationError } from "../../lib/errors";
import type { RandomSource } from "../random/randomSource";
import { strengthFromEntropy, type GeneratorStrength } from "../strength/strength";
import type { Wordlist } from "../wordlist/wordlist";
import { type PassphraseRequest, parsePassphraseRequest } from "./validation";

export const PASSPHRASE_DIGITS = "0123456789";
export const PASSPHRASE_SYMBOLS = "!@#$%&*?";

export const DEFAULT_PASSPHRASE_REQUEST: PassphraseRequest = {
  wordCount: 4,
  separator: "-",
  capitalize: true,
  digits: 1,
  symbols: 1
};

function pickCharacters(charset: string, count: number, random: RandomSource): string[] {
  return Array.from({ length: count }, () => charset.charAt(random.uniformIndex(charset.length)));
}

/** Draws `count` words using a partial Fisher-Yates over word positions. */
function sampleWords(wordlist: readonly string[], count: number, random: RandomSource): string[] {
  const positions = Array.from({ length: wordlist.length }, (_, index) => index);
  const selected: string[] = [];

  for (let index = 0; index < count; index += 1) {
    const swapIndex = index + random.uniformIndex(positions.length - index);
    const picked = positions[swapIndex] ?? swapIndex;
    positions[swapIndex] = positions[index] ?? index;
    positions[index] = picked;
    selected.push(wordlist[picked] ?? "");
  }

  return selected;
}

function capitalizeWord(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Generates a passphrase of distinct words from `wordlist`. Repeated entries in
 * the list count once.
 *
 * Each word in turn receives at most one extra digit or symbol, attached
 * directly before or after it. Extras left over once every word has one are
 * appended to the end without a separator.
 *
 * @throws InvalidArgumentError for structurally invalid requests.
 * @throws ValidationError when the word list is empty or too short.
 */
export function generatePassphrase(input: PassphraseRequest, wordlist: Wordlist, random: RandomSource): string {
  const request = parsePassphraseRequest(input);

  if (wordlist.length === 0) {
    throw new ValidationError("wordlist-empty", "Passphrase word list is empty.");
  }

  const candidates = [...new Set(wordlist)];
  if (request.wordCount > candidates.length) {
    throw new ValidationError(
      "word-count-exceeds-wordlist",
      `Cannot pick ${request.wordCount} distinct words from a list of ${candidates.length}.`
    );
  }

  const words = sampleWords(candidates, request.wordCount, random).map((word) =>
    request.capitalize ? capitalizeWord(word) : word
  );

  const extras = random.shuffle([
    ...pickCharacters(PASSPHRASE_DIGITS, request.digits, random),
    ...pickCharacters(PASSPHRASE_SYMBOLS, request.symbols, random)
  ]);

  let nextExtra = 0;
  const decorated = words.map((word) => {
    const extra = extras[nextExtra];
    if (extra === undefined) {
      return word;
    }
    nextExtra += 1;
    return random.uniformIndex(2) === 0 ? `${extra}${word}` : `${word}${extra}`;
  });

  return decorated.join(request.separator) + extras.slice(nextExtra).join("");
}

function log2Permutations(size: number, count: number): number {
  let bits = 0;
  for (let index = 0; index < count; index += 1) {
    bits += Math.log2(size - index);
  }
  return bits;
}

export function estimatePassphraseEntropyBits(request: PassphraseRequest, wordlistSize: number): number {
  if (wordlistSize <= 1 || request.wordCount > wordlistSize || request.wordCount < 1) {
    return 0;
  }

  return (
    log2Permutations(wordlistSize, request.wordCount) +
    request.digits * Math.log2(PASSPHRASE_DIGITS.length) +
    request.symbols * Math.log2(PASSPHRASE_SYMBOLS.length)
  );
}

export function estimatePassphraseStrength(request: PassphraseRequest, wordlistSize: number): GeneratorStrength {
  return strengthFromEntropy(estimatePassphraseEntropyBits(request, wordlistSize));
}
