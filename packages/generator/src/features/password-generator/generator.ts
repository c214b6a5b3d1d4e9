import { ValidationError } from "../../lib/errors";
import type { RandomSource } from "../random/randomSource";
import { strengthFromEntropy, type GeneratorStrength } from "../strength/strength";
import { type GenerationRequest, parseGenerationRequest } from "./validation";

export const PASSWORD_CHAR_SETS = {
  lowercase: "abcdefghijklmnopqrstuvwxyz",
  uppercase: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  digits: "0123456789",
  symbols: "!@#$%^&*()-_=+[]{};:,.?/<>~"
} as const;

export const AMBIGUOUS_PASSWORD_CHARS: ReadonlySet<string> = new Set(["l", "1", "I", "O", "0"]);

export type PasswordCategory = keyof typeof PASSWORD_CHAR_SETS;

export type CharacterPool = {
  subsets: Record<PasswordCategory, readonly string[]>;
  requested: Record<PasswordCategory, boolean>;
  fillPool: readonly string[];
};

export const DEFAULT_PASSWORD_REQUEST: GenerationRequest = {
  length: 20,
  lowercase: true,
  uppercase: true,
  digits: 2,
  symbols: 2,
  excludeAmbiguous: false
};

const CATEGORY_ORDER: readonly PasswordCategory[] = ["lowercase", "uppercase", "digits", "symbols"];

const CATEGORY_LABELS: Record<PasswordCategory, string> = {
  lowercase: "Lowercase",
  uppercase: "Uppercase",
  digits: "Digit",
  symbols: "Symbol"
};

/** Splits by code point so characters outside the BMP stay whole. */
function uniqueCharacters(value: string): string[] {
  return [...new Set([...value].filter((char) => char.trim() !== ""))];
}

function withoutAmbiguous(charset: readonly string[]): string[] {
  return charset.filter((char) => !AMBIGUOUS_PASSWORD_CHARS.has(char));
}

/**
 * Resolves the per-category character subsets and the fill pool for a request.
 *
 * Symbols are never filtered for ambiguity. A `customSymbols` value replaces the
 * default symbol set entirely, even when it contains no usable characters.
 */
export function resolveCharacterPool(request: GenerationRequest): CharacterPool {
  const symbols = uniqueCharacters(request.customSymbols ?? PASSWORD_CHAR_SETS.symbols);
  const letterOrDigit = (charset: string) => (request.excludeAmbiguous ? withoutAmbiguous([...charset]) : [...charset]);

  const subsets: Record<PasswordCategory, readonly string[]> = {
    lowercase: letterOrDigit(PASSWORD_CHAR_SETS.lowercase),
    uppercase: letterOrDigit(PASSWORD_CHAR_SETS.uppercase),
    digits: letterOrDigit(PASSWORD_CHAR_SETS.digits),
    symbols
  };

  const requested: Record<PasswordCategory, boolean> = {
    lowercase: request.lowercase,
    uppercase: request.uppercase,
    digits: request.digits > 0,
    symbols: request.symbols > 0
  };

  const fillPool = CATEGORY_ORDER.filter((category) => requested[category]).flatMap((category) => subsets[category]);

  return { subsets, requested, fillPool };
}

export function minimumPasswordLength(request: GenerationRequest): number {
  return request.digits + request.symbols + (request.lowercase ? 1 : 0) + (request.uppercase ? 1 : 0);
}

function assertSatisfiable(request: GenerationRequest, pool: CharacterPool): void {
  for (const category of CATEGORY_ORDER) {
    if (pool.requested[category] && pool.subsets[category].length === 0) {
      throw new ValidationError("category-empty", `${CATEGORY_LABELS[category]} characters are required but none are available.`);
    }
  }

  const minimumRequired = minimumPasswordLength(request);
  if (request.length < minimumRequired) {
    throw new ValidationError(
      "length-too-short",
      `Length ${request.length} is too short for the required characters (minimum ${minimumRequired}).`
    );
  }

  if (pool.fillPool.length === 0) {
    throw new ValidationError("nothing-selected", "Select at least one character set.");
  }
}

function pickCharacter(charset: readonly string[], random: RandomSource): string {
  return charset[random.uniformIndex(charset.length)] ?? "";
}

function pickCharacters(charset: readonly string[], count: number, random: RandomSource): string[] {
  return Array.from({ length: count }, () => pickCharacter(charset, random));
}

/**
 * Generates a password of exactly `request.length` characters.
 *
 * Mandatory characters are drawn first (digits, symbols, one lowercase, one
 * uppercase), the rest is filled from the combined pool, and the whole sequence
 * is shuffled so the mandatory characters have no fixed position.
 *
 * @throws InvalidArgumentError for structurally invalid requests.
 * @throws ValidationError when the request cannot be satisfied.
 */
export function generatePassword(input: GenerationRequest, random: RandomSource): string {
  const request = parseGenerationRequest(input);
  const pool = resolveCharacterPool(request);
  assertSatisfiable(request, pool);

  const generated = [
    ...pickCharacters(pool.subsets.digits, request.digits, random),
    ...pickCharacters(pool.subsets.symbols, request.symbols, random),
    ...pickCharacters(pool.subsets.lowercase, request.lowercase ? 1 : 0, random),
    ...pickCharacters(pool.subsets.uppercase, request.uppercase ? 1 : 0, random)
  ];

  generated.push(...pickCharacters(pool.fillPool, request.length - generated.length, random));

  return random.shuffle(generated).join("");
}

export function estimatePasswordEntropyBits(request: GenerationRequest): number {
  const pool = resolveCharacterPool(request);
  const poolSize = new Set(pool.fillPool).size;

  if (poolSize <= 0 || request.length <= 0) {
    return 0;
  }

  return request.length * Math.log2(poolSize);
}

export function estimatePasswordStrength(request: GenerationRequest): GeneratorStrength {
  return strengthFromEntropy(estimatePasswordEntropyBits(request));
}
