/**
 * Password and passphrase generation backed by a cryptographically secure
 * random source, plus the word list and session plumbing an interactive
 * surface needs around it.
 *
 * @example
 * ```typescript
 * import { createSodiumRandomSource, generatePassword, DEFAULT_PASSWORD_REQUEST } from "@keysmith/generator";
 *
 * const random = await createSodiumRandomSource();
 * const password = generatePassword({ ...DEFAULT_PASSWORD_REQUEST, length: 24 }, random);
 * ```
 */

// Random source
export type { RandomSource, UniformInt } from "./features/random/randomSource";
export { createRandomSource, createSodiumRandomSource, MAX_POOL_SIZE } from "./features/random/randomSource";

// Password generator
export type { GenerationRequest } from "./features/password-generator/validation";
export {
  generationRequestSchema,
  parseGenerationRequest,
  PASSWORD_LENGTH_MAX
} from "./features/password-generator/validation";
export type { CharacterPool, PasswordCategory } from "./features/password-generator/generator";
export {
  AMBIGUOUS_PASSWORD_CHARS,
  DEFAULT_PASSWORD_REQUEST,
  estimatePasswordEntropyBits,
  estimatePasswordStrength,
  generatePassword,
  minimumPasswordLength,
  PASSWORD_CHAR_SETS,
  resolveCharacterPool
} from "./features/password-generator/generator";

// Passphrase generator
export type { PassphraseRequest } from "./features/passphrase-generator/validation";
export { parsePassphraseRequest, passphraseRequestSchema } from "./features/passphrase-generator/validation";
export {
  DEFAULT_PASSPHRASE_REQUEST,
  estimatePassphraseEntropyBits,
  estimatePassphraseStrength,
  generatePassphrase,
  PASSPHRASE_DIGITS,
  PASSPHRASE_SYMBOLS
} from "./features/passphrase-generator/generator";

// Strength
export type { GeneratorStrength } from "./features/strength/strength";
export { strengthFromEntropy } from "./features/strength/strength";

// Word lists
export type { Wordlist } from "./features/wordlist/wordlist";
export { loadBundledWordlist, parseWordlist } from "./features/wordlist/wordlist";
export type { FetchLike, HttpWordlistLoaderOptions, WordlistLoader } from "./features/wordlist/loaders";
export {
  createBundledWordlistLoader,
  createDefaultWordlistLoader,
  createHttpWordlistLoader
} from "./features/wordlist/loaders";
export type { WordlistStatus } from "./features/wordlist/wordlistCache";
export { WordlistCache } from "./features/wordlist/wordlistCache";

// Session
export type {
  GeneratorMode,
  GeneratorSession,
  GeneratorSessionOptions,
  GeneratorSessionState
} from "./features/session/store";
export { createGeneratorSession, WORDLIST_PENDING_MESSAGE } from "./features/session/store";

// Ambient
export type { GeneratorConfig } from "./lib/config";
export { DEFAULT_WORDLIST_TIMEOUT_MS, loadGeneratorConfig } from "./lib/config";
export type { ValidationErrorCode } from "./lib/errors";
export { InvalidArgumentError, ValidationError, WordlistLoadCancelledError, WordlistLoadError } from "./lib/errors";
export type { GeneratorLogger } from "./lib/logger";
export { consoleLogger, silentLogger } from "./lib/logger";
