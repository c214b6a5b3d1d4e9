import { createStore } from "zustand/vanilla";
import { errorMessage, WordlistLoadCancelledError } from "../../lib/errors";
import { consoleLogger, type GeneratorLogger } from "../../lib/logger";
import {
  DEFAULT_PASSPHRASE_REQUEST,
  estimatePassphraseStrength,
  generatePassphrase
} from "../passphrase-generator/generator";
import type { PassphraseRequest } from "../passphrase-generator/validation";
import { DEFAULT_PASSWORD_REQUEST, estimatePasswordStrength, generatePassword } from "../password-generator/generator";
import type { GenerationRequest } from "../password-generator/validation";
import type { RandomSource } from "../random/randomSource";
import type { GeneratorStrength } from "../strength/strength";
import type { WordlistCache, WordlistStatus } from "../wordlist/wordlistCache";

export type GeneratorMode = "password" | "passphrase";

export const WORDLIST_PENDING_MESSAGE = "Word list is still loading.";

export type GeneratorSessionState = {
  mode: GeneratorMode;
  passwordRequest: GenerationRequest;
  passphraseRequest: PassphraseRequest;
  generatedValue: string;
  generationError: string | null;
  wordlistStatus: WordlistStatus;
  wordlistError: string | null;
  strength: GeneratorStrength;
  setMode: (mode: GeneratorMode) => void;
  updatePasswordRequest: (patch: Partial<GenerationRequest>) => void;
  updatePassphraseRequest: (patch: Partial<PassphraseRequest>) => void;
  regenerate: () => void;
  loadWordlist: () => Promise<void>;
};

export type GeneratorSessionOptions = {
  random: RandomSource;
  wordlistCache: WordlistCache;
  logger?: GeneratorLogger;
  initialPasswordRequest?: GenerationRequest;
  initialPassphraseRequest?: PassphraseRequest;
};

/**
 * Headless state for an interactive generator surface.
 *
 * The word list is owned by the caller through `wordlistCache`; passphrase
 * generation waits for it and a pending load is cancelled when the user leaves
 * passphrase mode. A failed generation keeps the previous value.
 */
export function createGeneratorSession(options: GeneratorSessionOptions) {
  const { random, wordlistCache } = options;
  const logger = options.logger ?? consoleLogger;

  return createStore<GeneratorSessionState>((set, get) => {
    function strengthFor(state: Pick<GeneratorSessionState, "mode" | "passwordRequest" | "passphraseRequest">) {
      return state.mode === "password"
        ? estimatePasswordStrength(state.passwordRequest)
        : estimatePassphraseStrength(state.passphraseRequest, wordlistCache.current?.length ?? 0);
    }

    function regenerate() {
      const { mode, passwordRequest, passphraseRequest } = get();

      try {
        let nextValue: string;
        if (mode === "password") {
          nextValue = generatePassword(passwordRequest, random);
        } else {
          const wordlist = wordlistCache.current;
          if (!wordlist) {
            set({ generationError: WORDLIST_PENDING_MESSAGE });
            return;
          }
          nextValue = generatePassphrase(passphraseRequest, wordlist, random);
        }

        set({ generatedValue: nextValue, generationError: null });
      } catch (error) {
        set({ generationError: errorMessage(error, "Could not generate a value.") });
      }
    }

    async function loadWordlist() {
      set({ wordlistStatus: "loading", wordlistError: null });

      try {
        await wordlistCache.load();
      } catch (error) {
        if (error instanceof WordlistLoadCancelledError) {
          set({ wordlistStatus: wordlistCache.status });
          return;
        }
        const message = errorMessage(error, "Could not load the word list.");
        logger.warn("Passphrase mode unavailable", { error: message });
        set({ wordlistStatus: "error", wordlistError: message });
        if (get().mode === "passphrase") {
          set({ generationError: message });
        }
        return;
      }

      set({ wordlistStatus: "ready" });
      if (get().mode === "passphrase") {
        set((state) => ({ strength: strengthFor(state) }));
        regenerate();
      }
    }

    function setMode(mode: GeneratorMode) {
      if (mode === get().mode) {
        return;
      }

      if (mode === "password" && wordlistCache.cancel()) {
        set({ wordlistStatus: wordlistCache.status });
      }

      set((state) => ({ mode, strength: strengthFor({ ...state, mode }) }));

      if (mode === "passphrase" && !wordlistCache.current) {
        set({ generationError: WORDLIST_PENDING_MESSAGE });
        void loadWordlist();
        return;
      }

      regenerate();
    }

    function updatePasswordRequest(patch: Partial<GenerationRequest>) {
      set((state) => {
        const passwordRequest = { ...state.passwordRequest, ...patch };
        return { passwordRequest, strength: strengthFor({ ...state, passwordRequest }) };
      });
      if (get().mode === "password") {
        regenerate();
      }
    }

    function updatePassphraseRequest(patch: Partial<PassphraseRequest>) {
      set((state) => {
        const passphraseRequest = { ...state.passphraseRequest, ...patch };
        return { passphraseRequest, strength: strengthFor({ ...state, passphraseRequest }) };
      });
      if (get().mode === "passphrase") {
        regenerate();
      }
    }

    const passwordRequest = options.initialPasswordRequest ?? DEFAULT_PASSWORD_REQUEST;
    const passphraseRequest = options.initialPassphraseRequest ?? DEFAULT_PASSPHRASE_REQUEST;

    return {
      mode: "password",
      passwordRequest,
      passphraseRequest,
      generatedValue: "",
      generationError: null,
      wordlistStatus: wordlistCache.status,
      wordlistError: null,
      strength: strengthFor({ mode: "password", passwordRequest, passphraseRequest }),
      setMode,
      updatePasswordRequest,
      updatePassphraseRequest,
      regenerate,
      loadWordlist
    };
  });
}

export type GeneratorSession = ReturnType<typeof createGeneratorSession>;
