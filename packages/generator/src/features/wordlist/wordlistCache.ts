import { errorMessage, ValidationError, WordlistLoadCancelledError } from "../../lib/errors";
import { consoleLogger, type GeneratorLogger } from "../../lib/logger";
import type { WordlistLoader } from "./loaders";
import type { Wordlist } from "./wordlist";

export type WordlistStatus = "idle" | "loading" | "ready" | "error";

type InFlightLoad = {
  controller: AbortController;
  promise: Promise<Wordlist>;
};

/**
 * Lazily loaded word list held by its caller.
 *
 * At most one load runs at a time; concurrent `load()` calls share it. A
 * cancelled load never populates the cache, even if its loader ignores the
 * abort signal and resolves later.
 */
export class WordlistCache {
  private wordlist: Wordlist | null = null;
  private inFlight: InFlightLoad | null = null;
  private lastError: unknown = null;
  private readonly loader: WordlistLoader;
  private readonly logger: GeneratorLogger;

  constructor(loader: WordlistLoader, logger: GeneratorLogger = consoleLogger) {
    this.loader = loader;
    this.logger = logger;
  }

  get current(): Wordlist | null {
    return this.wordlist;
  }

  get status(): WordlistStatus {
    if (this.inFlight) return "loading";
    if (this.wordlist) return "ready";
    if (this.lastError) return "error";
    return "idle";
  }

  load(): Promise<Wordlist> {
    if (this.wordlist) {
      return Promise.resolve(this.wordlist);
    }
    if (this.inFlight) {
      return this.inFlight.promise;
    }

    const controller = new AbortController();
    this.lastError = null;
    this.logger.info("Loading word list");

    const promise = this.loader(controller.signal).then(
      (wordlist) => {
        if (controller.signal.aborted) {
          throw new WordlistLoadCancelledError();
        }
        if (wordlist.length === 0) {
          throw new ValidationError("wordlist-empty", "Passphrase word list is empty.");
        }
        this.wordlist = wordlist;
        this.logger.info("Word list loaded", { words: wordlist.length });
        return wordlist;
      },
      (error: unknown) => {
        if (controller.signal.aborted) {
          throw new WordlistLoadCancelledError();
        }
        throw error;
      }
    );

    const entry: InFlightLoad = { controller, promise };
    this.inFlight = entry;

    void promise.then(
      () => this.settle(entry, null),
      (error: unknown) => this.settle(entry, error)
    );

    return promise;
  }

  /** Aborts the in-flight load, if any. Returns whether a load was cancelled. */
  cancel(): boolean {
    const entry = this.inFlight;
    if (!entry) {
      return false;
    }

    this.inFlight = null;
    entry.controller.abort();
    this.logger.info("Word list load cancelled");
    return true;
  }

  clear(): void {
    this.cancel();
    this.wordlist = null;
    this.lastError = null;
  }

  private settle(entry: InFlightLoad, error: unknown): void {
    if (this.inFlight !== entry) {
      return;
    }

    this.inFlight = null;
    if (error !== null && !(error instanceof WordlistLoadCancelledError)) {
      this.lastError = error;
      this.logger.error("Word list load failed", { error: errorMessage(error, "Unknown error") });
    }
  }
}
