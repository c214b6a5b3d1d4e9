import { DEFAULT_WORDLIST_TIMEOUT_MS, type GeneratorConfig } from "../../lib/config";
import { WordlistLoadCancelledError, WordlistLoadError } from "../../lib/errors";
import { consoleLogger, type GeneratorLogger } from "../../lib/logger";
import { loadBundledWordlist, parseWordlist, type Wordlist } from "./wordlist";

export type WordlistLoader = (signal: AbortSignal) => Promise<Wordlist>;

export type FetchLike = (input: string, init?: { signal?: AbortSignal; headers?: Record<string, string> }) => Promise<Response>;

export type HttpWordlistLoaderOptions = {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: GeneratorLogger;
};

export function createBundledWordlistLoader(): WordlistLoader {
  return async (signal) => {
    if (signal.aborted) {
      throw new WordlistLoadCancelledError();
    }
    return loadBundledWordlist();
  };
}

/**
 * Downloads a plain-text word list. The request is aborted when either the
 * caller's signal fires or `timeoutMs` elapses.
 */
export function createHttpWordlistLoader(url: string, options: HttpWordlistLoaderOptions = {}): WordlistLoader {
  const timeoutMs = options.timeoutMs ?? DEFAULT_WORDLIST_TIMEOUT_MS;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const logger = options.logger ?? consoleLogger;

  return async (signal) => {
    const controller = new AbortController();
    let timedOut = false;
    const onAbort = () => controller.abort();
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    if (signal.aborted) {
      controller.abort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    try {
      logger.debug("Downloading word list", { url });
      const response = await fetchImpl(url, {
        signal: controller.signal,
        headers: { Accept: "text/plain" }
      });

      if (!response.ok) {
        throw new WordlistLoadError(`Word list download failed with status ${response.status}.`, {
          status: response.status
        });
      }

      const wordlist = parseWordlist(await response.text(), logger);
      if (wordlist.length === 0) {
        throw new WordlistLoadError("Downloaded word list contains no usable words.", { status: response.status });
      }

      return wordlist;
    } catch (error) {
      if (error instanceof WordlistLoadError) {
        throw error;
      }
      if (timedOut) {
        throw new WordlistLoadError(`Word list download timed out after ${timeoutMs}ms.`, { cause: error });
      }
      if (signal.aborted) {
        throw new WordlistLoadCancelledError();
      }
      throw new WordlistLoadError("Word list download failed.", { cause: error });
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
    }
  };
}

export function createDefaultWordlistLoader(config: GeneratorConfig, logger: GeneratorLogger = consoleLogger): WordlistLoader {
  if (!config.wordlistUrl) {
    return createBundledWordlistLoader();
  }

  return createHttpWordlistLoader(config.wordlistUrl, { timeoutMs: config.wordlistTimeoutMs, logger });
}
