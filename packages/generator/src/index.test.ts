import { describe, expect, it, vi } from "vitest";
import {
  createDefaultWordlistLoader,
  createGeneratorSession,
  createSodiumRandomSource,
  loadGeneratorConfig,
  silentLogger,
  WordlistCache
} from "./index";

describe("package entry point", () => {
  it("wires config, word list and session together", async () => {
    const config = loadGeneratorConfig({});
    const wordlistCache = new WordlistCache(createDefaultWordlistLoader(config, silentLogger), silentLogger);
    const store = createGeneratorSession({ random: await createSodiumRandomSource(), wordlistCache, logger: silentLogger });

    store.getState().setMode("passphrase");
    await vi.waitFor(() => expect(store.getState().wordlistStatus).toBe("ready"));

    const { generatedValue, passphraseRequest } = store.getState();
    expect(generatedValue.split(passphraseRequest.separator)).toHaveLength(passphraseRequest.wordCount);
  });
});
