import { afterEach, describe, expect, it, vi } from "vitest";
import { WordlistLoadCancelledError, WordlistLoadError } from "../../lib/errors";
import { silentLogger } from "../../lib/logger";
import {
  createBundledWordlistLoader,
  createDefaultWordlistLoader,
  createHttpWordlistLoader,
  type FetchLike
} from "./loaders";

function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/plain" } });
}

/** Never settles on its own; rejects once the request signal aborts. */
const hangingFetch: FetchLike = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });

describe("createHttpWordlistLoader", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("parses the downloaded list", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => textResponse("11111\tcobalt\n11112\tsaffron\n"));
    const loader = createHttpWordlistLoader("https://words.test/list.txt", { fetchImpl, logger: silentLogger });

    await expect(loader(new AbortController().signal)).resolves.toEqual(["cobalt", "saffron"]);
    expect(fetchImpl).toHaveBeenCalledWith("https://words.test/list.txt", expect.objectContaining({
      headers: { Accept: "text/plain" }
    }));
  });

  it("carries the HTTP status of a failed download", async () => {
    const loader = createHttpWordlistLoader("https://words.test/list.txt", {
      fetchImpl: async () => textResponse("missing", 404)
    });

    const error = await loader(new AbortController().signal).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(WordlistLoadError);
    expect(error).toMatchObject({ status: 404, message: "Word list download failed with status 404." });
  });

  it("rejects a list with no usable words", async () => {
    const loader = createHttpWordlistLoader("https://words.test/list.txt", {
      fetchImpl: async () => textResponse("123\n$$$\n"),
      logger: silentLogger
    });

    await expect(loader(new AbortController().signal)).rejects.toThrow("Downloaded word list contains no usable words.");
  });

  it("reports cancellation when the caller aborts", async () => {
    const loader = createHttpWordlistLoader("https://words.test/list.txt", { fetchImpl: hangingFetch });
    const controller = new AbortController();

    const pending = loader(controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(WordlistLoadCancelledError);
  });

  it("times out slow downloads", async () => {
    vi.useFakeTimers();
    const loader = createHttpWordlistLoader("https://words.test/list.txt", { fetchImpl: hangingFetch, timeoutMs: 50 });

    const pending = loader(new AbortController().signal);
    const assertion = expect(pending).rejects.toThrow("Word list download timed out after 50ms.");
    await vi.advanceTimersByTimeAsync(50);

    await assertion;
  });
});

describe("createDefaultWordlistLoader", () => {
  it("falls back to the bundled list without a configured URL", async () => {
    const loader = createDefaultWordlistLoader({ wordlistTimeoutMs: 1000 }, silentLogger);

    const wordlist = await loader(new AbortController().signal);
    expect(wordlist.length).toBeGreaterThan(0);
  });

  it("does not load the bundled list for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createBundledWordlistLoader()(controller.signal)).rejects.toBeInstanceOf(WordlistLoadCancelledError);
  });
});
