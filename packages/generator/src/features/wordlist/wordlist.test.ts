import { describe, expect, it, vi } from "vitest";
import type { GeneratorLogger } from "../../lib/logger";
import { loadBundledWordlist, parseWordlist } from "./wordlist";

function spyLogger(): GeneratorLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("parseWordlist", () => {
  it("reads one word per line and lowercases entries", () => {
    expect(parseWordlist("Maple\r\nharbor\n\n  lantern  \n")).toEqual(["maple", "harbor", "lantern"]);
  });

  it("takes the last token from dice-numbered lines", () => {
    expect(parseWordlist("11111\tacid\n11112\tbrass\n")).toEqual(["acid", "brass"]);
  });

  it("drops repeats and non-alphabetic entries and reports them", () => {
    const logger = spyLogger();

    expect(parseWordlist("pine\ncafé\npine\nx-ray\noak", logger)).toEqual(["pine", "oak"]);
    expect(logger.warn).toHaveBeenCalledWith("Dropped word list entries", { dropped: 3, kept: 2 });
  });

  it("returns a frozen list", () => {
    expect(Object.isFrozen(parseWordlist("fern"))).toBe(true);
  });
});

describe("loadBundledWordlist", () => {
  it("ships a usable list of plain lowercase words", () => {
    const wordlist = loadBundledWordlist();

    expect(wordlist.length).toBeGreaterThan(300);
    expect(wordlist.every((word) => /^[a-z]+$/.test(word))).toBe(true);
    expect(new Set(wordlist).size).toBe(wordlist.length);
  });
});
