import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../../lib/errors";
import { createRandomSource, createSodiumRandomSource, MAX_POOL_SIZE } from "./randomSource";
import { lastIndexRandom, sequenceRandom } from "../../testing/randomSequence";

describe("random source", () => {
  it("rejects pool sizes that are not positive integers", () => {
    const random = lastIndexRandom();

    expect(() => random.uniformIndex(0)).toThrow(InvalidArgumentError);
    expect(() => random.uniformIndex(-3)).toThrow(InvalidArgumentError);
    expect(() => random.uniformIndex(2.5)).toThrow(InvalidArgumentError);
    expect(() => random.uniformIndex(MAX_POOL_SIZE + 1)).toThrow(InvalidArgumentError);
  });

  it("throws when the underlying function leaves the requested range", () => {
    const random = createRandomSource((upperBound) => upperBound);

    expect(() => random.uniformIndex(10)).toThrow("Random source returned 10 for a pool of 10.");
  });

  it("shuffles with Fisher-Yates without touching the input", () => {
    const input = ["a", "b", "c", "d"] as const;
    const shuffled = sequenceRandom([0, 0, 0]).shuffle(input);

    // i=3 swaps with 0, i=2 swaps with 0, i=1 swaps with 0
    expect(shuffled).toEqual(["b", "c", "d", "a"]);
    expect(input).toEqual(["a", "b", "c", "d"]);
  });

  it("leaves order intact when every draw picks the current position", () => {
    expect(lastIndexRandom().shuffle([1, 2, 3, 4, 5])).toEqual([1, 2, 3, 4, 5]);
  });

  it("draws indices within range from libsodium", async () => {
    const random = await createSodiumRandomSource();
    const seen = new Set<number>();

    for (let draw = 0; draw < 500; draw += 1) {
      const value = random.uniformIndex(6);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(6);
      seen.add(value);
    }

    expect(seen.size).toBe(6);
  });

  it("keeps every element when shuffling with libsodium", async () => {
    const random = await createSodiumRandomSource();
    const items = Array.from({ length: 32 }, (_, index) => index);

    expect([...random.shuffle(items)].sort((a, b) => a - b)).toEqual(items);
  });
});
