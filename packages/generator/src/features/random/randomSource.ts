import sodium from "libsodium-wrappers-sumo";
import { InvalidArgumentError } from "../../lib/errors";

/** Largest pool size libsodium's `randombytes_uniform` accepts. */
export const MAX_POOL_SIZE = 0xffffffff;

/** Returns an integer in `[0, upperBound)`. */
export type UniformInt = (upperBound: number) => number;

export interface RandomSource {
  uniformIndex(poolSize: number): number;
  shuffle<T>(items: readonly T[]): T[];
}

type SodiumModule = typeof sodium;

let sodiumReadyPromise: Promise<SodiumModule> | null = null;

async function getSodium(): Promise<SodiumModule> {
  if (!sodiumReadyPromise) {
    sodiumReadyPromise = sodium.ready.then(() => sodium);
  }

  return sodiumReadyPromise;
}

function assertPoolSize(poolSize: number): void {
  if (!Number.isInteger(poolSize) || poolSize <= 0 || poolSize > MAX_POOL_SIZE) {
    throw new InvalidArgumentError(`Pool size must be an integer between 1 and ${MAX_POOL_SIZE}, got ${poolSize}.`);
  }
}

/**
 * Wraps a uniform integer function into a {@link RandomSource}.
 *
 * The wrapper validates both the requested pool size and the value the function
 * returns, so a broken source fails loudly instead of skewing output.
 */
export function createRandomSource(uniform: UniformInt): RandomSource {
  function uniformIndex(poolSize: number): number {
    assertPoolSize(poolSize);

    const value = uniform(poolSize);
    if (!Number.isInteger(value) || value < 0 || value >= poolSize) {
      throw new Error(`Random source returned ${value} for a pool of ${poolSize}.`);
    }

    return value;
  }

  function shuffle<T>(items: readonly T[]): T[] {
    const shuffled = [...items];

    for (let index = shuffled.length - 1; index > 0; index -= 1) {
      const swapIndex = uniformIndex(index + 1);
      [shuffled[index], shuffled[swapIndex]] = [shuffled[swapIndex] as T, shuffled[index] as T];
    }

    return shuffled;
  }

  return { uniformIndex, shuffle };
}

/**
 * Creates the production random source backed by libsodium.
 *
 * `randombytes_uniform` redraws instead of reducing modulo the pool size, so
 * indices are unbiased for every pool size. The returned source is synchronous
 * and holds no state of its own.
 */
export async function createSodiumRandomSource(): Promise<RandomSource> {
  const sodiumLib = await getSodium();
  return createRandomSource((upperBound) => sodiumLib.randombytes_uniform(upperBound));
}
