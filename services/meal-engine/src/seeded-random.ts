/**
 * Seeded randomness for reproducible plans.
 *
 * The seed is FNV-1a (64-bit) over the UTF-8 bytes of the seed parts joined
 * with "|", so it is identical across processes and runtimes. Draws come from
 * SplitMix64.
 */

const FNV_OFFSET_BASIS_64 = 0xcbf29ce484222325n;
const FNV_PRIME_64 = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

const encoder = new TextEncoder();

export function fnv1a64(input: string): bigint {
  let hash = FNV_OFFSET_BASIS_64;
  for (const byte of encoder.encode(input)) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME_64) & MASK_64;
  }
  return hash;
}

export function stableSeed(parts: ReadonlyArray<string | number>): bigint {
  return fnv1a64(parts.map(String).join("|"));
}

export interface SeededRandom {
  nextUint64(): bigint;
  /** Uniform in [0, 1) with 53 bits of precision. */
  nextFloat(): number;
  /** Uniform integer in [0, bound). */
  nextInt(bound: number): number;
  pick<T>(items: readonly T[]): T;
}

export function createSeededRandom(seed: bigint): SeededRandom {
  let state = BigInt.asUintN(64, seed);

  function nextUint64(): bigint {
    state = BigInt.asUintN(64, state + 0x9e3779b97f4a7c15n);
    let z = state;
    z = BigInt.asUintN(64, (z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n);
    z = BigInt.asUintN(64, (z ^ (z >> 27n)) * 0x94d049bb133111ebn);
    return z ^ (z >> 31n);
  }

  function nextFloat(): number {
    return Number(nextUint64() >> 11n) / 2 ** 53;
  }

  function nextInt(bound: number): number {
    if (!Number.isSafeInteger(bound) || bound <= 0) {
      throw new RangeError(`bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(nextFloat() * bound);
  }

  function pick<T>(items: readonly T[]): T {
    const index = nextInt(items.length);
    const item = items[index];
    if (item === undefined) {
      throw new RangeError(`no item at index ${index}`);
    }
    return item;
  }

  return { nextUint64, nextFloat, nextInt, pick };
}
