import { createHash } from "node:crypto";

// ---------------------------------------------------------------------------
// Seeded pseudo-random generator
// ---------------------------------------------------------------------------
// SplitMix64 over bigint. The stream depends only on the seed, so a given
// text always produces the same shuffle in every process.
// ---------------------------------------------------------------------------

const MASK_64 = (1n << 64n) - 1n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const TWO_POW_53 = 2 ** 53;

/**
 * 64-bit seed for a piece of text: the first 16 hex characters of its
 * SHA-256 digest (UTF-8), read as an unsigned integer.
 */
export function seedFromText(text: string): bigint {
  const hex = createHash("sha256").update(text, "utf8").digest("hex");
  return BigInt(`0x${hex.slice(0, 16)}`);
}

export class SeededRandom {
  private state: bigint;

  constructor(seed: bigint) {
    this.state = seed & MASK_64;
  }

  /** Next raw 64-bit output */
  nextBigInt(): bigint {
    this.state = (this.state + GOLDEN_GAMMA) & MASK_64;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return z ^ (z >> 31n);
  }

  /** Uniform float in [0, 1) with 53 bits of precision */
  next(): number {
    return Number(this.nextBigInt() >> 11n) / TWO_POW_53;
  }

  /** Uniform integer in [0, bound) */
  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }

  /** Fisher-Yates shuffle into a new array; the input is left untouched */
  shuffle<T>(items: readonly T[]): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const tmp = out[i];
      out[i] = out[j];
      out[j] = tmp;
    }
    return out;
  }
}
