import { describe, it, expect } from "vitest";
import { SeededRandom, seedFromText } from "../seeded-random.js";

describe("seedFromText", () => {
  it("reads the first 16 hex characters of the SHA-256 digest", () => {
    // sha256("abc") = ba7816bf8f01cfea414140de5dae2223...
    expect(seedFromText("abc")).toBe(0xba7816bf8f01cfean);
  });

  it("is stable for the same text", () => {
    expect(seedFromText("Diwali Push")).toBe(seedFromText("Diwali Push"));
  });

  it("fits in 64 bits", () => {
    expect(seedFromText("Ad A") < 1n << 64n).toBe(true);
  });
});

describe("SeededRandom", () => {
  it("produces the SplitMix64 reference stream", () => {
    expect(new SeededRandom(0n).nextBigInt()).toBe(0xe220a8397b1dcdafn);
  });

  it("replays the same stream for the same seed", () => {
    const a = new SeededRandom(42n);
    const b = new SeededRandom(42n);
    const streamA = Array.from({ length: 5 }, () => a.next());
    const streamB = Array.from({ length: 5 }, () => b.next());
    expect(streamA).toEqual(streamB);
  });

  it("returns floats in [0, 1)", () => {
    const rng = new SeededRandom(7n);
    for (let i = 0; i < 200; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("shuffles into a permutation without touching the input", () => {
    const input = ["a", "b", "c", "d", "e", "f"];
    const shuffled = new SeededRandom(123n).shuffle(input);

    expect(input).toEqual(["a", "b", "c", "d", "e", "f"]);
    expect([...shuffled].sort()).toEqual(input);
  });
});
