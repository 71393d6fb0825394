import { describe, expect, it } from "vitest";
import { deriveSeed } from "../src/random/rng";
import { SeededRandom } from "../src/random/seeded-random";

function take(rng: SeededRandom, n: number): number[] {
  return Array.from({ length: n }, () => rng.next());
}

describe("SeededRandom", () => {
  it("should produce the same sequence for the same seed", () => {
    expect(take(new SeededRandom(42), 20)).toEqual(take(new SeededRandom(42), 20));
  });

  it("should produce different sequences for different seeds", () => {
    expect(take(new SeededRandom(1), 5)).not.toEqual(take(new SeededRandom(2), 5));
  });

  it("should stay within [0, 1)", () => {
    const rng = new SeededRandom(7);
    for (const value of take(rng, 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("should keep range() within inclusive bounds", () => {
    const rng = new SeededRandom(99);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const value = rng.range(2, 5);
      expect(value).toBeGreaterThanOrEqual(2);
      expect(value).toBeLessThanOrEqual(5);
      seen.add(value);
    }
    expect([...seen].sort()).toEqual([2, 3, 4, 5]);
  });

  it("should replay from a saved state", () => {
    const rng = new SeededRandom(5);
    take(rng, 3);
    const state = rng.getState();
    const expected = take(rng, 10);

    rng.setState(state);
    expect(take(rng, 10)).toEqual(expected);
  });

  it("should return undefined when choosing from an empty array", () => {
    expect(new SeededRandom(0).choice([])).toBeUndefined();
  });

  it("should honour probability extremes", () => {
    const rng = new SeededRandom(3);
    for (let i = 0; i < 50; i++) {
      expect(rng.probability(0)).toBe(false);
      expect(rng.probability(1)).toBe(true);
    }
  });
});

describe("deriveSeed", () => {
  it("should be deterministic", () => {
    expect(deriveSeed(1, 2, 3)).toBe(deriveSeed(1, 2, 3));
  });

  it("should depend on the order of its parts", () => {
    expect(deriveSeed(1, 2, 3)).not.toBe(deriveSeed(3, 2, 1));
  });

  it("should return a uint32", () => {
    const seed = deriveSeed(0xffffffff, 123456, 7);
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
  });
});
