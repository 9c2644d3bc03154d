import { describe, expect, it } from "vitest";

import { RandomSource, randomSeed } from "../random";

describe("RandomSource", () => {
  it("produces the mulberry32 sequence for a seed", () => {
    const random = new RandomSource(42);

    expect(random.next()).toBe(0.6011037519201636);
    expect(random.next()).toBe(0.44829055899754167);
    expect(random.next()).toBe(0.8524657934904099);
  });

  it("replays the same stream for the same seed", () => {
    const a = new RandomSource(123);
    const b = new RandomSource(123);

    const xs = Array.from({ length: 20 }, () => a.next());
    const ys = Array.from({ length: 20 }, () => b.next());

    expect(xs).toEqual(ys);
  });

  it("draws integers below the bound", () => {
    const random = new RandomSource(1);
    const draws = Array.from({ length: 10 }, () => random.nextInt(10));

    expect(draws).toEqual([6, 0, 5, 9, 9, 2, 6, 7, 4, 9]);
  });

  it("returns undefined from an empty choice without consuming the stream", () => {
    const random = new RandomSource(1);
    expect(random.choice([])).toBeUndefined();
    expect(random.choice(["a", "b", "c"])).toBe("b");
  });

  it("shuffles in place", () => {
    const items = [0, 1, 2, 3, 4];
    const result = new RandomSource(7).shuffle(items);

    expect(result).toBe(items);
    expect(items).toEqual([3, 1, 2, 4, 0]);
  });

  it("samples distinct items without touching the input", () => {
    const items = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];
    const picked = new RandomSource(7).sample(items, 3);

    expect(picked).toEqual([0, 1, 9]);
    expect(items).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("clamps the sample size to the population", () => {
    const random = new RandomSource(5);

    expect(random.sample([1, 2, 3], 10).sort()).toEqual([1, 2, 3]);
    expect(random.sample([1, 2, 3], 0)).toEqual([]);
  });

  it("keeps generated seeds in the unsigned 32-bit range", () => {
    for (let i = 0; i < 50; i++) {
      const seed = randomSeed();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThan(4294967296);
    }
  });
});
