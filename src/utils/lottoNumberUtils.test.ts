import { describe, expect, it } from "vitest";
import {
  acValueOf,
  fromPairKey,
  hasConsecutiveRun,
  toPairKey,
} from "./lottoNumberUtils";
import { intersectionCount } from "./lottoUtils";
import { createSeededRandom } from "./random";

describe("acValueOf", () => {
  it("counts distinct pairwise differences minus five", () => {
    expect(acValueOf([1, 2, 3, 4, 5, 45])).toBe(4);
    expect(acValueOf([5, 10, 15, 20, 25, 30])).toBe(0);
    expect(acValueOf([3, 4, 19, 27, 38, 44])).toBe(10);
  });

  it("does not depend on input order", () => {
    expect(acValueOf([44, 3, 27, 11, 38, 19])).toBe(acValueOf([3, 11, 19, 27, 38, 44]));
  });

  it("stays within 0..10 for random sets", () => {
    const random = createSeededRandom(7);
    for (let i = 0; i < 200; i++) {
      const set = new Set<number>();
      while (set.size < 6) set.add(Math.floor(random() * 45) + 1);
      const ac = acValueOf([...set]);
      expect(ac).toBeGreaterThanOrEqual(0);
      expect(ac).toBeLessThanOrEqual(10);
    }
  });
});

describe("hasConsecutiveRun", () => {
  it("detects runs of the requested length on sorted numbers", () => {
    expect(hasConsecutiveRun([32, 10, 31, 20, 30, 40], 3)).toBe(true);
    expect(hasConsecutiveRun([3, 4, 19, 27, 38, 44], 3)).toBe(false);
    expect(hasConsecutiveRun([3, 4, 19, 27, 38, 44], 2)).toBe(true);
    expect(hasConsecutiveRun([3, 11, 19, 27, 38, 44], 2)).toBe(false);
  });
});

describe("pair keys", () => {
  it("normalizes to ascending order", () => {
    expect(toPairKey(12, 3)).toBe("3-12");
    expect(fromPairKey("3-12")).toEqual([3, 12]);
  });
});

describe("intersectionCount", () => {
  it("counts shared numbers", () => {
    expect(intersectionCount([1, 2, 3, 4, 5, 6], [1, 2, 3, 10, 11, 12])).toBe(3);
    expect(intersectionCount([1, 2, 3, 4, 5, 45], [45, 44, 43, 42, 41, 40])).toBe(1);
  });
});

describe("createSeededRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const seqA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(seqA);
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("handles a zero seed", () => {
    const r = createSeededRandom(0);
    const v = r();
    expect(v).toBeGreaterThanOrEqual(0);
    expect(v).toBeLessThan(1);
  });
});
