import { describe, expect, it } from "vitest";
import { createSeededRandom } from "../utils/random";
import { DegenerateWeightsError, SamplingExhaustedError } from "./errors";
import { drawWeightedSet } from "./weightedSampler";

const weightsOf = (entries: [number, number][]) => new Map(entries);

function sequence(values: number[]) {
  let i = 0;
  return () => values[i++ % values.length];
}

describe("drawWeightedSet", () => {
  it("returns exactly the six numbers with positive weight", () => {
    const weights = new Map<number, number>();
    for (let n = 1; n <= 45; n++) weights.set(n, 0);
    for (const n of [4, 9, 17, 23, 31, 42]) weights.set(n, 3);

    for (let seed = 1; seed <= 5; seed++) {
      expect(drawWeightedSet(weights, { random: createSeededRandom(seed) })).toEqual([
        4, 9, 17, 23, 31, 42,
      ]);
    }
  });

  it("picks proportionally to weight along the cumulative scale", () => {
    const weights = weightsOf([
      [1, 1], [2, 1], [3, 1], [4, 1], [5, 1], [6, 1],
    ]);
    const result = drawWeightedSet(weights, {
      random: sequence([0, 0.2, 0.4, 0.6]),
      count: 4,
    });
    expect(result).toEqual([1, 2, 3, 4]);
  });

  it("keeps initial numbers and fills the rest", () => {
    const weights = weightsOf([
      [1, 1], [2, 1], [3, 1], [4, 1], [5, 1], [6, 1], [40, 5], [41, 5],
    ]);
    const result = drawWeightedSet(weights, {
      random: sequence([0, 0.2, 0.4, 0.6]),
      initial: [40, 41],
    });
    expect(result).toEqual([1, 2, 3, 4, 40, 41]);
  });

  it("fails on all-zero weights", () => {
    const weights = weightsOf([[1, 0], [2, 0], [3, 0]]);
    expect(() => drawWeightedSet(weights, { random: Math.random })).toThrow(
      DegenerateWeightsError
    );
  });

  it("fails when too few numbers can be drawn", () => {
    const weights = weightsOf([[1, 1], [2, 1], [3, 1], [4, 1], [5, 1], [6, 0]]);
    expect(() => drawWeightedSet(weights, { random: Math.random })).toThrow(
      DegenerateWeightsError
    );
  });

  it("fails on negative weights", () => {
    const weights = weightsOf([[1, -1], [2, 1]]);
    expect(() => drawWeightedSet(weights, { random: Math.random })).toThrow(
      /가중치가 잘못되었습니다/
    );
  });

  it("stops after the draw cap", () => {
    const weights = weightsOf([
      [1, 1], [2, 1], [3, 1], [4, 1], [5, 1], [6, 1],
    ]);
    expect(() =>
      drawWeightedSet(weights, { random: () => 0, maxDraws: 50 })
    ).toThrow(SamplingExhaustedError);
  });
});
