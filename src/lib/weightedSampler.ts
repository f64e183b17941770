// weightedSampler.ts — 가중치 기반 번호 추출
import { NUMBERS_PER_DRAW } from "../types/lotto";
import { sortNumbers } from "../utils/lottoNumberUtils";
import { RandomFn } from "../utils/random";
import { DegenerateWeightsError, SamplingExhaustedError } from "./errors";

export type NumberWeights = ReadonlyMap<number, number>;

export interface WeightedDrawOptions {
  random: RandomFn;
  count?: number;
  /** 미리 선택된 번호 (결과에 포함, 추출 대상에서는 제외) */
  initial?: readonly number[];
  /** 중복 포함 최대 추출 횟수 */
  maxDraws?: number;
}

export const DEFAULT_MAX_DRAWS = 10_000;

/**
 * 가중치에 비례해 복원 추출하고 중복은 버린다.
 * count 개의 서로 다른 번호가 모이면 오름차순으로 반환.
 */
export function drawWeightedSet(
  weights: NumberWeights,
  {
    random,
    count = NUMBERS_PER_DRAW,
    initial = [],
    maxDraws = DEFAULT_MAX_DRAWS,
  }: WeightedDrawOptions
): number[] {
  const selected = new Set<number>(initial);
  const candidates: [number, number][] = [];
  let total = 0;

  for (const [n, w] of weights) {
    if (!Number.isFinite(w) || w < 0) {
      throw new DegenerateWeightsError(`번호 ${n}의 가중치가 잘못되었습니다: ${w}`);
    }
    if (w === 0 || selected.has(n)) continue;
    candidates.push([n, w]);
    total += w;
  }

  const needed = count - selected.size;
  if (needed <= 0) return sortNumbers([...selected]);

  if (total === 0 || candidates.length < needed) {
    throw new DegenerateWeightsError(
      `가중치가 0보다 큰 번호가 ${candidates.length}개뿐이라 ${needed}개를 뽑을 수 없습니다.`
    );
  }

  const pick = (): number => {
    const r = random() * total;
    let acc = 0;
    for (const [n, w] of candidates) {
      acc += w;
      if (r < acc) return n;
    }
    // 부동소수점 오차 보정
    return candidates[candidates.length - 1][0];
  };

  for (let draws = 0; draws < maxDraws; draws++) {
    selected.add(pick());
    if (selected.size >= count) return sortNumbers([...selected]);
  }

  throw new SamplingExhaustedError("weighted-draw", maxDraws);
}
