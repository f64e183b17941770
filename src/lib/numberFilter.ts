// numberFilter.ts — 추천 조합 통계 필터
import { NUMBERS_PER_DRAW } from "../types/lotto";
import {
  acValueOf,
  countHigh,
  countOdd,
  hasConsecutiveRun,
  sumOf,
} from "../utils/lottoNumberUtils";

export const FILTER_LIMITS = {
  minSum: 100,
  maxSum: 200,
  maxConsecutiveRun: 2, // 3연번부터 제외
  minAcValue: 7,
} as const;

export type FilterRule =
  | "sum"
  | "oddEven"
  | "highLow"
  | "consecutiveRun"
  | "acValue";

/** 처음으로 통과하지 못한 규칙 (모두 통과하면 null) */
export function findFailedFilter(numbers: readonly number[]): FilterRule | null {
  // 1. 총합 100~200
  const sum = sumOf(numbers);
  if (sum < FILTER_LIMITS.minSum || sum > FILTER_LIMITS.maxSum) return "sum";

  // 2. 홀짝 6:0 / 0:6 제외
  const odds = countOdd(numbers);
  if (odds === 0 || odds === NUMBERS_PER_DRAW) return "oddEven";

  // 3. 고저 6:0 / 0:6 제외
  const highs = countHigh(numbers);
  if (highs === 0 || highs === NUMBERS_PER_DRAW) return "highLow";

  // 4. 3연번 제외
  if (hasConsecutiveRun(numbers, FILTER_LIMITS.maxConsecutiveRun + 1)) {
    return "consecutiveRun";
  }

  // 5. AC값 7 이상
  if (acValueOf(numbers) < FILTER_LIMITS.minAcValue) return "acValue";

  return null;
}

export function passesFilters(numbers: readonly number[]): boolean {
  return findFailedFilter(numbers) === null;
}
