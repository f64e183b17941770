// lottoStatistics.ts — 회차별 파생 지표 + 전체 집계 통계
import {
  DerivedMetrics,
  DrawRecord,
  FrequencyTable,
  NumberCount,
  NUMBERS_PER_DRAW,
  PairCount,
  PairWeights,
} from "../types/lotto";
import {
  acValueOf,
  ALL_NUMBERS,
  countHigh,
  countOdd,
  fromPairKey,
  hasConsecutiveRun,
  isLottoNumber,
  sortNumbers,
  sumOf,
  toPairKey,
} from "../utils/lottoNumberUtils";
import { intersectionCount } from "../utils/lottoUtils";

type DrawNumbers = Pick<DrawRecord, "numbers">;

export interface CarryoverStats {
  insufficientData: boolean;
  comparedRounds: number;
  distribution: Record<number, number>; // 이월 개수(0~6) → 발생 횟수
}

export interface ConsecutiveStats {
  insufficientData: boolean;
  totalRounds: number;
  withConsecutive: number;
  percentage: number;
}

export interface EndingDigitStats {
  insufficientData: boolean;
  distribution: Record<number, number>; // 끝수(0~9) → 출현 횟수
  ranking: { digit: number; count: number }[];
}

export interface NumberOccurrence {
  number: number;
  count: number;
}

export interface GroupSummary {
  insufficientData: boolean;
  rounds: number;
  averageSum: number;
  topNumbers: NumberOccurrence[];
}

export interface IntervalSummary {
  startRound: number;
  endRound: number;
  averageSum: number;
  topNumber: NumberOccurrence | null;
}

// ----------------------------------
// 회차 단위 파생 지표
// ----------------------------------
export function derivedMetrics(numbers: readonly number[]): DerivedMetrics {
  const odds = countOdd(numbers);
  const highs = countHigh(numbers);

  return {
    oddEvenRatio: `${odds}:${numbers.length - odds}`,
    sumValue: sumOf(numbers),
    acValue: acValueOf(numbers),
    highLowRatio: `${highs}:${numbers.length - highs}`,
  };
}

// ----------------------------------
// 번호별 출현 빈도 (본번호 / 보너스 / 합계)
// ----------------------------------
export function frequencyTable(
  records: readonly Pick<DrawRecord, "numbers" | "bonus">[]
): FrequencyTable {
  const stats: Record<number, NumberCount> = {};
  for (const n of ALL_NUMBERS) stats[n] = { main: 0, bonus: 0, total: 0 };

  for (const record of records) {
    for (const n of record.numbers) {
      if (!isLottoNumber(n)) continue;
      stats[n].main++;
      stats[n].total++;
    }
    if (isLottoNumber(record.bonus)) {
      stats[record.bonus].bonus++;
      stats[record.bonus].total++;
    }
  }

  // Array.prototype.sort 는 stable → 동률이면 번호 오름차순 유지
  const ranking = ALL_NUMBERS.map((number) => ({
    number,
    counts: stats[number],
  })).sort((a, b) => b.counts.total - a.counts.total);

  return {
    stats,
    ranking,
    totalRounds: records.length,
    insufficientData: records.length === 0,
  };
}

/** 본번호 출현 횟수 (1~45 전부 포함, 미출현은 0) */
export function countNumbers(
  records: readonly DrawNumbers[]
): Map<number, number> {
  const counts = new Map<number, number>(ALL_NUMBERS.map((n) => [n, 0]));
  for (const record of records) {
    for (const n of record.numbers) {
      if (counts.has(n)) counts.set(n, (counts.get(n) ?? 0) + 1);
    }
  }
  return counts;
}

// ----------------------------------
// 동반 출현(궁합수)
// ----------------------------------
export function pairWeights(records: readonly DrawNumbers[]): PairWeights {
  const weights: PairWeights = new Map();
  for (const record of records) {
    const nums = sortNumbers(record.numbers);
    for (let i = 0; i < nums.length; i++) {
      for (let j = i + 1; j < nums.length; j++) {
        const key = toPairKey(nums[i], nums[j]);
        weights.set(key, (weights.get(key) ?? 0) + 1);
      }
    }
  }
  return weights;
}

/**
 * 동반 출현 상위 쌍.
 * 동률은 처음 등장한 순서(회차 오름차순, 쌍은 번호 오름차순)를 유지한다.
 */
export function rankPairs(weights: PairWeights, limit: number): PairCount[] {
  return [...weights.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, limit))
    .map(([key, count]) => ({ pair: fromPairKey(key), count }));
}

// ----------------------------------
// 이월수: 직전 회차(배열상 바로 앞) 번호와 겹치는 개수
// ----------------------------------
export function carryoverDistribution(
  records: readonly DrawNumbers[]
): CarryoverStats {
  const distribution: Record<number, number> = {};
  for (let k = 0; k <= NUMBERS_PER_DRAW; k++) distribution[k] = 0;

  if (records.length < 2) {
    return { insufficientData: true, comparedRounds: 0, distribution };
  }

  for (let i = 1; i < records.length; i++) {
    const overlap = intersectionCount(records[i - 1].numbers, records[i].numbers);
    distribution[overlap] = (distribution[overlap] ?? 0) + 1;
  }

  return {
    insufficientData: false,
    comparedRounds: records.length - 1,
    distribution,
  };
}

// ----------------------------------
// 연번 포함 회차
// ----------------------------------
export function consecutiveIncidence(
  records: readonly DrawNumbers[]
): ConsecutiveStats {
  if (records.length === 0) {
    return {
      insufficientData: true,
      totalRounds: 0,
      withConsecutive: 0,
      percentage: 0,
    };
  }

  const withConsecutive = records.filter((r) =>
    hasConsecutiveRun(r.numbers, 2)
  ).length;

  return {
    insufficientData: false,
    totalRounds: records.length,
    withConsecutive,
    percentage: (withConsecutive / records.length) * 100,
  };
}

// ----------------------------------
// 끝수(1의 자리) 분포
// ----------------------------------
export function endingDigitDistribution(
  records: readonly DrawNumbers[]
): EndingDigitStats {
  const distribution: Record<number, number> = {};
  for (let d = 0; d <= 9; d++) distribution[d] = 0;

  for (const record of records) {
    for (const n of record.numbers) distribution[n % 10]++;
  }

  const ranking = Object.keys(distribution)
    .map(Number)
    .map((digit) => ({ digit, count: distribution[digit] }))
    .sort((a, b) => b.count - a.count);

  return { insufficientData: records.length === 0, distribution, ranking };
}

// ----------------------------------
// 구간/주기 요약
// ----------------------------------

/** 출현 횟수 내림차순, 동률이면 먼저 나온 번호 우선 */
function mostCommonNumbers(
  records: readonly DrawNumbers[],
  limit: number
): NumberOccurrence[] {
  const counts = new Map<number, number>();
  for (const record of records) {
    for (const n of record.numbers) counts.set(n, (counts.get(n) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([number, count]) => ({ number, count }));
}

function averageSum(records: readonly DrawNumbers[]): number {
  if (records.length === 0) return 0;
  const total = records.reduce((acc, r) => acc + sumOf(r.numbers), 0);
  return total / records.length;
}

export function summarizeGroup(
  records: readonly DrawNumbers[],
  topN = 5
): GroupSummary {
  return {
    insufficientData: records.length === 0,
    rounds: records.length,
    averageSum: averageSum(records),
    topNumbers: mostCommonNumbers(records, topN),
  };
}

export function moduloGroup<T extends Pick<DrawRecord, "round" | "numbers">>(
  records: readonly T[],
  modulo: number,
  remainder: number
): { rounds: number[]; summary: GroupSummary } {
  const target = records.filter((r) => r.round % modulo === remainder);
  return {
    rounds: target.map((r) => r.round),
    summary: summarizeGroup(target),
  };
}

export function intervalSummaries(
  records: readonly Pick<DrawRecord, "round" | "numbers">[],
  interval: number
): IntervalSummary[] {
  // NaN/Infinity 는 1회 단위로 처리
  const size = Number.isFinite(interval) ? Math.max(1, Math.floor(interval)) : 1;
  const result: IntervalSummary[] = [];

  for (let i = 0; i < records.length; i += size) {
    const chunk = records.slice(i, i + size);
    result.push({
      startRound: chunk[0].round,
      endRound: chunk[chunk.length - 1].round,
      averageSum: averageSum(chunk),
      topNumber: mostCommonNumbers(chunk, 1)[0] ?? null,
    });
  }

  return result;
}
