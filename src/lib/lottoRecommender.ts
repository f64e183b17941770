// lottoRecommender.ts — 전략별 가중치 추출 + 통계 필터 기반 추천
import { DrawRecord } from "../types/lotto";
import { ALL_NUMBERS, countOdd, sumOf } from "../utils/lottoNumberUtils";
import { createSeededRandom, randomIndex, RandomFn } from "../utils/random";
import { InvalidOptionError, SamplingExhaustedError } from "./errors";
import { countNumbers, pairWeights, rankPairs } from "./lottoStatistics";
import { passesFilters } from "./numberFilter";
import { drawWeightedSet, NumberWeights } from "./weightedSampler";

export type StrategyId = "hot" | "cold" | "balance" | "pair";

export const strategyMeta: Record<StrategyId, { label: string; description: string }> = {
  hot: {
    label: "최근 트렌드(Hot)",
    description: "최근 회차에서 자주 나온 번호에 가중치",
  },
  cold: {
    label: "미출현 번호(Cold)",
    description: "최근 회차에 나오지 않은 번호에 가중치",
  },
  balance: {
    label: "전체 통계 균형",
    description: "전체 회차 출현 횟수 비례",
  },
  pair: {
    label: "동반 출현(Pair)",
    description: "동반 출현 상위 쌍을 포함해 전체 빈도로 채움",
  },
};

export const STRATEGY_ORDER: StrategyId[] = ["hot", "cold", "balance", "pair"];

export interface RecommendOptions {
  quota?: number; // 전략별 조합 수
  recentWindow?: number; // Hot 기준 회차 수
  coldWindow?: number; // Cold 기준 회차 수
  coldWeight?: number;
  topPairs?: number;
  maxAttempts?: number; // 전략별 최대 추출 시도
  strategies?: StrategyId[];
  seed?: number;
  random?: RandomFn;
  latestRound?: number; // latest.lotto 기준 최신 회차
}

export interface Recommendation {
  strategy: StrategyId;
  label: string;
  numbers: number[];
  sum: number;
  oddEvenRatio: string;
}

export interface RecommendationResult {
  nextRound: number;
  insufficientData: boolean;
  seed: number | null;
  recommendations: Recommendation[];
  generatedAt: string;
}

export const RECOMMEND_DEFAULTS = {
  quota: 5,
  recentWindow: 30,
  coldWindow: 15,
  coldWeight: 10,
  topPairs: 100,
  maxAttempts: 5000,
} as const;

type Draw = (random: RandomFn) => number[];

// ----------------------------------
// 전략별 가중치
// ----------------------------------
// 창 크기, quota 등은 1 이상의 정수만 허용 (slice(-0) 은 전체 기록이 된다)
function requirePositiveInt(option: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) throw new InvalidOptionError(option, value);
  return value;
}

export function hotWeights(
  records: readonly DrawRecord[],
  window: number = RECOMMEND_DEFAULTS.recentWindow
): Map<number, number> {
  requirePositiveInt("recentWindow", window);
  const recent = records.slice(-window);
  const counts = countNumbers(recent);
  return new Map(ALL_NUMBERS.map((n) => [n, 1 + (counts.get(n) ?? 0)]));
}

export function coldWeights(
  records: readonly DrawRecord[],
  window: number = RECOMMEND_DEFAULTS.coldWindow,
  weight: number = RECOMMEND_DEFAULTS.coldWeight
): Map<number, number> {
  requirePositiveInt("coldWindow", window);
  if (!Number.isFinite(weight) || weight <= 0) throw new InvalidOptionError("coldWeight", weight);
  const seen = new Set(records.slice(-window).flatMap((r) => r.numbers));
  return new Map(ALL_NUMBERS.map((n) => [n, seen.has(n) ? 1 : weight]));
}

export function balanceWeights(
  records: readonly DrawRecord[]
): Map<number, number> {
  return countNumbers(records);
}

function uniformWeights(): Map<number, number> {
  return new Map(ALL_NUMBERS.map((n) => [n, 1]));
}

// ----------------------------------
// 전략별 1회 추출기
// ----------------------------------
function buildDraw(
  strategy: StrategyId,
  records: readonly DrawRecord[],
  opts: Required<Omit<RecommendOptions, "seed" | "random" | "strategies" | "latestRound">>
): Draw {
  switch (strategy) {
    case "hot": {
      const weights = hotWeights(records, opts.recentWindow);
      return (random) => drawWeightedSet(weights, { random });
    }
    case "cold": {
      const weights = coldWeights(records, opts.coldWindow, opts.coldWeight);
      return (random) => drawWeightedSet(weights, { random });
    }
    case "balance": {
      const weights = balanceWeights(records);
      return (random) => drawWeightedSet(weights, { random });
    }
    case "pair": {
      const top = rankPairs(pairWeights(records), opts.topPairs);
      const fill: NumberWeights = balanceWeights(records);
      if (top.length === 0) {
        const uniform = uniformWeights();
        return (random) => drawWeightedSet(uniform, { random });
      }
      return (random) => {
        const { pair } = top[randomIndex(random, top.length)];
        return drawWeightedSet(fill, { random, initial: pair });
      };
    }
  }
}

/**
 * 통과한 조합이 quota 개가 될 때까지 추출 → 필터 → 중복 제거.
 * maxAttempts 를 넘기면 SamplingExhaustedError.
 */
export function collectAccepted(
  strategy: string,
  draw: Draw,
  random: RandomFn,
  quota: number,
  maxAttempts: number
): number[][] {
  requirePositiveInt("quota", quota);
  requirePositiveInt("maxAttempts", maxAttempts);
  const accepted: number[][] = [];
  const seen = new Set<string>();

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const nums = draw(random);
    if (!passesFilters(nums)) continue;

    const key = nums.join(",");
    if (seen.has(key)) continue;

    seen.add(key);
    accepted.push(nums);
    if (accepted.length >= quota) return accepted;
  }

  throw new SamplingExhaustedError(strategy, maxAttempts);
}

export function recommend(
  records: readonly DrawRecord[],
  options: RecommendOptions = {}
): RecommendationResult {
  const opts = {
    quota: requirePositiveInt("quota", options.quota ?? RECOMMEND_DEFAULTS.quota),
    recentWindow: requirePositiveInt(
      "recentWindow",
      options.recentWindow ?? RECOMMEND_DEFAULTS.recentWindow
    ),
    coldWindow: requirePositiveInt(
      "coldWindow",
      options.coldWindow ?? RECOMMEND_DEFAULTS.coldWindow
    ),
    coldWeight: options.coldWeight ?? RECOMMEND_DEFAULTS.coldWeight,
    topPairs: requirePositiveInt("topPairs", options.topPairs ?? RECOMMEND_DEFAULTS.topPairs),
    maxAttempts: requirePositiveInt(
      "maxAttempts",
      options.maxAttempts ?? RECOMMEND_DEFAULTS.maxAttempts
    ),
  };
  const strategies = options.strategies ?? STRATEGY_ORDER;

  const seed = options.random ? null : options.seed ?? Date.now();
  const random = options.random ?? createSeededRandom(seed ?? Date.now());

  // 사이트 기준 최신 회차를 모르면 마지막 저장 회차 기준
  const lastSaved = records.length > 0 ? records[records.length - 1].round : 0;
  const latestRound = Math.max(options.latestRound ?? 0, lastSaved);
  const base = {
    nextRound: latestRound + 1,
    seed,
    generatedAt: new Date().toISOString(),
  };

  if (records.length === 0) {
    console.warn("[WARN] 당첨 기록이 없어 추천을 생략합니다.");
    return { ...base, insufficientData: true, recommendations: [] };
  }

  const recommendations: Recommendation[] = [];

  for (const strategy of strategies) {
    const draw = buildDraw(strategy, records, opts);
    const batch = collectAccepted(
      strategy,
      draw,
      random,
      opts.quota,
      opts.maxAttempts
    );

    for (const numbers of batch) {
      const odds = countOdd(numbers);
      recommendations.push({
        strategy,
        label: strategyMeta[strategy].label,
        numbers,
        sum: sumOf(numbers),
        oddEvenRatio: `${odds}:${numbers.length - odds}`,
      });
    }
  }

  return { ...base, insufficientData: false, recommendations };
}
