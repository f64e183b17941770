export const MIN_NUMBER = 1;
export const MAX_NUMBER = 45;
export const NUMBERS_PER_DRAW = 6;
// 23 이상이 고번호, 22 이하가 저번호
export const HIGH_NUMBER_THRESHOLD = 23;

export interface DerivedMetrics {
  oddEvenRatio: string; // "홀:짝" e.g. "4:2"
  sumValue: number;
  acValue: number;
  highLowRatio: string; // "고:저" e.g. "3:3"
}

export interface DrawRecord {
  readonly round: number;
  readonly numbers: readonly number[]; // 오름차순 6개
  readonly bonus: number;
  readonly winners: number;
  readonly amountPerWinner: number;
  readonly derivedMetrics: DerivedMetrics;
}

export interface NumberCount {
  main: number;
  bonus: number;
  total: number;
}

export interface FrequencyTable {
  stats: Record<number, NumberCount>;
  ranking: { number: number; counts: NumberCount }[];
  totalRounds: number;
  insufficientData: boolean;
}

// "작은번호-큰번호" 형태의 키
export type PairKey = `${number}-${number}`;
export type PairWeights = Map<PairKey, number>;

export interface PairCount {
  pair: [number, number];
  count: number;
}
