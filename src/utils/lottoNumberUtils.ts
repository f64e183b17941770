import {
  HIGH_NUMBER_THRESHOLD,
  MAX_NUMBER,
  MIN_NUMBER,
  PairKey,
} from "../types/lotto";

export const ALL_NUMBERS: readonly number[] = Array.from(
  { length: MAX_NUMBER - MIN_NUMBER + 1 },
  (_, i) => i + MIN_NUMBER
);

export function isLottoNumber(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_NUMBER && n <= MAX_NUMBER;
}

export function sortNumbers(numbers: readonly number[]): number[] {
  return [...numbers].sort((a, b) => a - b);
}

export function countOdd(numbers: readonly number[]): number {
  return numbers.filter((n) => n % 2 !== 0).length;
}

export function countHigh(numbers: readonly number[]): number {
  return numbers.filter((n) => n >= HIGH_NUMBER_THRESHOLD).length;
}

export function sumOf(numbers: readonly number[]): number {
  return numbers.reduce((acc, n) => acc + n, 0);
}

/**
 * AC값(산술적 복잡도)
 * 정렬된 번호의 모든 쌍 차이 중 서로 다른 값의 개수 - 5
 */
export function acValueOf(numbers: readonly number[]): number {
  const sorted = sortNumbers(numbers);
  const diffs = new Set<number>();
  for (let i = 0; i < sorted.length; i++) {
    for (let j = i + 1; j < sorted.length; j++) {
      diffs.add(sorted[j] - sorted[i]);
    }
  }
  return diffs.size - 5;
}

/** 정렬 기준으로 runLength 개 이상 연속된 번호가 있는지 */
export function hasConsecutiveRun(
  numbers: readonly number[],
  runLength: number
): boolean {
  const sorted = sortNumbers(numbers);
  let run = 1;
  for (let i = 1; i < sorted.length; i++) {
    run = sorted[i] === sorted[i - 1] + 1 ? run + 1 : 1;
    if (run >= runLength) return true;
  }
  return runLength <= 1 && sorted.length > 0;
}

export function toPairKey(a: number, b: number): PairKey {
  return a < b ? `${a}-${b}` : `${b}-${a}`;
}

export function fromPairKey(key: PairKey): [number, number] {
  const [a, b] = key.split("-").map(Number);
  return [a, b];
}
