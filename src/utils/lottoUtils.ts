// lottoUtils.ts — 번호 집합 Bitmask 연산
export function numbersToBitmask(numbers: readonly number[]): bigint {
  let m = 0n;
  for (const n of numbers) m |= 1n << BigInt(n - 1);
  return m;
}

// 빠른 popcount (최대 45비트)
export function popcount(x: bigint): number {
  let c = 0;
  while (x > 0n) {
    x &= x - 1n; // Brian Kernighan’s trick
    c++;
  }
  return c;
}

// 두 번호 집합의 교집합 개수
export function intersectionCount(
  a: readonly number[],
  b: readonly number[]
): number {
  return popcount(numbersToBitmask(a) & numbersToBitmask(b));
}
