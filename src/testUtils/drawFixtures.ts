import { createDrawRecord } from "../lib/drawRecord";
import { DrawRecord } from "../types/lotto";

export function makeDraw(
  round: number,
  numbers: number[],
  bonus: number,
  winners = 10,
  amountPerWinner = 2_000_000_000
): DrawRecord {
  return createDrawRecord({ round, numbers, bonus, winners, amountPerWinner });
}

/**
 * 1..count 회차의 결정적 테스트 기록.
 * 오프셋 0,7,...,35 는 mod 45 에서 서로 달라 번호 중복이 없다.
 */
export function makeHistory(count: number): DrawRecord[] {
  const offsets = [0, 7, 14, 21, 28, 35];
  return Array.from({ length: count }, (_, i) => {
    const round = i + 1;
    const base = (round * 7 + round) % 45;
    return makeDraw(
      round,
      offsets.map((k) => ((base + k) % 45) + 1),
      ((base + 40) % 45) + 1
    );
  });
}
