export type RandomFn = () => number;

const MODULUS = 2147483647;

// Seeded Random (Park–Miller). 같은 seed 는 같은 수열을 만든다.
export function createSeededRandom(seed: number): RandomFn {
  let s = Math.floor(Math.abs(seed)) % MODULUS;
  if (!Number.isFinite(s) || s === 0) s = MODULUS - 1;
  return () => {
    s = (s * 16807) % MODULUS;
    return (s - 1) / (MODULUS - 1);
  };
}

/** 0 이상 length 미만의 정수 */
export function randomIndex(random: RandomFn, length: number): number {
  return Math.min(Math.floor(random() * length), length - 1);
}
