import { z } from "zod";
import {
  DrawRecord,
  MAX_NUMBER,
  MIN_NUMBER,
  NUMBERS_PER_DRAW,
} from "../types/lotto";
import { InvalidDrawRecordError } from "./errors";
import { derivedMetrics } from "./lottoStatistics";
import { sortNumbers } from "../utils/lottoNumberUtils";

const lottoNumber = z.number().int().min(MIN_NUMBER).max(MAX_NUMBER);

export const drawRecordSchema = z
  .object({
    round: z.number().int().positive(),
    numbers: z
      .array(lottoNumber)
      .length(NUMBERS_PER_DRAW)
      .refine((nums) => new Set(nums).size === nums.length, {
        message: "당첨번호에 중복이 있습니다.",
      }),
    bonus: lottoNumber,
    winners: z.number().int().nonnegative(),
    amountPerWinner: z.number().int().nonnegative(),
  })
  .refine((r) => !r.numbers.includes(r.bonus), {
    message: "보너스 번호가 당첨번호와 겹칩니다.",
    path: ["bonus"],
  });

export type DrawRecordInput = z.input<typeof drawRecordSchema>;

/**
 * 외부에서 들어온 값(크롤링 결과, 저장 파일)을 검증해 DrawRecord 로 만든다.
 * 파생 지표는 항상 번호로부터 다시 계산한다.
 */
export function createDrawRecord(input: unknown): DrawRecord {
  const parsed = drawRecordSchema.safeParse(input);

  if (!parsed.success) {
    const round =
      typeof input === "object" &&
      input !== null &&
      "round" in input &&
      typeof input.round === "number"
        ? input.round
        : undefined;

    throw new InvalidDrawRecordError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
      round
    );
  }

  const numbers = Object.freeze(sortNumbers(parsed.data.numbers));

  return Object.freeze({
    round: parsed.data.round,
    numbers,
    bonus: parsed.data.bonus,
    winners: parsed.data.winners,
    amountPerWinner: parsed.data.amountPerWinner,
    derivedMetrics: Object.freeze(derivedMetrics(numbers)),
  });
}
