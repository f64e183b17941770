import { Request } from "express";
import { z } from "zod";
import { STRATEGY_ORDER, StrategyId } from "../lib/lottoRecommender";

// 빈 문자열 / 미지정은 undefined 로 취급
const optionalInt = (schema: z.ZodNumber) =>
  z.preprocess(
    (v) => (v === undefined || v === "" ? undefined : Number(v)),
    schema.int().optional()
  );

export const rangeQuerySchema = z
  .object({
    start: optionalInt(z.number().min(1, "start 값은 1 이상이어야 합니다.")),
    end: optionalInt(z.number().min(1, "end 값은 1 이상이어야 합니다.")),
  })
  .refine((q) => q.start === undefined || q.end === undefined || q.end >= q.start, {
    message: "end 값은 start 값보다 크거나 같아야 합니다.",
  });

export const statisticsQuerySchema = z
  .object({
    start: optionalInt(z.number().min(1)),
    end: optionalInt(z.number().min(1)),
    modulo: optionalInt(z.number().min(1).max(100)),
    remainder: optionalInt(z.number().min(0)),
    interval: optionalInt(z.number().min(1).max(1000)),
    pairs: optionalInt(z.number().min(1).max(100)),
  })
  .refine((q) => q.modulo === undefined || (q.remainder ?? 0) < q.modulo, {
    message: "remainder 는 modulo 보다 작아야 합니다.",
  });

const strategyList = z.preprocess(
  (v) => (typeof v === "string" && v !== "" ? v.split(",") : undefined),
  z
    .array(z.enum(["hot", "cold", "balance", "pair"]))
    .nonempty()
    .optional()
);

export const recommendQuerySchema = z.object({
  seed: optionalInt(z.number().nonnegative()),
  quota: optionalInt(z.number().min(1).max(20)),
  strategies: strategyList,
});

export interface RecommendParams {
  seed?: number;
  quota?: number;
  strategies: StrategyId[];
}

type ParseResult<T> = { params: T; error?: undefined } | { params?: undefined; error: string };

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ParseResult<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return { error: parsed.error.issues.map((i) => i.message).join(", ") };
  }
  return { params: parsed.data };
}

export function parseRangeParams(req: Request) {
  return parseWith(rangeQuerySchema, req.query);
}

export function parseStatisticsParams(req: Request) {
  return parseWith(statisticsQuerySchema, req.query);
}

export function parseRecommendParams(req: Request): ParseResult<RecommendParams> {
  const result = parseWith(recommendQuerySchema, req.query);
  if (result.error !== undefined) return { error: result.error };

  const { seed, quota, strategies } = result.params;
  return { params: { seed, quota, strategies: strategies ?? STRATEGY_ORDER } };
}
