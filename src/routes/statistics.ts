import { Router, Request, Response, NextFunction } from "express";
import { ApiResponse } from "../types/api";
import { DrawRecord, PairCount } from "../types/lotto";
import { getDrawRange, getLatestCachedRound } from "../lib/lottoCache";
import {
  carryoverDistribution,
  CarryoverStats,
  consecutiveIncidence,
  ConsecutiveStats,
  endingDigitDistribution,
  EndingDigitStats,
  GroupSummary,
  intervalSummaries,
  IntervalSummary,
  moduloGroup,
  pairWeights,
  rankPairs,
  summarizeGroup,
} from "../lib/lottoStatistics";
import { withRedisCache } from "../lib/redis";
import { parseStatisticsParams } from "../utils/requestUtils";

const router = Router();

const CACHE_TTL_SECONDS = 60 * 60 * 24;

export interface StatisticsReport {
  start: number;
  end: number;
  summary: GroupSummary;
  carryover: CarryoverStats;
  consecutive: ConsecutiveStats;
  endingDigits: EndingDigitStats;
  topPairs: PairCount[];
  modulo: { modulo: number; remainder: number; rounds: number[]; summary: GroupSummary } | null;
  intervals: IntervalSummary[] | null;
}

interface ReportOptions {
  start: number;
  end: number;
  pairs: number;
  modulo?: number;
  remainder: number;
  interval?: number;
}

export function buildStatisticsReport(
  records: readonly DrawRecord[],
  opts: ReportOptions
): StatisticsReport {
  return {
    start: opts.start,
    end: opts.end,
    summary: summarizeGroup(records),
    carryover: carryoverDistribution(records),
    consecutive: consecutiveIncidence(records),
    endingDigits: endingDigitDistribution(records),
    topPairs: rankPairs(pairWeights(records), opts.pairs),
    modulo:
      opts.modulo === undefined
        ? null
        : {
            modulo: opts.modulo,
            remainder: opts.remainder,
            ...moduloGroup(records, opts.modulo, opts.remainder),
          },
    intervals:
      opts.interval === undefined ? null : intervalSummaries(records, opts.interval),
  };
}

// GET /api/lotto/statistics?start=900&end=950&modulo=10&remainder=0&interval=10&pairs=5
router.get("/", async (req: Request, res: Response, next: NextFunction) => {
  const { params, error } = parseStatisticsParams(req);
  if (!params) {
    return res.status(400).json({
      success: false,
      error: "INVALID_PARAMS",
      message: error,
    } satisfies ApiResponse<null>);
  }

  const maxRound = getLatestCachedRound();
  const opts: ReportOptions = {
    start: params.start ?? 1,
    end: Math.min(params.end ?? maxRound, maxRound),
    pairs: params.pairs ?? 5,
    modulo: params.modulo,
    remainder: params.remainder ?? 0,
    interval: params.interval,
  };

  // 최신 회차가 키에 들어가므로 새 회차가 저장되면 자연히 새 키를 사용
  const cacheKey = [
    "lotto:stats",
    maxRound,
    opts.start,
    opts.end,
    opts.pairs,
    opts.modulo ?? "-",
    opts.remainder,
    opts.interval ?? "-",
  ].join(":");

  try {
    const report = await withRedisCache(cacheKey, CACHE_TTL_SECONDS, () =>
      buildStatisticsReport(getDrawRange(opts.start, opts.end), opts)
    );

    return res.json({
      success: true,
      data: report,
      message: report.summary.insufficientData ? "INSUFFICIENT_DATA" : undefined,
    } satisfies ApiResponse<StatisticsReport>);
  } catch (err) {
    next(err);
  }
});

export default router;
