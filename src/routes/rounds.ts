import { Router, Request, Response } from "express";
import { DrawRecord } from "../types/lotto";
import { ApiResponse } from "../types/api";
import {
  getDrawRange,
  getLatestCachedRound,
  getLatestKnownRound,
  sortedLottoCache,
} from "../lib/lottoCache";
import { parseRangeParams } from "../utils/requestUtils";

const router = Router();

// GET /api/lotto/rounds/latest
router.get("/latest", (_req: Request, res: Response) => {
  return res.json({
    success: true,
    data: {
      latestRound: getLatestKnownRound(),
      latestSavedRound: getLatestCachedRound(),
    },
  } satisfies ApiResponse<{ latestRound: number | null; latestSavedRound: number }>);
});

// GET /api/lotto/rounds?start=900&end=950
router.get("/", (req: Request, res: Response) => {
  const { params, error } = parseRangeParams(req);
  if (!params) {
    return res.status(400).json({
      success: false,
      error: "INVALID_PARAMS",
      message: error,
    } satisfies ApiResponse<null>);
  }

  if (sortedLottoCache.length === 0) {
    return res.status(503).json({
      success: false,
      error: "NO_CACHE",
      message: "로또 데이터 캐시가 비어 있습니다.",
    } satisfies ApiResponse<null>);
  }

  // 최대 회차 보정, 범위 미지정이면 최근 10회
  const maxRound = getLatestCachedRound();
  const end = Math.min(params.end ?? maxRound, maxRound);
  const start = params.start ?? Math.max(1, end - 9);

  const records = getDrawRange(start, end);
  if (records.length === 0) {
    return res.status(404).json({
      success: false,
      error: "EMPTY_RESULT",
      message: "해당 범위 내 로또 정보가 없습니다.",
    } satisfies ApiResponse<null>);
  }

  return res.json({
    success: true,
    data: records,
    message: `${start}~${end} 회차 로또 데이터`,
  } satisfies ApiResponse<DrawRecord[]>);
});

export default router;
