import { Router, Request, Response } from "express";
import { FrequencyTable } from "../types/lotto";
import { ApiResponse } from "../types/api";
import {
  getDrawRange,
  getFrequencyTable,
  getLatestCachedRound,
} from "../lib/lottoCache";
import { frequencyTable } from "../lib/lottoStatistics";
import { parseRangeParams } from "../utils/requestUtils";

const router = Router();

// GET /api/lotto/frequency?start=900&end=950 (범위 미지정이면 전체)
router.get("/", (req: Request, res: Response) => {
  const { params, error } = parseRangeParams(req);
  if (!params) {
    return res.status(400).json({
      success: false,
      error: "INVALID_PARAMS",
      message: error,
    } satisfies ApiResponse<null>);
  }

  const maxRound = getLatestCachedRound();

  // 🔹 전체 구간은 캐시된 빈도표 사용
  if (params.start === undefined && params.end === undefined) {
    return res.json({
      success: true,
      data: { start: 1, end: maxRound, ...getFrequencyTable() },
    } satisfies ApiResponse<FrequencyTable & { start: number; end: number }>);
  }

  const start = params.start ?? 1;
  const end = Math.min(params.end ?? maxRound, maxRound);
  const table = frequencyTable(getDrawRange(start, end));

  if (table.insufficientData) {
    return res.status(404).json({
      success: false,
      error: "EMPTY_RESULT",
      message: "해당 범위 내 로또 정보가 없습니다.",
    } satisfies ApiResponse<null>);
  }

  return res.json({
    success: true,
    data: { start, end, ...table },
  } satisfies ApiResponse<FrequencyTable & { start: number; end: number }>);
});

export default router;
