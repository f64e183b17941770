import { Router, Request, Response } from "express";
import { DrawRecord } from "../types/lotto";
import { ApiResponse } from "../types/api";
import { lottoCache } from "../lib/lottoCache";

const router = Router();

// GET /api/lotto/round/:round
router.get("/:round", (req: Request, res: Response) => {
  const round = Number(req.params.round);

  if (!Number.isInteger(round) || round <= 0) {
    return res.status(400).json({
      success: false,
      error: "INVALID_ROUND",
      message: "회차 번호가 잘못되었습니다.",
    } satisfies ApiResponse<null>);
  }

  const record = lottoCache.get(round);
  if (!record) {
    return res.status(404).json({
      success: false,
      error: "ROUND_NOT_FOUND",
      message: `${round}회차 데이터가 없습니다.`,
    } satisfies ApiResponse<null>);
  }

  return res.json({
    success: true,
    data: record,
  } satisfies ApiResponse<DrawRecord>);
});

export default router;
