// controllers/recommendController.ts
import { Request, Response, NextFunction } from "express";
import { getLatestKnownRound, sortedLottoCache } from "../lib/lottoCache";
import { recommend } from "../lib/lottoRecommender";
import { parseRecommendParams } from "../utils/requestUtils";

export function getRecommendationController(
  req: Request,
  res: Response,
  next: NextFunction
) {
  const { params, error } = parseRecommendParams(req);
  if (!params) {
    return res.status(400).json({ success: false, error: "INVALID_PARAMS", message: error });
  }

  try {
    const result = recommend(sortedLottoCache, {
      seed: params.seed,
      quota: params.quota,
      strategies: params.strategies,
      latestRound: getLatestKnownRound() ?? undefined,
    });

    return res.json({
      success: true,
      data: result,
      message: result.insufficientData ? "INSUFFICIENT_DATA" : undefined,
    });
  } catch (err) {
    // SamplingExhaustedError 등은 에러 핸들러에서 422 로 변환
    console.error("[ERROR] 추천 생성 실패:", err);
    return next(err);
  }
}
