import { Request, Response, NextFunction } from "express";
import { LottoError } from "../lib/errors";
import { ApiResponse } from "../types/api";

// 마지막에 등록되는 에러 핸들러
export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof LottoError) {
    return res.status(422).json({
      success: false,
      error: err.code,
      message: err.message,
    } satisfies ApiResponse<null>);
  }

  console.error(err instanceof Error ? err.stack : err);
  return res.status(500).json({
    success: false,
    error: "SERVER_ERROR",
    message: "서버 오류가 발생했습니다.",
  } satisfies ApiResponse<null>);
}
