import rateLimit from "express-rate-limit";

/**
 * 추천 엔드포인트용 레이트 리미터
 * - IP 기준
 * - 1분에 10회
 */
export const publicRecommendLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 10,
  standardHeaders: "draft-7",
  legacyHeaders: false,
  message: {
    success: false,
    error: "TOO_MANY_REQUESTS",
    message: "Too many requests. Please try again later.",
  },
});
