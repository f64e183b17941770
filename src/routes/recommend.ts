import { Router } from "express";
import { getRecommendationController } from "../controllers/recommendController";
import { publicRecommendLimiter } from "../middlewares/rateLimiters";

const router = Router();

// GET /api/lotto/recommend?seed=1234&quota=5&strategies=hot,pair
router.get("/", publicRecommendLimiter, getRecommendationController);

export default router;
