import dotenv from "dotenv";
dotenv.config();
import express, { Request, Response } from "express";
import cors from "cors";
import { loadConfig } from "./config";
import { errorHandler } from "./middlewares/errorHandler";

// 라우터 import
import lottoGetRoundRouter from "./routes/round";
import lottoGetRoundsRouter from "./routes/rounds";
import lottoFrequencyRouter from "./routes/frequency";
import lottoStatisticsRouter from "./routes/statistics";
import lottoRecommendRouter from "./routes/recommend";

export const config = loadConfig();

export const app = express();

const allowedOrigins = ["http://localhost:3000"];
if (config.frontendUrl) allowedOrigins.push(config.frontendUrl);

// CORS 설정
app.use(
  cors({
    origin: allowedOrigins,
    credentials: true,
  })
);

app.use(express.json());

// 라우터 등록
app.use("/api/lotto/round", lottoGetRoundRouter);
app.use("/api/lotto/rounds", lottoGetRoundsRouter);
app.use("/api/lotto/frequency", lottoFrequencyRouter);
app.use("/api/lotto/statistics", lottoStatisticsRouter);
app.use("/api/lotto/recommend", lottoRecommendRouter);

// 기본 라우트
app.get("/", (_req: Request, res: Response) => {
  res.json({
    message: "Lotto 6/45 Analysis API Server (Express + TypeScript)",
  });
});

// 에러 핸들링
app.use(errorHandler);
