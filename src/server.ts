import dotenv from "dotenv";
dotenv.config(); // .env 파일 로드

import { app, config } from "./app";
import { initializeLottoCache } from "./lib/lottoCache";
import { FileDrawStore } from "./lib/lottoStore";
import { closeRedis, configureRedis } from "./lib/redis";
import { scheduleWeeklySync } from "./scheduler/weeklySync";

async function bootstrap() {
  try {
    console.log(">>> 서버 부트스트랩 시작", new Date().toLocaleString());

    configureRedis(config.redisUrl);
    const store = new FileDrawStore(config.store);

    // 1️⃣ 당첨 기록 캐시 초기화
    await initializeLottoCache(store);

    // 2️⃣ 서버 시작
    const server = app.listen(config.port, () => {
      console.log(`>>> Server running on port ${config.port}`);
    });

    // 3️⃣ 주간 동기화 등록
    const task = scheduleWeeklySync(config, store);

    // 4️⃣ 종료 처리
    const shutdown = async () => {
      console.log("Closing server and Redis connection...");
      task.stop();
      await closeRedis();
      server.close(() => process.exit(0));
    };

    process.on("SIGINT", () => {
      shutdown().catch((err) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
    });
    process.on("SIGTERM", () => {
      shutdown().catch((err) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
    });
  } catch (err) {
    console.error("Server bootstrap failed:", err);
    process.exit(1);
  }
}

void bootstrap();
