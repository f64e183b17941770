import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "../config";
import { recommend } from "../lib/lottoRecommender";
import { FileDrawStore } from "../lib/lottoStore";
import { formatRecommendationReport } from "../lib/reportFormatter";

// 사용법: npm run recommend -- [seed]
async function main() {
  const store = new FileDrawStore(loadConfig().store);
  const seed = process.argv[2] === undefined ? undefined : Number(process.argv[2]);
  if (seed !== undefined && !Number.isInteger(seed)) {
    throw new Error(`seed 는 정수여야 합니다: ${process.argv[2]}`);
  }

  console.log("로또 번호 분석 및 추천을 시작합니다...");
  const records = await store.loadAll();
  const latest = await store.readLatestRound();
  if (latest !== null && latest !== records[records.length - 1]?.round) {
    console.warn(`[WARN] 저장된 기록이 최신(${latest}회)이 아닙니다. 먼저 npm run sync 를 실행하세요.`);
  }

  const result = recommend(records, { seed, latestRound: latest ?? undefined });
  console.log("");
  for (const line of formatRecommendationReport(result)) console.log(line);
  if (result.seed !== null) console.log(`seed: ${result.seed}`);
}

main().catch((err) => {
  console.error("❌ 추천 실패", err);
  process.exitCode = 1;
});
