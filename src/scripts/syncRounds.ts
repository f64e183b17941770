import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "../config";
import { LottoResultCrawler } from "../lib/lottoCrawler";
import { FileDrawStore } from "../lib/lottoStore";
import { syncLatestRounds } from "../lib/syncLatestLotto";

async function main() {
  const config = loadConfig();
  const store = new FileDrawStore(config.store);

  console.log(`🔥 당첨번호 수집 시작 (${config.store.dataDir})`);
  const result = await syncLatestRounds({
    store,
    source: new LottoResultCrawler(config.crawler),
    chunkSize: config.crawler.chunkSize,
  });

  console.log(
    `🎉 수집 완료: 최신 ${result.latestRound}회, 신규 ${result.savedRounds.length}건, 건너뜀 ${result.skipped}건`
  );
}

main().catch((err) => {
  console.error("❌ 수집 실패", err);
  process.exitCode = 1;
});
