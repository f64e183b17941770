import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "../config";
import { FileDrawStore } from "../lib/lottoStore";
import { formatAnalysisReport, resolveReportRange } from "../lib/reportFormatter";

// 사용법: npm run analyze -- <start> <end>
async function main() {
  const store = new FileDrawStore(loadConfig().store);

  const { start, end } = resolveReportRange(
    process.argv[2],
    process.argv[3],
    await store.getLastSavedRound()
  );

  console.log(`데이터 로딩 중 (${start}회 ~ ${end}회)...`);
  const records = await store.loadRange(start, end);
  console.log(`총 ${records.length}개 회차 데이터 로드 완료.\n`);

  for (const line of formatAnalysisReport(records)) console.log(line);
}

main().catch((err) => {
  console.error("❌ 분석 실패", err);
  process.exitCode = 1;
});
