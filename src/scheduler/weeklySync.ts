import cron, { ScheduledTask } from "node-cron";
import { AppConfig } from "../config";
import { initializeLottoCache } from "../lib/lottoCache";
import { DrawSource, LottoResultCrawler } from "../lib/lottoCrawler";
import { FileDrawStore } from "../lib/lottoStore";
import { redisDeleteByPattern } from "../lib/redis";
import { SyncResult, syncLatestRounds } from "../lib/syncLatestLotto";

let running = false;

/**
 * 최신 회차 수집 → 메모리 캐시 재생성 → 통계 캐시 삭제
 * 이미 실행 중이면 건너뛴다.
 */
export async function runSync(
  config: AppConfig,
  store: FileDrawStore,
  createSource: () => DrawSource = () => new LottoResultCrawler(config.crawler)
): Promise<SyncResult | null> {
  if (running) {
    console.log("[CRON] Sync already running, skipped.");
    return null;
  }

  running = true;
  try {
    const result = await syncLatestRounds({
      store,
      source: createSource(),
      chunkSize: config.crawler.chunkSize,
    });

    await initializeLottoCache(store);
    const removed = await redisDeleteByPattern("lotto:stats:*");

    console.log(
      `[${new Date().toLocaleString()}] Sync done: ${result.savedRounds.length} saved, ${result.skipped} skipped, ${removed} cache keys cleared`
    );
    return result;
  } finally {
    running = false;
  }
}

/**
 * node-cron 기반 스케줄러
 * 기본값: 매주 토요일 21:10 KST
 */
export function scheduleWeeklySync(
  config: AppConfig,
  store: FileDrawStore
): ScheduledTask {
  const task = cron.schedule(
    config.syncCron,
    async () => {
      console.log(`[CRON] Weekly sync started: ${new Date().toLocaleString()}`);
      try {
        await runSync(config, store);
      } catch (err) {
        console.error(`[CRON] Weekly sync failed:`, err);
      }
    },
    { timezone: config.syncTimezone }
  );

  console.log(`✅ weekly sync cron registered (${config.syncCron})`);
  return task;
}
