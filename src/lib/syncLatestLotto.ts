import { createDrawRecord } from "./drawRecord";
import { LottoError } from "./errors";
import { DrawSource } from "./lottoCrawler";
import { frequencyTable } from "./lottoStatistics";
import { FileDrawStore } from "./lottoStore";

export interface SyncOptions {
  store: FileDrawStore;
  source: DrawSource;
  chunkSize?: number;
}

export interface SyncResult {
  latestRound: number;
  lastSavedRound: number;
  savedRounds: number[];
  skipped: number;
}

/**
 * 사이트 최신 회차까지 빠진 회차를 수집해 저장한다.
 * 빈도 요약은 수집 여부와 관계없이 항상 다시 계산하고, source 는 항상 닫는다.
 */
export async function syncLatestRounds({
  store,
  source,
  chunkSize = 10,
}: SyncOptions): Promise<SyncResult> {
  const savedRounds: number[] = [];
  let skipped = 0;

  try {
    await store.ensureDataDir();
    await store.backfillDerivedMetrics();

    const latestRound = await source.fetchLatestRound();
    console.log(`[INFO] Latest round on site: ${latestRound}`);
    if (latestRound > 0) await store.writeLatestRound(latestRound);

    const lastSavedRound = await store.getLastSavedRound();
    console.log(`[INFO] Last saved round: ${lastSavedRound}`);

    if (latestRound > lastSavedRound) {
      for (let from = lastSavedRound + 1; from <= latestRound; from += chunkSize) {
        const to = Math.min(from + chunkSize - 1, latestRound);
        const crawled = await source.fetchRange(from, to);

        for (const item of crawled) {
          try {
            const record = createDrawRecord(item);
            await store.saveRecord(record);
            savedRounds.push(record.round);
          } catch (err) {
            if (!(err instanceof LottoError)) throw err;
            console.warn(`[WARN] ${err.message}`);
            skipped++;
          }
        }
        console.log(`✅ ${from}~${to}회 수집 완료 (${crawled.length}건)`);
      }
    } else {
      console.log("[INFO] Already up to date.");
    }

    const table = frequencyTable(await store.loadAll());
    await store.writeFrequencySummary(table);
    console.log(`[INFO] Frequency data updated based on ${table.totalRounds} rounds`);

    return { latestRound, lastSavedRound, savedRounds, skipped };
  } finally {
    await source.close();
  }
}
