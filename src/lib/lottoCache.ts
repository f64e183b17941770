import { DrawRecord, FrequencyTable } from "../types/lotto";
import { frequencyTable } from "./lottoStatistics";
import { FileDrawStore } from "./lottoStore";

export const lottoCache = new Map<number, DrawRecord>();
export let sortedLottoCache: DrawRecord[] = [];

// 사이트 기준 최신 회차 (latest.lotto)
let latestKnownRound: number | null = null;
// 현재 스냅샷 기준 빈도표 (캐시 갱신 시 초기화)
let frequencyMemo: FrequencyTable | null = null;

function rebuildSorted() {
  sortedLottoCache = Array.from(lottoCache.values()).sort(
    (a, b) => a.round - b.round
  );
  frequencyMemo = null;
}

export async function initializeLottoCache(store: FileDrawStore) {
  console.log(">>> 전체 당첨 기록 캐싱 시작");

  const records = await store.loadAll();
  replaceLottoCache(records);
  latestKnownRound = await store.readLatestRound();

  console.log(`>>> 총 ${records.length}개 회차 당첨번호 캐싱 완료`);
}

export function replaceLottoCache(records: readonly DrawRecord[]) {
  lottoCache.clear();
  records.forEach((record) => lottoCache.set(record.round, record));
  rebuildSorted();
}

export function addDrawToCache(record: DrawRecord) {
  lottoCache.set(record.round, record);
  rebuildSorted();
}

export function setLatestKnownRound(round: number | null) {
  latestKnownRound = round;
}

export function getLatestKnownRound(): number | null {
  return latestKnownRound;
}

export function getLatestCachedRound(): number {
  return sortedLottoCache.length > 0
    ? sortedLottoCache[sortedLottoCache.length - 1].round
    : 0;
}

export function getDrawRange(start: number, end: number): DrawRecord[] {
  return sortedLottoCache.filter((r) => r.round >= start && r.round <= end);
}

/** 전체 기록 빈도표. 같은 스냅샷 안에서는 한 번만 계산한다. */
export function getFrequencyTable(): FrequencyTable {
  if (!frequencyMemo) frequencyMemo = frequencyTable(sortedLottoCache);
  return frequencyMemo;
}
