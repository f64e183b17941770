// lottoStore.ts — 회차별 당첨 기록 파일 저장소
// <dataDir>/<round>.lotto  : 회차 기록 (JSON)
// <dataDir>/latest.lotto   : 사이트 기준 최신 회차
// <dataDir>/frequency.lotto: 번호별 출현 빈도 요약
import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { StoreConfig } from "../config";
import { DrawRecord, FrequencyTable } from "../types/lotto";
import { createDrawRecord } from "./drawRecord";
import { derivedMetrics } from "./lottoStatistics";

const numberCountSchema = z.object({
  main: z.number(),
  bonus: z.number(),
  total: z.number(),
});

const frequencySummarySchema = z.object({
  stats: z.record(z.string(), numberCountSchema),
  ranking: z.array(z.object({ number: z.number(), counts: numberCountSchema })),
  totalRounds: z.number(),
  insufficientData: z.boolean(),
});

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
}

export class FileDrawStore {
  constructor(private readonly config: StoreConfig) {}

  get dataDir(): string {
    return this.config.dataDir;
  }

  private recordPath(round: number): string {
    return path.join(this.config.dataDir, `${round}${this.config.extension}`);
  }

  private isRecordFile(filename: string): boolean {
    return (
      filename.endsWith(this.config.extension) &&
      filename !== this.config.latestFile &&
      filename !== this.config.frequencyFile
    );
  }

  async ensureDataDir(): Promise<void> {
    await fs.mkdir(this.config.dataDir, { recursive: true });
  }

  private async listRecordFiles(): Promise<{ round: number; file: string }[]> {
    let filenames: string[];
    try {
      filenames = await fs.readdir(this.config.dataDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    return filenames
      .filter((f) => this.isRecordFile(f))
      .map((f) => ({
        round: Number(f.slice(0, -this.config.extension.length)),
        file: path.join(this.config.dataDir, f),
      }))
      .filter((f) => Number.isInteger(f.round) && f.round > 0)
      .sort((a, b) => a.round - b.round);
  }

  async listSavedRounds(): Promise<number[]> {
    return (await this.listRecordFiles()).map((f) => f.round);
  }

  async getLastSavedRound(): Promise<number> {
    const rounds = await this.listSavedRounds();
    return rounds.length > 0 ? rounds[rounds.length - 1] : 0;
  }

  private async readRecordFile(file: string): Promise<DrawRecord | null> {
    try {
      const raw: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
      return createDrawRecord(raw);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[ERROR] ${path.basename(file)} 읽기 실패: ${reason}`);
      return null;
    }
  }

  /** 읽을 수 없거나 형식이 잘못된 파일은 건너뛴다. 회차 오름차순. */
  async loadRange(start: number, end: number): Promise<DrawRecord[]> {
    const files = (await this.listRecordFiles()).filter(
      (f) => f.round >= start && f.round <= end
    );

    const records: DrawRecord[] = [];
    for (const { file } of files) {
      const record = await this.readRecordFile(file);
      if (record) records.push(record);
    }
    return records;
  }

  async loadAll(): Promise<DrawRecord[]> {
    return this.loadRange(1, Number.MAX_SAFE_INTEGER);
  }

  async saveRecord(record: DrawRecord): Promise<void> {
    await this.ensureDataDir();
    await fs.writeFile(
      this.recordPath(record.round),
      JSON.stringify(record, null, 4),
      "utf-8"
    );
  }

  async readLatestRound(): Promise<number | null> {
    try {
      const raw = await fs.readFile(
        path.join(this.config.dataDir, this.config.latestFile),
        "utf-8"
      );
      const round = Number(raw.trim());
      return Number.isInteger(round) && round > 0 ? round : null;
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async writeLatestRound(round: number): Promise<void> {
    await this.ensureDataDir();
    await fs.writeFile(
      path.join(this.config.dataDir, this.config.latestFile),
      String(round),
      "utf-8"
    );
  }

  async writeFrequencySummary(table: FrequencyTable): Promise<void> {
    await this.ensureDataDir();
    await fs.writeFile(
      path.join(this.config.dataDir, this.config.frequencyFile),
      JSON.stringify(table, null, 4),
      "utf-8"
    );
  }

  async readFrequencySummary(): Promise<FrequencyTable | null> {
    try {
      const raw = await fs.readFile(
        path.join(this.config.dataDir, this.config.frequencyFile),
        "utf-8"
      );
      const parsed = frequencySummarySchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        console.warn(`[WARN] ${this.config.frequencyFile} 형식 오류, 무시합니다.`);
        return null;
      }
      return parsed.data;
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  /**
   * derivedMetrics 가 빠진 예전 파일에 지표를 채워 다시 쓴다.
   * @returns 갱신된 파일 수
   */
  async backfillDerivedMetrics(): Promise<number> {
    let updated = 0;

    for (const { file } of await this.listRecordFiles()) {
      try {
        const data: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
        if (typeof data !== "object" || data === null) continue;
        if ("derivedMetrics" in data) continue;

        const numbers =
          "numbers" in data && Array.isArray(data.numbers)
            ? data.numbers.filter((n): n is number => typeof n === "number")
            : [];
        if (numbers.length === 0) continue;

        const withMetrics = { ...data, derivedMetrics: derivedMetrics(numbers) };
        await fs.writeFile(file, JSON.stringify(withMetrics, null, 4), "utf-8");
        updated++;
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[ERROR] ${path.basename(file)} 지표 갱신 실패: ${reason}`);
      }
    }

    if (updated > 0) {
      console.log(`[INFO] ${updated}개 파일에 분석 지표 추가`);
    }
    return updated;
  }
}
