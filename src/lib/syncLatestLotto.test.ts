import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createStoreConfig } from "../config";
import { makeDraw } from "../testUtils/drawFixtures";
import { CrawledDraw } from "./drawResultParser";
import { DrawSource } from "./lottoCrawler";
import { FileDrawStore } from "./lottoStore";
import { syncLatestRounds } from "./syncLatestLotto";

class FakeSource implements DrawSource {
  ranges: [number, number][] = [];
  closed = 0;

  constructor(
    private readonly latest: number,
    private readonly draws: CrawledDraw[]
  ) {}

  async fetchLatestRound() {
    return this.latest;
  }

  async fetchRange(start: number, end: number) {
    this.ranges.push([start, end]);
    return this.draws.filter((d) => d.round >= start && d.round <= end);
  }

  async close() {
    this.closed++;
  }
}

const crawled = (round: number, numbers: number[], bonus: number): CrawledDraw => ({
  round,
  numbers,
  bonus,
  winners: 5,
  amountPerWinner: 1000,
});

let dir: string;
let store: FileDrawStore;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "lotto-sync-"));
  store = new FileDrawStore(createStoreConfig(dir));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("syncLatestRounds", () => {
  it("fetches missing rounds in chunks and saves valid ones", async () => {
    await store.saveRecord(makeDraw(1, [1, 2, 3, 4, 5, 6], 7));
    const source = new FakeSource(4, [
      crawled(2, [3, 11, 19, 27, 38, 44], 8),
      crawled(3, [1, 1, 2, 3, 4, 5], 9),
      crawled(4, [1, 2, 10, 20, 30, 40], 9),
    ]);

    const result = await syncLatestRounds({ store, source, chunkSize: 2 });

    expect(source.ranges).toEqual([
      [2, 3],
      [4, 4],
    ]);
    expect(result).toEqual({
      latestRound: 4,
      lastSavedRound: 1,
      savedRounds: [2, 4],
      skipped: 1,
    });
    expect(source.closed).toBe(1);
    expect(await store.listSavedRounds()).toEqual([1, 2, 4]);
    expect(await store.readLatestRound()).toBe(4);
    expect((await store.readFrequencySummary())?.totalRounds).toBe(3);
  });

  it("still refreshes the frequency summary when up to date", async () => {
    await store.saveRecord(makeDraw(1, [1, 2, 3, 4, 5, 6], 7));
    const source = new FakeSource(1, []);

    const result = await syncLatestRounds({ store, source });

    expect(source.ranges).toEqual([]);
    expect(result.savedRounds).toEqual([]);
    expect((await store.readFrequencySummary())?.totalRounds).toBe(1);
  });

  it("closes the source when fetching fails", async () => {
    const source = new FakeSource(3, []);
    source.fetchRange = async () => {
      throw new Error("page timeout");
    };

    await expect(syncLatestRounds({ store, source })).rejects.toThrow("page timeout");
    expect(source.closed).toBe(1);
  });
});
