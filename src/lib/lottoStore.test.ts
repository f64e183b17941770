import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createStoreConfig } from "../config";
import { makeDraw } from "../testUtils/drawFixtures";
import { frequencyTable } from "./lottoStatistics";
import { FileDrawStore } from "./lottoStore";

let dir: string;
let store: FileDrawStore;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "lotto-store-"));
  store = new FileDrawStore(createStoreConfig(dir));
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("FileDrawStore", () => {
  it("starts empty when the directory does not exist", async () => {
    const missing = new FileDrawStore(createStoreConfig(path.join(dir, "nope")));
    expect(await missing.listSavedRounds()).toEqual([]);
    expect(await missing.getLastSavedRound()).toBe(0);
    expect(await missing.readLatestRound()).toBeNull();
    expect(await missing.readFrequencySummary()).toBeNull();
  });

  it("saves and loads records in round order", async () => {
    await store.saveRecord(makeDraw(10, [1, 2, 10, 20, 30, 40], 8));
    await store.saveRecord(makeDraw(2, [3, 11, 19, 27, 38, 44], 9));

    expect(await store.listSavedRounds()).toEqual([2, 10]);
    expect(await store.getLastSavedRound()).toBe(10);

    const records = await store.loadAll();
    expect(records.map((r) => r.round)).toEqual([2, 10]);
    expect(records[0].derivedMetrics.sumValue).toBe(142);

    const raw = JSON.parse(await fs.readFile(path.join(dir, "10.lotto"), "utf-8"));
    expect(raw.amountPerWinner).toBe(2_000_000_000);
  });

  it("filters by round range", async () => {
    await store.saveRecord(makeDraw(1, [1, 2, 3, 4, 5, 6], 7));
    await store.saveRecord(makeDraw(2, [1, 2, 3, 4, 5, 7], 8));
    await store.saveRecord(makeDraw(3, [1, 2, 3, 4, 5, 8], 9));

    const records = await store.loadRange(2, 3);
    expect(records.map((r) => r.round)).toEqual([2, 3]);
  });

  it("skips unreadable and malformed files", async () => {
    await store.saveRecord(makeDraw(1, [1, 2, 3, 4, 5, 6], 7));
    await fs.writeFile(path.join(dir, "2.lotto"), "{not json", "utf-8");
    await fs.writeFile(
      path.join(dir, "3.lotto"),
      JSON.stringify({ round: 3, numbers: [1, 1, 2, 3, 4, 5], bonus: 9, winners: 0, amountPerWinner: 0 }),
      "utf-8"
    );

    const records = await store.loadAll();
    expect(records.map((r) => r.round)).toEqual([1]);
  });

  it("keeps latest and frequency files out of the round list", async () => {
    await store.writeLatestRound(1190);
    const table = frequencyTable([makeDraw(1, [1, 2, 3, 4, 5, 6], 7)]);
    await store.writeFrequencySummary(table);

    expect(await store.listSavedRounds()).toEqual([]);
    expect(await store.readLatestRound()).toBe(1190);

    const summary = await store.readFrequencySummary();
    expect(summary?.totalRounds).toBe(1);
    expect(summary?.stats[7]).toEqual({ main: 0, bonus: 1, total: 1 });
  });

  it("treats a garbled latest file as unknown", async () => {
    await fs.writeFile(path.join(dir, "latest.lotto"), "abc", "utf-8");
    expect(await store.readLatestRound()).toBeNull();
  });

  it("backfills derived metrics into older files", async () => {
    await fs.writeFile(
      path.join(dir, "5.lotto"),
      JSON.stringify({ round: 5, numbers: [1, 2, 3, 4, 5, 45], bonus: 7, winners: 1, amountPerWinner: 10 }),
      "utf-8"
    );
    await store.saveRecord(makeDraw(6, [3, 11, 19, 27, 38, 44], 8));

    expect(await store.backfillDerivedMetrics()).toBe(1);
    expect(await store.backfillDerivedMetrics()).toBe(0);

    const raw = JSON.parse(await fs.readFile(path.join(dir, "5.lotto"), "utf-8"));
    expect(raw.derivedMetrics).toEqual({
      oddEvenRatio: "4:2",
      sumValue: 60,
      acValue: 4,
      highLowRatio: "1:5",
    });
  });
});
