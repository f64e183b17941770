import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { createStoreConfig } from "../config";
import { makeDraw } from "../testUtils/drawFixtures";
import { LottoError } from "./errors";
import { RecommendationResult } from "./lottoRecommender";
import { FileDrawStore } from "./lottoStore";
import {
  formatAnalysisReport,
  formatRecommendationReport,
  resolveReportRange,
} from "./reportFormatter";

describe("formatAnalysisReport", () => {
  const records = [
    makeDraw(1, [1, 2, 3, 10, 20, 30], 45),
    makeDraw(2, [1, 2, 4, 11, 21, 31], 44),
    makeDraw(3, [5, 6, 7, 12, 22, 32], 43),
  ];

  it("prints the covered range and carryover distribution", () => {
    const lines = formatAnalysisReport(records);

    expect(lines[1]).toBe("[1] 기본 종합 분석 (1~3회)");
    expect(lines[2]).toBe("  [전체 구간] (대상 3회)");

    const start = lines.indexOf("  1. 이월수(전회차 번호 재출현) 통계:");
    expect(lines.slice(start + 1, start + 3)).toEqual([
      "    - 0개 이월: 1회 (50.0%)",
      "    - 2개 이월: 1회 (50.0%)",
    ]);
  });

  it("lists the requested number of pairs", () => {
    const lines = formatAnalysisReport(records, { topPairs: 1 });
    expect(lines[lines.length - 1]).toBe("    - 1번 & 2번: 함께 2회 출현");
  });

  it("stops before advanced analysis with a single record", () => {
    const lines = formatAnalysisReport(records.slice(0, 1));
    expect(lines[lines.length - 1]).toBe(
      "  데이터가 부족하여 고급 분석을 수행할 수 없습니다."
    );
  });
});

describe("resolveReportRange", () => {
  it("defaults to the last hundred saved rounds", () => {
    expect(resolveReportRange(undefined, undefined, 250)).toEqual({ start: 150, end: 250 });
    expect(resolveReportRange("3", undefined, 40)).toEqual({ start: 3, end: 40 });
  });

  it("rejects a reversed or non-numeric range", () => {
    expect(() => resolveReportRange("10", "5", 40)).toThrow(LottoError);
    expect(() => resolveReportRange("abc", undefined, 40)).toThrow(/잘못된 범위/);
  });

  it("prints an insufficient-data report for an empty archive", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "lotto-report-"));
    try {
      const store = new FileDrawStore(createStoreConfig(dir));
      const { start, end } = resolveReportRange(
        undefined,
        undefined,
        await store.getLastSavedRound()
      );
      expect({ start, end }).toEqual({ start: 1, end: 1 });

      const line = "=".repeat(60);
      expect(formatAnalysisReport(await store.loadRange(start, end))).toEqual([
        line,
        "[1] 기본 종합 분석 (0~0회)",
        "  [전체 구간] 데이터 없음",
        "",
        line,
        "[주기 분석] 10회 주기 (나머지 0)",
        "  해당 조건의 회차가 없습니다.",
        "",
        line,
        "[구간 분석] 10회 단위 흐름",
        "",
        line,
        "[고급 패턴 분석]",
        "  데이터가 부족하여 고급 분석을 수행할 수 없습니다.",
      ]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("formatRecommendationReport", () => {
  const base: RecommendationResult = {
    nextRound: 101,
    insufficientData: false,
    seed: 7,
    generatedAt: "2024-01-01T00:00:00.000Z",
    recommendations: [
      {
        strategy: "hot",
        label: "최근 트렌드(Hot)",
        numbers: [3, 11, 19, 27, 38, 44],
        sum: 142,
        oddEvenRatio: "4:2",
      },
    ],
  };

  it("renders one aligned row per recommendation", () => {
    const lines = formatRecommendationReport(base);

    expect(lines[0]).toBe("[101회차 대비 추천 번호 1선]");
    expect(lines[4]).toBe(
      "01.  최근 트렌드(Hot)       [3, 11, 19, 27, 38, 44]     142   4:2"
    );
    expect(lines[lines.length - 1]).toBe("=".repeat(75));
  });

  it("prints a notice when there is no history", () => {
    const lines = formatRecommendationReport({
      ...base,
      nextRound: 1,
      insufficientData: true,
      recommendations: [],
    });
    expect(lines).toEqual([
      "[1회차 대비 추천 번호 0선]",
      "=".repeat(75),
      "  당첨 기록이 없어 추천할 수 없습니다.",
      "=".repeat(75),
    ]);
  });
});
