// reportFormatter.ts — CLI 출력용 텍스트 리포트
import { DrawRecord } from "../types/lotto";
import {
  carryoverDistribution,
  consecutiveIncidence,
  endingDigitDistribution,
  GroupSummary,
  intervalSummaries,
  moduloGroup,
  pairWeights,
  rankPairs,
  summarizeGroup,
} from "./lottoStatistics";
import { RecommendationResult } from "./lottoRecommender";
import { LottoError } from "./errors";

const LINE = "=".repeat(60);

export interface AnalysisReportOptions {
  modulo?: number;
  remainder?: number;
  interval?: number;
  topPairs?: number;
}

/**
 * CLI 인자 → 분석 범위. 미지정이면 마지막 저장 회차 기준 최근 span 회.
 * 저장된 회차가 없으면 빈 범위(1~1)를 돌려 "데이터 없음" 리포트가 출력되게 한다.
 */
export function resolveReportRange(
  startArg: string | undefined,
  endArg: string | undefined,
  lastSavedRound: number,
  span = 100
): { start: number; end: number } {
  const start = startArg === undefined ? Math.max(1, lastSavedRound - span) : Number(startArg);
  const end = endArg === undefined ? Math.max(start, lastSavedRound) : Number(endArg);

  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < start) {
    throw new LottoError("INVALID_RANGE", `잘못된 범위: ${startArg} ~ ${endArg}`);
  }
  return { start, end };
}

function groupLines(title: string, summary: GroupSummary): string[] {
  if (summary.insufficientData) return [`  [${title}] 데이터 없음`];

  const top = summary.topNumbers.map((t) => `${t.number}(${t.count})`).join(", ");
  return [
    `  [${title}] (대상 ${summary.rounds}회)`,
    `    - 평균 총합: ${summary.averageSum.toFixed(1)}`,
    `    - 최다 출현 Top 5: ${top}`,
  ];
}

function percent(part: number, whole: number): string {
  return whole === 0 ? "0.0" : ((part / whole) * 100).toFixed(1);
}

export function formatAnalysisReport(
  records: readonly DrawRecord[],
  { modulo = 10, remainder = 0, interval = 10, topPairs = 5 }: AnalysisReportOptions = {}
): string[] {
  const first = records[0]?.round ?? 0;
  const last = records[records.length - 1]?.round ?? 0;
  const lines: string[] = [];

  lines.push(LINE, `[1] 기본 종합 분석 (${first}~${last}회)`);
  lines.push(...groupLines("전체 구간", summarizeGroup(records)));

  const mod = moduloGroup(records, modulo, remainder);
  lines.push("", LINE, `[주기 분석] ${modulo}회 주기 (나머지 ${remainder})`);
  if (mod.rounds.length === 0) {
    lines.push("  해당 조건의 회차가 없습니다.");
  } else {
    let roundsDesc = mod.rounds.join(", ");
    if (roundsDesc.length > 60) roundsDesc = `${roundsDesc.slice(0, 60)}...`;
    lines.push(...groupLines(`대상 회차: ${roundsDesc}`, mod.summary));
  }

  lines.push("", LINE, `[구간 분석] ${interval}회 단위 흐름`);
  for (const chunk of intervalSummaries(records, interval)) {
    const top = chunk.topNumber
      ? `${chunk.topNumber.number}번(${chunk.topNumber.count}회)`
      : "-";
    lines.push(
      `  [${chunk.startRound}회~${chunk.endRound}회] 평균합: ${chunk.averageSum
        .toFixed(1)
        .padStart(5)} | 최다출현: ${top}`
    );
  }

  lines.push("", LINE, "[고급 패턴 분석]");
  const carryover = carryoverDistribution(records);
  if (carryover.insufficientData) {
    lines.push("  데이터가 부족하여 고급 분석을 수행할 수 없습니다.");
    return lines;
  }

  lines.push("", "  1. 이월수(전회차 번호 재출현) 통계:");
  for (const [count, freq] of Object.entries(carryover.distribution)) {
    if (freq === 0) continue;
    lines.push(
      `    - ${count}개 이월: ${freq}회 (${percent(freq, carryover.comparedRounds)}%)`
    );
  }

  const consecutive = consecutiveIncidence(records);
  lines.push(
    "",
    "  2. 연번(연속된 숫자) 출현 빈도:",
    `    - 연번 포함 회차: ${consecutive.withConsecutive}회 (${consecutive.percentage.toFixed(1)}%)`
  );

  const endings = endingDigitDistribution(records)
    .ranking.slice(0, 5)
    .map((e) => `${e.digit}끝(${e.count}회)`)
    .join(", ");
  lines.push("", "  3. 끝수(1의 자리) 출현 순위:", `    - 상위 5개 끝수: ${endings}`);

  lines.push("", `  4. 베스트 궁합수 (동반 출현 Top ${topPairs}):`);
  for (const { pair, count } of rankPairs(pairWeights(records), topPairs)) {
    lines.push(`    - ${pair[0]}번 & ${pair[1]}번: 함께 ${count}회 출현`);
  }

  return lines;
}

export function formatRecommendationReport(result: RecommendationResult): string[] {
  const width = 75;
  const lines = [
    `[${result.nextRound}회차 대비 추천 번호 ${result.recommendations.length}선]`,
    "=".repeat(width),
  ];

  if (result.insufficientData) {
    lines.push("  당첨 기록이 없어 추천할 수 없습니다.", "=".repeat(width));
    return lines;
  }

  lines.push(
    `${"No.".padEnd(5)}${"전략".padEnd(18)}${"추천 번호".padEnd(28)}${"총합".padEnd(6)}홀:짝`,
    "-".repeat(width)
  );

  result.recommendations.forEach((rec, i) => {
    const no = String(i + 1).padStart(2, "0");
    const nums = `[${rec.numbers.join(", ")}]`;
    lines.push(
      `${`${no}.`.padEnd(5)}${rec.label.padEnd(18)}${nums.padEnd(28)}${String(rec.sum).padEnd(6)}${rec.oddEvenRatio}`
    );
  });

  lines.push("=".repeat(width));
  return lines;
}
