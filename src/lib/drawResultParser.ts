// drawResultParser.ts — 당첨결과 페이지 HTML 파싱
import * as cheerio from "cheerio";

export interface CrawledDraw {
  round: number;
  numbers: number[];
  bonus: number;
  winners: number;
  amountPerWinner: number;
}

/** "1,234,567원" → 1234567, 숫자가 없으면 0 */
export function parseDigits(text: string): number {
  const clean = text.replace(/[^\d]/g, "");
  return clean ? Number(clean) : 0;
}

/** 회차 선택 select 의 첫 번째 숫자 option = 최신 회차 */
export function parseLatestRound(html: string): number {
  const $ = cheerio.load(html);
  const values = $("select#srchStrLtEpsd option")
    .toArray()
    .map((el) => ($(el).attr("value") ?? "").trim());

  const latest = values.find((v) => /^\d+$/.test(v));
  return latest ? Number(latest) : 0;
}

export function parseDrawResults(html: string): CrawledDraw[] {
  const $ = cheerio.load(html);
  const container = $("div#tableMoDiv");

  if (container.length === 0) {
    console.warn("[WARN] 결과 영역(tableMoDiv)을 찾지 못했습니다.");
    return [];
  }

  const results: CrawledDraw[] = [];

  container.find("div.mo-table-list").each((_, el) => {
    const item = $(el);
    const roundWrap = item.find("div.round-wrap").first();
    if (roundWrap.length === 0) return;

    const spans = roundWrap.find("span");
    const roundMatch = spans.eq(0).text().match(/\d+/);
    if (!roundMatch) {
      console.warn("[WARN] 회차 번호 없는 항목 건너뜀");
      return;
    }
    const round = Number(roundMatch[0]);

    const ballBoxes = item.find("div.result-ballBox");
    if (ballBoxes.length < 2) {
      console.warn(`[WARN][${round}] 번호 영역 누락, 건너뜀`);
      return;
    }

    const numbers = ballBoxes
      .eq(0)
      .find("div.result-ball")
      .toArray()
      .map((ball) => parseDigits($(ball).text()));
    const bonus = parseDigits(ballBoxes.eq(1).find("div.result-ball").first().text());

    results.push({
      round,
      numbers,
      bonus,
      winners: parseDigits(spans.eq(2).text()),
      amountPerWinner: parseDigits(item.find("span.txt-price").first().text()),
    });
  });

  return results;
}
