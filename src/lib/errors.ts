// 도메인 에러 정의. code 는 API 응답의 error 필드로 그대로 내려간다.

export class LottoError extends Error {
  constructor(public readonly code: string, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface RecordIssue {
  path: string;
  message: string;
}

export class InvalidDrawRecordError extends LottoError {
  constructor(public readonly issues: RecordIssue[], round?: number) {
    const where = round === undefined ? "" : ` (${round}회)`;
    const detail = issues.map((i) => `${i.path || "record"}: ${i.message}`);
    super(
      "INVALID_DRAW_RECORD",
      `잘못된 당첨 기록${where}: ${detail.join("; ")}`
    );
  }
}

export class DegenerateWeightsError extends LottoError {
  constructor(message: string) {
    super("DEGENERATE_WEIGHTS", message);
  }
}

export class SamplingExhaustedError extends LottoError {
  constructor(public readonly strategy: string, public readonly cap: number) {
    super(
      "SAMPLING_EXHAUSTED",
      `[${strategy}] ${cap}회 시도 안에 조건을 만족하는 조합을 만들지 못했습니다.`
    );
  }
}

export class CrawlerError extends LottoError {
  constructor(message: string) {
    super("CRAWLER_FAILED", message);
  }
}

export class InvalidOptionError extends LottoError {
  constructor(public readonly option: string, value: unknown) {
    super("INVALID_OPTION", `${option} 값이 올바르지 않습니다: ${String(value)}`);
  }
}
