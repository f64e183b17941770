import fs from "fs";
import puppeteer from "puppeteer-core";
import type { Browser, Page } from "puppeteer-core";
import { CrawlerConfig } from "../config";
import { CrawlerError } from "./errors";
import {
  CrawledDraw,
  parseDrawResults,
  parseLatestRound,
} from "./drawResultParser";

/** 당첨 기록 공급원. 동기화 로직은 이 인터페이스에만 의존한다. */
export interface DrawSource {
  fetchLatestRound(): Promise<number>;
  fetchRange(start: number, end: number): Promise<CrawledDraw[]>;
  close(): Promise<void>;
}

const ROUND_SELECT_ID = "srchStrLtEpsd";
const ROUND_END_SELECT_ID = "srchEndLtEpsd";
const SEARCH_BUTTON_ID = "btnWnNoPop";

const findChromiumPath = (): string | undefined => {
  const paths = [
    "/usr/bin/chromium-browser",
    "/usr/bin/chromium",
    "/usr/bin/google-chrome",
    "/snap/bin/chromium",
  ];
  return paths.find((p) => fs.existsSync(p));
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

export class LottoResultCrawler implements DrawSource {
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor(private readonly config: CrawlerConfig) {}

  private async openPage(): Promise<Page> {
    if (this.page) return this.page;

    const executablePath = this.config.chromePath ?? findChromiumPath();
    if (!executablePath) {
      throw new CrawlerError(
        "Chromium 실행 파일을 찾지 못했습니다. CHROME_PATH 를 설정하세요."
      );
    }

    this.browser = await puppeteer.launch({
      headless: true,
      executablePath,
      args: [
        "--no-sandbox",
        "--disable-setuid-sandbox",
        "--disable-dev-shm-usage",
        "--disable-gpu",
      ],
    });
    console.log("[INFO] Browser launched successfully");

    const page = await this.browser.newPage();

    // 불필요한 리소스 차단 (속도 향상)
    await page.setRequestInterception(true);
    page.on("request", (request) => {
      const blocked = ["image", "stylesheet", "font", "media"].includes(
        request.resourceType()
      );
      const handled = blocked ? request.abort() : request.continue();
      handled.catch((err: unknown) =>
        console.error("[ERROR] request interception failed:", err)
      );
    });

    await page.setUserAgent(
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) " +
        "AppleWebKit/537.36 (KHTML, like Gecko) " +
        "Chrome/120.0.0.0 Safari/537.36"
    );
    await page.setExtraHTTPHeaders({
      "Accept-Language": "ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7",
    });

    console.log(`[INFO] Navigating to ${this.config.targetUrl}`);
    await page.goto(this.config.targetUrl, {
      waitUntil: "domcontentloaded",
      timeout: 60000,
    });
    await page.waitForSelector(`#${ROUND_SELECT_ID}`, { timeout: 10000 });

    this.page = page;
    return page;
  }

  async fetchLatestRound(): Promise<number> {
    const page = await this.openPage();
    return parseLatestRound(await page.content());
  }

  async fetchRange(start: number, end: number): Promise<CrawledDraw[]> {
    const page = await this.openPage();
    console.log(`[INFO] Fetching rounds ${start} ~ ${end}`);

    await page.evaluate(
      (ids, from, to) => {
        const startSelect = document.getElementById(ids.start);
        const endSelect = document.getElementById(ids.end);
        const button = document.getElementById(ids.button);
        if (startSelect instanceof HTMLSelectElement) startSelect.value = from;
        if (endSelect instanceof HTMLSelectElement) endSelect.value = to;
        button?.click();
      },
      { start: ROUND_SELECT_ID, end: ROUND_END_SELECT_ID, button: SEARCH_BUTTON_ID },
      String(start),
      String(end)
    );

    await sleep(this.config.waitMs);
    return parseDrawResults(await page.content());
  }

  async close(): Promise<void> {
    if (this.browser) await this.browser.close();
    this.browser = null;
    this.page = null;
  }
}
