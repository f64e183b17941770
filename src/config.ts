import path from "path";
import { z } from "zod";

export interface StoreConfig {
  dataDir: string;
  latestFile: string;
  frequencyFile: string;
  extension: string;
}

export interface CrawlerConfig {
  targetUrl: string;
  chromePath?: string;
  chunkSize: number;
  waitMs: number;
}

export interface AppConfig {
  port: number;
  frontendUrl?: string;
  redisUrl?: string;
  syncCron: string;
  syncTimezone: string;
  store: StoreConfig;
  crawler: CrawlerConfig;
}

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  FRONTEND_URL: optionalString,
  REDIS_URL: optionalString,
  LOTTO_DATA_DIR: z.string().default("lotto_data"),
  LOTTO_TARGET_URL: z
    .string()
    .url()
    .default("https://www.dhlottery.co.kr/lt645/result"),
  CHROME_PATH: optionalString,
  SYNC_CRON: z.string().default("10 21 * * 6"), // 토요일 21시 10분
  SYNC_TIMEZONE: z.string().default("Asia/Seoul"),
  CRAWL_CHUNK_SIZE: z.coerce.number().int().positive().default(10),
  CRAWL_WAIT_MS: z.coerce.number().int().nonnegative().default(2000),
});

export function createStoreConfig(dataDir: string): StoreConfig {
  return {
    dataDir: path.resolve(dataDir),
    latestFile: "latest.lotto",
    frequencyFile: "frequency.lotto",
    extension: ".lotto",
  };
}

/**
 * 환경변수 → AppConfig
 * dotenv 로드는 진입점(server.ts, scripts)에서 먼저 끝나 있어야 한다.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`❌ 환경변수 설정 오류: ${detail}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    frontendUrl: e.FRONTEND_URL,
    redisUrl: e.REDIS_URL,
    syncCron: e.SYNC_CRON,
    syncTimezone: e.SYNC_TIMEZONE,
    store: createStoreConfig(e.LOTTO_DATA_DIR),
    crawler: {
      targetUrl: e.LOTTO_TARGET_URL,
      chromePath: e.CHROME_PATH,
      chunkSize: e.CRAWL_CHUNK_SIZE,
      waitMs: e.CRAWL_WAIT_MS,
    },
  };
}
