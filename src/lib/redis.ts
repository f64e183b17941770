// src/lib/redis.ts
// Redis 커넥션 + 공용 helper. REDIS_URL 이 없으면 캐시 없이 동작한다.

import { Redis } from "ioredis";

let redisUrl: string | undefined;
let redis: Redis | null = null;

export function configureRedis(url: string | undefined) {
  redisUrl = url;
}

/**
 * Redis 연결을 싱글턴으로 유지 (미설정이면 null)
 */
export function getRedis(): Redis | null {
  if (!redisUrl) return null;

  if (!redis) {
    redis = new Redis(redisUrl, {
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      retryStrategy(times) {
        // 1초 ~ 최대 3초 backoff
        return Math.min(times * 1000, 3000);
      },
    });

    redis.on("connect", () => {
      console.log("✅ Redis 연결 성공");
    });

    redis.on("error", (err) => {
      console.error("❌ Redis 오류 발생:", err.message);
    });
  }

  return redis;
}

/**
 * 키 저장 (JSON 자동 변환)
 * @param ttlSeconds Optional TTL(sec)
 */
export async function redisSet(key: string, value: unknown, ttlSeconds?: number) {
  const client = getRedis();
  if (!client) return;

  const json = JSON.stringify(value);
  if (ttlSeconds) {
    await client.set(key, json, "EX", ttlSeconds);
  } else {
    await client.set(key, json);
  }
}

/**
 * 키 조회 (JSON 자동 파싱)
 * @returns 파싱된 값, 없거나 깨졌으면 null
 */
export async function redisGet<T>(key: string): Promise<T | null> {
  const client = getRedis();
  if (!client) return null;

  const raw = await client.get(key);
  if (!raw) return null;

  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * 패턴으로 키 삭제
 */
export async function redisDeleteByPattern(pattern: string): Promise<number> {
  const client = getRedis();
  if (!client) return 0;

  const stream = client.scanStream({ match: pattern, count: 100 });
  const keysToDelete: string[] = [];

  for await (const keys of stream) {
    if (Array.isArray(keys)) {
      keysToDelete.push(...keys.filter((k): k is string => typeof k === "string"));
    }
  }

  if (keysToDelete.length > 0) await client.del(...keysToDelete);
  return keysToDelete.length;
}

export async function closeRedis() {
  if (redis) await redis.quit();
  redis = null;
}

/**
 * 캐시 조회 후 없으면 계산해서 저장. Redis 오류는 로그만 남기고 계산값을 반환한다.
 */
export async function withRedisCache<T>(
  key: string,
  ttlSeconds: number,
  compute: () => T
): Promise<T> {
  try {
    const hit = await redisGet<T>(key);
    if (hit !== null) return hit;
  } catch (err) {
    console.error(`[WARN] Redis 조회 실패 (${key}):`, err);
  }

  const value = compute();

  try {
    await redisSet(key, value, ttlSeconds);
  } catch (err) {
    console.error(`[WARN] Redis 저장 실패 (${key}):`, err);
  }

  return value;
}
