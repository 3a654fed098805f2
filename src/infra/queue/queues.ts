import type { RedisOptions } from "ioredis";

/**
 * Uses hyphen-only queue names because BullMQ uses colon as an internal Redis key separator.
 */
export const researchQueueName = "company-research";

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  const db = Number.parseInt(parsed.pathname.replace("/", "").trim(), 10);

  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: Number.isFinite(db) ? db : 0,
    // BullMQ workers block on Redis and require this to be null.
    maxRetriesPerRequest: null,
  };
};
