import { Redis } from 'ioredis';

const DEFAULT_REDIS_URL = 'redis://localhost:6379';

let redis: Redis | null = null;
let redisUrl = process.env.REDIS_URL ?? DEFAULT_REDIS_URL;

/** Shared client; the URL passed on the first call wins. */
export function getRedis(url?: string): Redis {
  if (!redis) {
    if (url) redisUrl = url;
    redis = new Redis(redisUrl, {
      maxRetriesPerRequest: null,
    });
  }
  return redis;
}

export async function closeRedis(): Promise<void> {
  if (redis) {
    await redis.quit();
    redis = null;
  }
}

export interface RedisConnectionOptions {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
  tls?: Record<string, never>;
  maxRetriesPerRequest: null;
}

/**
 * BullMQ opens its own connections; it gets plain options parsed from the
 * same URL as {@link getRedis}.
 */
export function redisConnectionOptions(url: string = redisUrl): RedisConnectionOptions {
  const parsed = new URL(url);
  const options: RedisConnectionOptions = {
    host: parsed.hostname || 'localhost',
    port: parsed.port ? Number(parsed.port) : 6379,
    maxRetriesPerRequest: null,
  };
  if (parsed.username) options.username = decodeURIComponent(parsed.username);
  if (parsed.password) options.password = decodeURIComponent(parsed.password);
  const db = parsed.pathname.replace(/^\//, '');
  if (db !== '') options.db = Number(db);
  if (parsed.protocol === 'rediss:') options.tls = {};
  return options;
}
