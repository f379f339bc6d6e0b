/**
 * Redis Connection
 * Backs the kill switch; one client per process
 */

import Redis from 'ioredis';

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  maxRetriesPerRequest: number;
  lazyConnect?: boolean;
  retryStrategy?: (times: number) => number | null;
}

/**
 * Reconnect with linear backoff (100ms steps, max 3s), give up after 10 attempts
 */
export function redisRetryStrategy(times: number): number | null {
  if (times > 10) {
    return null;
  }
  return Math.min(times * 100, 3000);
}

/**
 * Parse a redis:// URL into client options
 */
export function parseRedisUrl(url: string): RedisConfig {
  const parsed = new URL(url);
  const dbSegment = parsed.pathname.replace(/^\//, '');
  const db = dbSegment === '' ? 0 : parseInt(dbSegment, 10);

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    db: Number.isNaN(db) ? 0 : db,
    maxRetriesPerRequest: 3,
    retryStrategy: redisRetryStrategy,
  };
}

/**
 * Create Redis client
 */
export function createRedisClient(config: RedisConfig): Redis {
  const client = new Redis(config);

  client.on('error', (err: Error) => {
    // eslint-disable-next-line no-console
    console.error('[Redis] Client error:', err.message);
  });

  return client;
}

let redisClient: Redis | null = null;

/**
 * Process-wide client, created from REDIS_URL on first use
 */
export function getRedisClient(url = process.env.REDIS_URL || 'redis://localhost:6379'): Redis {
  if (!redisClient) {
    redisClient = createRedisClient(parseRedisUrl(url));
  }
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}

export type { Redis };
export type RedisClient = Redis;
