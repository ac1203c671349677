import { Redis } from 'ioredis';

/** The list commands the memory store issues; an ioredis client satisfies it. */
export interface RedisListClient {
  lpush(key: string, value: string): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  lrem(key: string, count: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

/** The string commands the profile store issues. */
export interface RedisKeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

let redis: Redis | null = null;

/** Shared client; null when Redis is disabled and the stores fall back to process memory. */
export function getRedis(opts: { enabled: boolean; url?: string }): Redis | null {
  if (!opts.enabled) return null;
  if (redis) return redis;
  redis = opts.url ? new Redis(opts.url) : new Redis();
  redis.on('error', (e) => console.error('[Redis]', e));
  return redis;
}

export async function closeRedis(): Promise<void> {
  if (!redis) return;
  const client = redis;
  redis = null;
  await client.quit();
}
