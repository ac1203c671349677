import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { ConversationMemory } from './types.js';
import { readString } from './responseParser.js';
import type { RedisListClient } from './redisClient.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const memorySchema = z.object({
  id: z.string(),
  userId: z.string(),
  sessionId: z.string(),
  query: z.string(),
  agentTrace: z.array(z.string()),
  finalOutput: z.record(z.unknown()),
  carProfileSnapshot: z.record(z.unknown()),
  createdAt: z.string(),
});

export type NewMemory = Omit<ConversationMemory, 'id' | 'createdAt'>;

export interface MemoryStore {
  /** Appends a record, then prunes that user's history. */
  store(entry: NewMemory): Promise<ConversationMemory>;
  /** Newest first. */
  recent(userId: string, limit: number): Promise<ConversationMemory[]>;
  /** Oldest first. */
  forSession(userId: string, sessionId: string): Promise<ConversationMemory[]>;
  /** Returns how many records were deleted. */
  prune(userId: string): Promise<number>;
}

export interface MemoryStoreOptions {
  redis: RedisListClient | null;
  maxRecords: number;
  retentionDays: number;
  now?: () => Date;
}

const key = (userId: string) => `memory:${userId}`;

function decode(raw: string): ConversationMemory | null {
  let json: unknown = null;
  try { json = JSON.parse(raw); } catch { json = null; }
  const parsed = memorySchema.safeParse(json);
  if (parsed.success) return parsed.data;
  console.warn('[MemoryStore] Skipping corrupt memory record');
  return null;
}

export function createMemoryStore(opts: MemoryStoreOptions): MemoryStore {
  const now = opts.now ?? (() => new Date());
  const mem = new Map<string, ConversationMemory[]>();

  // records are newest first and time-ordered, so the ones to keep form a prefix
  function keepCount(records: ConversationMemory[]): number {
    const cutoff = now().getTime() - opts.retentionDays * DAY_MS;
    let fresh = 0;
    while (fresh < records.length && Date.parse(records[fresh].createdAt) >= cutoff) fresh++;
    return Math.min(fresh, opts.maxRecords);
  }

  async function load(userId: string): Promise<ConversationMemory[]> {
    if (!opts.redis) return mem.get(userId) ?? [];
    const rows = await opts.redis.lrange(key(userId), 0, -1);
    return rows.flatMap((r) => {
      const m = decode(r);
      return m ? [m] : [];
    });
  }

  async function pruneRedis(redis: RedisListClient, userId: string): Promise<number> {
    const rows = await redis.lrange(key(userId), 0, -1);
    const decoded = rows.map(decode);
    const valid = decoded.filter((m): m is ConversationMemory => m !== null);
    const corrupt = new Set(rows.filter((_, i) => decoded[i] === null));
    const keep = keepCount(valid);
    if (keep === rows.length) return 0;

    if (keep === 0) {
      await redis.del(key(userId));
      return rows.length;
    }
    for (const raw of corrupt) await redis.lrem(key(userId), 0, raw);
    // with corrupt rows gone the list holds exactly the valid records, in order
    if (keep < valid.length) await redis.ltrim(key(userId), 0, keep - 1);
    return rows.length - keep;
  }

  const store: MemoryStore = {
    async store(entry) {
      const record: ConversationMemory = { ...entry, id: uuid(), createdAt: now().toISOString() };
      if (!opts.redis) {
        mem.set(entry.userId, [record, ...(mem.get(entry.userId) ?? [])]);
      } else {
        await opts.redis.lpush(key(entry.userId), JSON.stringify(record));
      }
      const removed = await store.prune(entry.userId);
      console.log(`[MemoryStore] SAVE ${entry.userId}/${entry.sessionId}: id=${record.id}, pruned=${removed}`);
      return record;
    },

    async recent(userId, limit) {
      const all = await load(userId);
      return all.slice(0, Math.max(0, limit));
    },

    async forSession(userId, sessionId) {
      const all = await load(userId);
      return all.filter(m => m.sessionId === sessionId).reverse();
    },

    async prune(userId) {
      if (opts.redis) return pruneRedis(opts.redis, userId);
      const all = mem.get(userId) ?? [];
      const keep = keepCount(all);
      if (keep === 0) mem.delete(userId);
      else if (keep < all.length) mem.set(userId, all.slice(0, keep));
      return all.length - keep;
    },
  };
  return store;
}

export const NO_MEMORY_CONTEXT = 'No previous conversations found.';

export function formatMemoryForPrompt(memories: ConversationMemory[]): string {
  if (!memories.length) return NO_MEMORY_CONTEXT;

  let formatted = 'RECENT CONVERSATION HISTORY:\n';
  memories.forEach((m, i) => {
    const type = readString(m.finalOutput, 'type', 'unknown');
    formatted += `\n${i + 1}. Query: ${m.query}\n`;
    formatted += `   Agents: ${m.agentTrace.join(', ')}\n`;
    formatted += `   Output: ${type}\n`;
    formatted += `   Date: ${m.createdAt.slice(0, 10)}\n`;
  });
  return formatted;
}
