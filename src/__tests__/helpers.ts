import type { CompletionOptions, CompletionService } from '../openaiService.js';
import type { AgentContext, AgentSettings } from '../agents/type.js';
import type { ToolInvoker } from '../toolFixtures.js';
import { invokeTool } from '../toolFixtures.js';
import { createMemoryStore, type MemoryStore } from '../memoryStore.js';
import { createProfileStore, type ProfileStore } from '../profileStore.js';
import { defaultCarProfile } from '../schemas/carProfile.js';
import type { RedisKeyValueClient, RedisListClient } from '../redisClient.js';
import { createSessionState, type CarProfile, type SessionState } from '../types.js';

/** 'planner', an agent name, or '<agent>:refine', read from the prompt's opening line. */
export function promptKind(prompt: string): string {
  if (prompt.startsWith('You are the planning agent')) return 'planner';
  const m = /^You are the "([a-z_]+)" agent( refining)?/.exec(prompt);
  if (!m) return 'unknown';
  return m[2] ? `${m[1]}:refine` : m[1];
}

export interface RecordedCall {
  kind: string;
  prompt: string;
  options: CompletionOptions;
}

/** A fixed reply, a sequence whose last entry repeats, or an error to throw. */
export type ScriptEntry = string | string[] | Error;

export class ScriptedCompletion implements CompletionService {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly script: Record<string, ScriptEntry>) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const kind = promptKind(prompt);
    this.calls.push({ kind, prompt, options });
    const entry = this.script[kind];
    if (entry === undefined) throw new Error(`no scripted reply for ${kind}`);
    if (entry instanceof Error) throw entry;
    if (typeof entry === 'string') return entry;
    const n = this.calls.filter(c => c.kind === kind).length;
    return entry[Math.min(n, entry.length) - 1] ?? '';
  }

  kinds(): string[] {
    return this.calls.map(c => c.kind);
  }
}

export function plan(action: string, reasoning = `chose ${action}`): string {
  return JSON.stringify({ action, reasoning, confidence: 0.9 });
}

export function json(value: unknown): string {
  return JSON.stringify(value);
}

export const TEST_SETTINGS: AgentSettings = {
  plannerMaxIterations: 5,
  loopMaxIterations: 10,
  memoryContextLimit: 3,
};

export function createTestContext(
  completion: CompletionService,
  overrides: {
    tools?: ToolInvoker;
    memory?: MemoryStore;
    profiles?: ProfileStore;
    settings?: Partial<AgentSettings>;
  } = {}
): AgentContext {
  return {
    completion,
    tools: overrides.tools ?? invokeTool,
    memory: overrides.memory ?? createMemoryStore({ redis: null, maxRecords: 10, retentionDays: 7 }),
    profiles: overrides.profiles ?? createProfileStore({ redis: null }),
    settings: { ...TEST_SETTINGS, ...overrides.settings },
  };
}

export function newState(query: string, carProfile: CarProfile = defaultCarProfile()): SessionState {
  return createSessionState({ query, userId: 'user-1', sessionId: 'session-1', carProfile });
}

/** In-process stand-in for the Redis commands the stores use. */
export class FakeRedis implements RedisListClient, RedisKeyValueClient {
  readonly lists = new Map<string, string[]>();
  readonly strings = new Map<string, string>();

  async lpush(key: string, value: string): Promise<number> {
    const list = [value, ...(this.lists.get(key) ?? [])];
    this.lists.set(key, list);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key) ?? [];
    return list.slice(start, stop === -1 ? undefined : stop + 1);
  }

  async ltrim(key: string, start: number, stop: number): Promise<'OK'> {
    this.lists.set(key, await this.lrange(key, start, stop));
    return 'OK';
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    if (count !== 0) throw new Error('FakeRedis only supports LREM with count 0');
    const list = this.lists.get(key) ?? [];
    const rest = list.filter(v => v !== value);
    this.lists.set(key, rest);
    return list.length - rest.length;
  }

  async del(key: string): Promise<number> {
    const existed = this.lists.delete(key) || this.strings.delete(key);
    return existed ? 1 : 0;
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.strings.set(key, value);
    return 'OK';
  }
}
