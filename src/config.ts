import { z } from 'zod';

const intWithDefault = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: intWithDefault(3000),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  REDIS_ENABLED: z.string().optional().transform(v => v === 'true'),
  REDIS_URL: z.string().optional(),
  PLANNER_MAX_ITERATIONS: intWithDefault(5),
  LOOP_MAX_ITERATIONS: intWithDefault(10),
  COMPLETION_TIMEOUT_MS: intWithDefault(30_000),
  MEMORY_MAX_RECORDS: intWithDefault(10),
  MEMORY_RETENTION_DAYS: intWithDefault(7),
  MEMORY_CONTEXT_LIMIT: intWithDefault(3),
});

export interface AppConfig {
  port: number;
  openaiApiKey: string | undefined;
  openaiModel: string;
  redisEnabled: boolean;
  redisUrl: string | undefined;
  plannerMaxIterations: number;
  loopMaxIterations: number;
  completionTimeoutMs: number;
  memoryMaxRecords: number;
  memoryRetentionDays: number;
  memoryContextLimit: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(`Invalid environment: ${first ? `${first.path.join('.')} ${first.message}` : 'unknown issue'}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    openaiApiKey: e.OPENAI_API_KEY || undefined,
    openaiModel: e.OPENAI_MODEL,
    redisEnabled: e.REDIS_ENABLED,
    redisUrl: e.REDIS_URL || undefined,
    plannerMaxIterations: e.PLANNER_MAX_ITERATIONS,
    loopMaxIterations: e.LOOP_MAX_ITERATIONS,
    completionTimeoutMs: e.COMPLETION_TIMEOUT_MS,
    memoryMaxRecords: e.MEMORY_MAX_RECORDS,
    memoryRetentionDays: e.MEMORY_RETENTION_DAYS,
    memoryContextLimit: e.MEMORY_CONTEXT_LIMIT,
  };
}
