import type { AppConfig } from './config.js';
import type { AgentContext } from './agents/type.js';
import type { MemoryStore } from './memoryStore.js';
import type { ProfileStore } from './profileStore.js';
import { createOpenAICompletionService, withTimeout } from './openaiService.js';
import { invokeTool } from './toolFixtures.js';
import { createMemoryStore } from './memoryStore.js';
import { createProfileStore } from './profileStore.js';
import { closeRedis, getRedis } from './redisClient.js';

export interface AppServices {
  agent: AgentContext;
  memory: MemoryStore;
  profiles: ProfileStore;
  close(): Promise<void>;
}

/** Builds the production graph: OpenAI completions, fixture tools, Redis or in-memory stores. */
export function createAppServices(config: AppConfig): AppServices {
  const redis = getRedis({ enabled: config.redisEnabled, url: config.redisUrl });
  const memory = createMemoryStore({
    redis,
    maxRecords: config.memoryMaxRecords,
    retentionDays: config.memoryRetentionDays,
  });
  const profiles = createProfileStore({ redis });
  const completion = withTimeout(
    createOpenAICompletionService({ apiKey: config.openaiApiKey, model: config.openaiModel }),
    config.completionTimeoutMs
  );

  console.log(`[Services] model=${config.openaiModel} store=${redis ? 'redis' : 'memory'}`);
  return {
    agent: {
      completion,
      tools: invokeTool,
      memory,
      profiles,
      settings: {
        plannerMaxIterations: config.plannerMaxIterations,
        loopMaxIterations: config.loopMaxIterations,
        memoryContextLimit: config.memoryContextLimit,
      },
    },
    memory,
    profiles,
    close: closeRedis,
  };
}
