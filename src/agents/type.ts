import type { CompletionService } from '../openaiService.js';
import type { ToolInvoker } from '../toolFixtures.js';
import type { MemoryStore } from '../memoryStore.js';
import type { ProfileStore } from '../profileStore.js';
import type { AgentName, AgentResult, SessionState, ToolOutput } from '../types.js';

export interface AgentSettings {
  plannerMaxIterations: number;
  loopMaxIterations: number;
  memoryContextLimit: number;
}

/** Collaborators shared by the planner and every sub-agent during one turn. */
export interface AgentContext {
  completion: CompletionService;
  tools: ToolInvoker;
  memory: MemoryStore;
  profiles: ProfileStore;
  settings: AgentSettings;
}

export interface InitialPass<T> {
  payload: T | null;
  toolCall: string | null;
  flags: Record<string, boolean>;
  parseError: boolean;
}

export interface ToolRefinement<T> {
  buildPrompt(state: SessionState, initial: T | null, toolName: string, toolOutput: ToolOutput): string;
  /** null when the refined output held nothing usable. */
  parse(raw: string): T | null;
  /** Whether the refine pass answers in JSON (false: plain text). */
  json: boolean;
}

/**
 * One capability run by the shared pipeline in `pipeline.ts`: how to prompt,
 * how to read the answer, and which slot of the session state it owns.
 */
export interface SubAgentDefinition<T> {
  name: AgentName;
  temperature: number;
  maxTokens: number;
  completionNotice: string;
  fallbackMessage(state: SessionState): string;
  buildPrompt(state: SessionState): string;
  parseInitial(raw: string): InitialPass<T>;
  refine?: ToolRefinement<T>;
  /** Mod names handed to tool fixtures that inspect the agent's own proposal. */
  toolMods?(payload: T | null): string[] | undefined;
  /** Side effects for a usable payload (persistence); may adjust what gets written. */
  persist?(state: SessionState, payload: T, ctx: AgentContext): Promise<T>;
  write(state: SessionState, result: AgentResult<T>): void;
}
