import { PLANNER_ACTIONS, type AgentName, type AgentResult, type PlannerAction, type SessionState } from '../types.js';
import type { AgentContext } from './type.js';
import { parseJsonObject, readNumber, readString } from '../responseParser.js';
import { formatMemoryForPrompt, NO_MEMORY_CONTEXT } from '../memoryStore.js';
import { formatAgentTrace, formatProfile } from './pipeline.js';
import { runInfoAgent } from './info.js';
import { runDiagnosticAgent } from './diagnostic.js';
import { runModCoachAgent } from './modCoach.js';
import { runBuildPlannerAgent } from './buildPlanner.js';
import { runProfileUpdaterAgent } from './profileUpdater.js';
import { APOLOGY_MESSAGE, CLOSING_MESSAGE, MAX_ITERATIONS_MESSAGE } from './messages.js';
import { getErrorMessage } from '../utils/error-utils.js';

export type PlannerDecision =
  | { kind: 'action'; action: PlannerAction; reasoning: string; confidence: number | null }
  | { kind: 'unrecognized'; reasoning: string };

type SubAgentRunner = (state: SessionState, ctx: AgentContext) => Promise<SessionState>;

const SUB_AGENTS: Record<AgentName, SubAgentRunner> = {
  info: runInfoAgent,
  diagnostic: runDiagnosticAgent,
  modcoach: runModCoachAgent,
  buildplanner: runBuildPlannerAgent,
  profile_updater: runProfileUpdaterAgent,
};

const KNOWN_ACTIONS: ReadonlySet<string> = new Set(PLANNER_ACTIONS);

function isPlannerAction(value: string): value is PlannerAction {
  return KNOWN_ACTIONS.has(value);
}

/** Maps raw model text onto the closed action set; anything else is `unrecognized`. */
export function parsePlannerDecision(raw: string): PlannerDecision {
  const parsed = parseJsonObject(raw);
  if (!parsed.ok) {
    return { kind: 'unrecognized', reasoning: 'Error parsing response: planner output was not a JSON object' };
  }
  const action = parsed.value.action;
  const normalized = typeof action === 'string' ? action.trim().toLowerCase() : '';
  if (!isPlannerAction(normalized)) {
    const shown = typeof action === 'string' ? action : String(action);
    return { kind: 'unrecognized', reasoning: `Error parsing response: Invalid action: ${shown}` };
  }
  return {
    kind: 'action',
    action: normalized,
    reasoning: readString(parsed.value, 'reasoning'),
    confidence: readNumber(parsed.value, 'confidence'),
  };
}

function describeSlot<T>(slot: AgentResult<T> | null): string {
  if (!slot) return 'None';
  if (slot.status === 'fallback') return `None (agent fell back: "${slot.message}")`;
  return typeof slot.value === 'string' ? slot.value : JSON.stringify(slot.value, null, 2);
}

export function buildPlannerPrompt(state: SessionState, memoryContext: string): string {
  return `You are the planning agent of a modular assistant for car enthusiasts. Each turn you choose
exactly ONE next action, look at what it produced, and decide again until the user's request is handled.

Capabilities:
- info: factual answers, definitions, greetings, general advice
- diagnostic: analysis of mechanical symptoms and problems
- modcoach: performance upgrade recommendations for the user's car and goals
- buildplanner: multi-stage long-term build plans
- profile_updater: store car details the user mentions (make, model, year, preferences)
- end: finish when the request has been fully addressed

User query: ${state.query}

Car profile:
${formatProfile(state)}

Previous actions:
${formatAgentTrace(state)}

Flags: ${JSON.stringify(state.flags)}

Info answer: ${describeSlot(state.infoAnswer)}

Diagnosis: ${describeSlot(state.diagnosis)}

Mod recommendations: ${describeSlot(state.modRecommendations)}

Build plan: ${describeSlot(state.buildPlan)}

Profile update: ${describeSlot(state.profileUpdate)}

${memoryContext}

Rules:
- Start with info for anything general knowledge can answer; a greeting gets info once, then end.
- Use diagnostic only for specific symptoms, modcoach only for requested upgrades,
  buildplanner only for multi-stage sequences.
- Do not repeat an agent unless new information requires it.
- End as soon as the user's request has been addressed.

Return ONLY JSON:
{"action": "info"|"diagnostic"|"modcoach"|"buildplanner"|"profile_updater"|"end", "reasoning": string, "confidence": number}`;
}

async function loadMemoryContext(state: SessionState, ctx: AgentContext): Promise<string> {
  try {
    const memories = await ctx.memory.recent(state.userId, ctx.settings.memoryContextLimit);
    return formatMemoryForPrompt(memories);
  } catch (err) {
    console.warn(`[Planner] Memory retrieval failed for ${state.userId}:`, getErrorMessage(err));
    return NO_MEMORY_CONTEXT;
  }
}

/**
 * Asks the model for the next action and runs it, until it chooses `end`, an
 * iteration fails, or the iteration cap is hit. Always leaves `finalMessage` set.
 */
export async function runAgenticPlanner(state: SessionState, ctx: AgentContext): Promise<SessionState> {
  const maxIterations = ctx.settings.plannerMaxIterations;
  const memoryContext = await loadMemoryContext(state, ctx);
  let iteration = 0;

  while (iteration < maxIterations) {
    iteration++;
    try {
      const raw = await ctx.completion.complete(buildPlannerPrompt(state, memoryContext), {
        temperature: 0,
        maxTokens: 512,
        json: true,
      });
      const decision = parsePlannerDecision(raw);
      const action: PlannerAction = decision.kind === 'action' ? decision.action : 'end';
      if (decision.kind === 'unrecognized') state.flags.planner_parse_error = true;

      console.log(`[Planner] iteration ${iteration}: ${action} - ${decision.reasoning}`);
      state.agentTrace.push(`Planner[${iteration}] → ${action}: ${decision.reasoning}`);

      if (action === 'end') {
        if (state.finalMessage === null) state.finalMessage = CLOSING_MESSAGE;
        return state;
      }
      await SUB_AGENTS[action](state, ctx);
    } catch (err) {
      const message = getErrorMessage(err);
      console.error(`[Planner] iteration ${iteration} failed:`, message);
      state.failure = message;
      state.finalMessage = APOLOGY_MESSAGE;
      state.agentTrace.push(`Planner[${iteration}] → error: ${message}`);
      return state;
    }
  }

  console.warn(`[Planner] reached max iterations (${maxIterations}), ending session`);
  state.finalMessage = MAX_ITERATIONS_MESSAGE;
  state.flags.max_iterations = true;
  state.agentTrace.push(`Planner[${iteration}] → end: Reached maximum iterations`);
  return state;
}
