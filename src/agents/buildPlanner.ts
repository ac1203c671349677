import type { BuildStage, SessionState } from '../types.js';
import type { AgentContext, SubAgentDefinition } from './type.js';
import { parseJsonObject, readNumber, readOptionalString, readRecordList, readStringList, type JsonObject } from '../responseParser.js';
import { formatAgentTrace, formatProfile, formatToolTrace, readToolCall, runSubAgent } from './pipeline.js';

export const BUILDPLANNER_FALLBACK =
  "I'd be happy to help you create a build plan! Tell me about your car and what you want to achieve.";

function readBuildPlan(obj: JsonObject): BuildStage[] | null {
  const stages = readRecordList(obj, 'build_plan').map((s, i): BuildStage => ({
    stage: readNumber(s, 'stage') ?? i + 1,
    mods: readStringList(s, 'mods'),
    timeline: readOptionalString(s, 'timeline'),
  }));
  const usable = stages.filter(s => s.mods.length > 0);
  return usable.length ? usable : null;
}

function priorRecommendations(state: SessionState): string {
  const slot = state.modRecommendations;
  return slot?.status === 'ok' ? JSON.stringify(slot.value, null, 2) : 'None';
}

const PLAN_FORMAT = `{"build_plan": [{"stage": number, "mods": string[], "timeline": string}]`;

export const buildPlannerAgent: SubAgentDefinition<BuildStage[]> = {
  name: 'buildplanner',
  temperature: 0.2,
  maxTokens: 2000,
  completionNotice: 'Build plan ready.',
  fallbackMessage: () => BUILDPLANNER_FALLBACK,

  buildPrompt: (state) => `You are the "buildplanner" agent in a modular assistant that helps car enthusiasts plan
long-term upgrade sequences. Produce a 3-5 stage build plan (e.g. intake -> downpipe -> tune).

User query: ${state.query}

Car profile:
${formatProfile(state)}

Existing mod recommendations:
${priorRecommendations(state)}

Agent trace:
${formatAgentTrace(state)}

Tool trace:
${formatToolTrace(state)}

If useful, suggest one tool to validate the plan, ONLY if it is not already in the tool trace:
suggest_install_order, estimate_mod_cost, check_compatibility

Return ONLY JSON:
${PLAN_FORMAT}, "tool_call": string|null}`,

  parseInitial(raw) {
    const parsed = parseJsonObject(raw);
    return {
      payload: readBuildPlan(parsed.value),
      toolCall: readToolCall(parsed.value),
      flags: {},
      parseError: !parsed.ok,
    };
  },

  refine: {
    json: true,
    buildPrompt: (state, initial, toolName, toolOutput) => `You are the "buildplanner" agent refining your build plan with tool data.

Car profile:
${formatProfile(state)}

Original build plan:
${initial ? JSON.stringify(initial, null, 2) : 'None'}

Output of ${toolName}:
${JSON.stringify(toolOutput, null, 2)}

Adjust, confirm or re-sequence the stages for fitment, cost and install strategy.
Return ONLY JSON:
${PLAN_FORMAT}}`,
    parse: (raw) => readBuildPlan(parseJsonObject(raw).value),
  },

  write(state, result) {
    state.buildPlan = result;
  },
};

export function runBuildPlannerAgent(state: SessionState, ctx: AgentContext): Promise<SessionState> {
  return runSubAgent(buildPlannerAgent, state, ctx);
}
