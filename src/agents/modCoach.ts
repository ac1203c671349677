import type { ModRecommendation, SessionState } from '../types.js';
import type { AgentContext, SubAgentDefinition } from './type.js';
import { parseJsonObject, readBooleanMap, readOptionalString, readRecordList, readString, type JsonObject } from '../responseParser.js';
import { formatAgentTrace, formatProfile, formatToolTrace, readToolCall, runSubAgent } from './pipeline.js';

export const MODCOACH_FALLBACK =
  "I'd be happy to recommend some mods! Tell me about your car and what you want to achieve.";

function readModRecommendations(obj: JsonObject): ModRecommendation[] | null {
  const mods = readRecordList(obj, 'mod_recommendations').flatMap((m): ModRecommendation[] => {
    const name = readString(m, 'name').trim();
    if (!name) return [];
    return [{
      name,
      type: readString(m, 'type', 'general'),
      justification: readString(m, 'justification'),
      confidence: readOptionalString(m, 'confidence'),
    }];
  });
  return mods.length ? mods : null;
}

export const modCoachAgent: SubAgentDefinition<ModRecommendation[]> = {
  name: 'modcoach',
  temperature: 0.2,
  maxTokens: 2000,
  completionNotice: 'Mod recommendations ready.',
  fallbackMessage: () => MODCOACH_FALLBACK,

  buildPrompt: (state) => `You are the "modcoach" agent in a modular assistant that helps car enthusiasts plan
performance upgrades. Recommend goal-aligned modifications for the user's car.

User query: ${state.query}

Car profile:
${formatProfile(state)}

Agent trace:
${formatAgentTrace(state)}

Tool trace:
${formatToolTrace(state)}

For each mod give name, type (category), justification and confidence (high|medium|low).
Suggest a tool for more detail ONLY if it is not already in the tool trace:
check_compatibility, estimate_power_gains, price_analysis

Return ONLY JSON:
{"mod_recommendations": [{"name": string, "type": string, "justification": string, "confidence": string}],
 "additional_flags": {string: boolean}, "tool_call": string|null}`,

  parseInitial(raw) {
    const parsed = parseJsonObject(raw);
    return {
      payload: readModRecommendations(parsed.value),
      toolCall: readToolCall(parsed.value),
      flags: readBooleanMap(parsed.value, 'additional_flags'),
      parseError: !parsed.ok,
    };
  },

  toolMods: (payload) => payload?.map(m => m.name),

  refine: {
    json: true,
    buildPrompt: (state, initial, toolName, toolOutput) => `You are the "modcoach" agent refining your modification suggestions with tool data.

Car profile:
${formatProfile(state)}

Prior mod recommendations:
${initial ? JSON.stringify(initial, null, 2) : 'None'}

Output of ${toolName}:
${JSON.stringify(toolOutput, null, 2)}

Tool trace:
${formatToolTrace(state)}

Validate or revise the suggestions. Return ONLY JSON:
{"mod_recommendations": [{"name": string, "type": string, "justification": string, "confidence": string}]}`,
    parse: (raw) => readModRecommendations(parseJsonObject(raw).value),
  },

  write(state, result) {
    state.modRecommendations = result;
  },
};

export function runModCoachAgent(state: SessionState, ctx: AgentContext): Promise<SessionState> {
  return runSubAgent(modCoachAgent, state, ctx);
}
