import type { Diagnosis, SessionState } from '../types.js';
import type { AgentContext, SubAgentDefinition } from './type.js';
import { parseJsonObject, readString, readStringList, type JsonObject } from '../responseParser.js';
import { formatAgentTrace, formatProfile, formatToolTrace, readToolCall, runSubAgent } from './pipeline.js';

export const DIAGNOSTIC_FALLBACK =
  "I'd be happy to help diagnose car issues. Could you describe the specific symptoms you're experiencing?";

function readDiagnosis(obj: JsonObject): Diagnosis | null {
  const symptomSummary = readString(obj, 'symptom_summary').trim();
  if (!symptomSummary) return null;
  return { symptomSummary, followupRecommendations: readStringList(obj, 'followup_recommendations') };
}

const RESPONSE_FORMAT = `{"symptom_summary": string, "followup_recommendations": string[]`;

export const diagnosticAgent: SubAgentDefinition<Diagnosis> = {
  name: 'diagnostic',
  temperature: 0.1,
  maxTokens: 1500,
  completionNotice: 'Diagnosis complete.',
  fallbackMessage: () => DIAGNOSTIC_FALLBACK,

  buildPrompt: (state) => `You are the "diagnostic" agent in a modular assistant that helps car enthusiasts
identify likely causes of mechanical issues.

Car profile:
${formatProfile(state)}

User symptom report:
${state.query}

Agent trace:
${formatAgentTrace(state)}

Tool trace:
${formatToolTrace(state)}

Task:
1. Analyze the issue for this car.
2. Summarize the likely cause and list follow-up checks.
3. Suggest a tool ONLY if it is not already in the tool trace:
   lookup_official_dtc, symptom_fault_matcher, get_known_issues

Return ONLY JSON:
${RESPONSE_FORMAT}, "tool_call": string|null}`,

  parseInitial(raw) {
    const parsed = parseJsonObject(raw);
    return {
      payload: readDiagnosis(parsed.value),
      toolCall: readToolCall(parsed.value),
      flags: {},
      parseError: !parsed.ok,
    };
  },

  refine: {
    json: true,
    buildPrompt: (state, initial, toolName, toolOutput) => `You are the "diagnostic" agent refining your diagnosis with tool output.

Car profile:
${formatProfile(state)}

User symptom report:
${state.query}

Your first diagnosis:
${initial ? JSON.stringify(initial, null, 2) : 'None'}

Output of ${toolName}:
${JSON.stringify(toolOutput, null, 2)}

Tool trace:
${formatToolTrace(state)}

Use the tool data to improve or confirm the summary. Return ONLY JSON:
${RESPONSE_FORMAT}}`,
    parse: (raw) => readDiagnosis(parseJsonObject(raw).value),
  },

  write(state, result) {
    state.diagnosis = result;
  },
};

export function runDiagnosticAgent(state: SessionState, ctx: AgentContext): Promise<SessionState> {
  return runSubAgent(diagnosticAgent, state, ctx);
}
