import type { SessionState } from '../types.js';
import type { AgentContext, SubAgentDefinition } from './type.js';
import { parseJsonObject, parsePlainText, readString } from '../responseParser.js';
import { formatAgentTrace, formatProfile, formatToolTrace, readToolCall, runSubAgent } from './pipeline.js';

const GREETINGS = ['hello', 'hi', 'hey', 'good morning', 'good afternoon'];

export const INFO_NO_PERSONAL_DETAILS =
  "I don't currently have your personal information stored. Could you tell me your name and what car you drive? This will help me provide more personalized assistance.";

export const INFO_WELCOME =
  "I'm your automotive assistant! I can help with car information, modifications, diagnostics, and build planning. What would you like to know?";

/** Greeting-aware canned answer for when the info agent has nothing. */
export function fallbackInfoResponse(query: string): string {
  const q = query.toLowerCase();
  const words = new Set(q.split(/[^a-z]+/).filter(Boolean));
  if (GREETINGS.some(g => (g.includes(' ') ? q.includes(g) : words.has(g)))) {
    return "Hello! I'm your automotive assistant. I'm here to help with car questions, modifications, diagnostics, or build planning. What would you like to know about your vehicle?";
  }
  if (words.has('name') && words.has('car')) return INFO_NO_PERSONAL_DETAILS;
  return INFO_WELCOME;
}

export const infoAgent: SubAgentDefinition<string> = {
  name: 'info',
  temperature: 0.3,
  maxTokens: 1500,
  completionNotice: 'Answer ready.',
  fallbackMessage: (state) => fallbackInfoResponse(state.query),

  buildPrompt: (state) => `You are the "info" agent in a modular assistant for car enthusiasts.
Answer the user's automotive question with your own knowledge: definitions, how systems work,
general advice, or a warm welcome if they are just saying hello.
Only request a tool when you need data you do not have.

User query: ${state.query}

Car profile:
${formatProfile(state)}

Agent trace:
${formatAgentTrace(state)}

Tool trace:
${formatToolTrace(state)}

Tools (only if needed, never one already in the tool trace):
- lookup_glossary_term: technical definitions
- tech_spec_lookup: exact specifications for a model
- fetch_forum_threads: community discussions
- explain_tuning_concept: advanced tuning details

Return ONLY JSON:
{"answer": string, "tool_call": string|null}`,

  parseInitial(raw) {
    const parsed = parseJsonObject(raw);
    const answer = readString(parsed.value, 'answer').trim();
    return {
      payload: answer || null,
      toolCall: readToolCall(parsed.value),
      flags: {},
      parseError: !parsed.ok,
    };
  },

  refine: {
    json: false,
    buildPrompt: (state, initial, toolName, toolOutput) => `You are the "info" agent refining your answer with tool data.

User query: ${state.query}

Your first answer:
${initial ?? 'None'}

Output of ${toolName}:
${JSON.stringify(toolOutput, null, 2)}

Tool trace:
${formatToolTrace(state)}

Revise the answer using the tool output. Respond with the answer as plain text only: no JSON, no markdown fences.`,
    parse: (raw) => parsePlainText(raw) || null,
  },

  write(state, result) {
    state.infoAnswer = result;
  },
};

export function runInfoAgent(state: SessionState, ctx: AgentContext): Promise<SessionState> {
  return runSubAgent(infoAgent, state, ctx);
}
