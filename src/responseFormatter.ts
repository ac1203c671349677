import type { AgentName, BuildStage, ChatResponse, ModRecommendation, ResponseType, SessionState } from './types.js';
import { fallbackInfoResponse } from './agents/info.js';
import { DIAGNOSTIC_FALLBACK } from './agents/diagnostic.js';
import { MODCOACH_FALLBACK } from './agents/modCoach.js';
import { BUILDPLANNER_FALLBACK } from './agents/buildPlanner.js';
import { PROFILE_FALLBACK } from './agents/profileUpdater.js';
import { APOLOGY_MESSAGE, MAX_ITERATIONS_MESSAGE } from './agents/messages.js';
import { getErrorMessage } from './utils/error-utils.js';

// highest first; profile_updater only wins when nothing else ran
const TYPE_PRIORITY = ['buildplanner', 'diagnostic', 'modcoach', 'info'] as const;

type TypedBody = Pick<ChatResponse, 'message' | 'response' | 'response_type' | 'data'>;

/** Capabilities that actually ran this turn. Planner decision lines never count. */
export function agentsRun(agentTrace: readonly string[]): Set<AgentName> {
  const names: AgentName[] = [...TYPE_PRIORITY, 'profile_updater'];
  const ran = new Set<AgentName>();
  for (const entry of agentTrace) {
    const hit = names.find(n => entry === n || entry === `${n}_tool_refiner`);
    if (hit) ran.add(hit);
  }
  return ran;
}

export function determinePrimaryType(state: SessionState): ResponseType {
  const ran = agentsRun(state.agentTrace);
  if (state.failure !== null && ran.size === 0) return 'error';
  const primary = TYPE_PRIORITY.find(n => ran.has(n));
  if (primary) return primary;
  return ran.has('profile_updater') ? 'profile_update' : 'info';
}

export function formatModRecommendationsText(mods: readonly ModRecommendation[]): string {
  if (!mods.length) return 'No specific recommendations available at this time.';
  let text = 'Based on your car and goals, here are my recommendations:\n\n';
  mods.forEach((mod, i) => {
    text += `${i + 1}. **${mod.name}** (${mod.type})\n`;
    text += `   • ${mod.justification || 'No details available'}\n`;
    text += `   • Confidence: ${mod.confidence ?? 'medium'}\n\n`;
  });
  return text.trimEnd();
}

export function formatBuildPlanText(plan: readonly BuildStage[]): string {
  if (!plan.length) return 'No build plan available at this time.';
  let text = "Here's your comprehensive build plan:\n\n";
  for (const stage of plan) {
    text += `**Stage ${stage.stage}** (Timeline: ${stage.timeline ?? 'TBD'})\n`;
    for (const mod of stage.mods) text += `   • ${mod}\n`;
    text += '\n';
  }
  return text.trimEnd();
}

function plain(text: string, responseType: string, data: Record<string, unknown>): TypedBody {
  return { message: text, response: text, response_type: responseType, data };
}

function infoBody(state: SessionState): TypedBody {
  const slot = state.infoAnswer;
  if (slot?.status === 'ok') {
    return plain(slot.value, 'informational', { answer: slot.value, knowledge_base: 'automotive_general' });
  }
  // nothing ran: surface the cap notice rather than a generic welcome
  const text = slot?.status === 'fallback'
    ? slot.message
    : state.finalMessage === MAX_ITERATIONS_MESSAGE ? MAX_ITERATIONS_MESSAGE : fallbackInfoResponse(state.query);
  return plain(text, 'informational', { answer: text, knowledge_base: 'automotive_general' });
}

function diagnosticBody(state: SessionState): TypedBody {
  const slot = state.diagnosis;
  if (!slot || slot.status === 'fallback') {
    return plain(slot ? slot.message : DIAGNOSTIC_FALLBACK, 'diagnostic_analysis', { symptom_summary: '', followup_recommendations: [] });
  }
  return {
    message: "Here's my diagnosis of your car's issue:",
    response: slot.value.symptomSummary,
    response_type: 'diagnostic_analysis',
    data: {
      symptom_summary: slot.value.symptomSummary,
      followup_recommendations: slot.value.followupRecommendations,
    },
  };
}

function modCoachBody(state: SessionState): TypedBody {
  const slot = state.modRecommendations;
  if (!slot || slot.status === 'fallback') {
    return plain(slot ? slot.message : MODCOACH_FALLBACK, 'modification_recommendations', { mod_recommendations: [], total_recommendations: 0 });
  }
  return {
    message: 'Here are my mod recommendations for your car:',
    response: formatModRecommendationsText(slot.value),
    response_type: 'modification_recommendations',
    data: { mod_recommendations: slot.value, total_recommendations: slot.value.length },
  };
}

function buildPlannerBody(state: SessionState): TypedBody {
  const slot = state.buildPlan;
  if (!slot || slot.status === 'fallback') {
    return plain(slot ? slot.message : BUILDPLANNER_FALLBACK, 'build_planning', { build_plan: [], total_stages: 0 });
  }
  return {
    message: "Here's your personalized build plan for your car!",
    response: formatBuildPlanText(slot.value),
    response_type: 'build_planning',
    data: { build_plan: slot.value, total_stages: slot.value.length },
  };
}

function profileBody(state: SessionState): TypedBody {
  const slot = state.profileUpdate;
  if (!slot || slot.status === 'fallback') {
    return plain(slot ? slot.message : PROFILE_FALLBACK, 'profile_update', { updated: false, updates: {} });
  }
  const text = slot.value.response || PROFILE_FALLBACK;
  return plain(text, 'profile_update', { updated: slot.value.updated, updates: slot.value.updates });
}

function bodyFor(type: ResponseType, state: SessionState): TypedBody {
  switch (type) {
    case 'info': return infoBody(state);
    case 'diagnostic': return diagnosticBody(state);
    case 'modcoach': return modCoachBody(state);
    case 'buildplanner': return buildPlannerBody(state);
    case 'profile_update': return profileBody(state);
    case 'error': return plain(APOLOGY_MESSAGE, 'error', {});
  }
}

/** Minimal record for when a turn could not be formatted or did not finish. */
export function errorResponse(
  state: Pick<SessionState, 'query' | 'userId' | 'sessionId'> & Partial<Pick<SessionState, 'agentTrace' | 'toolTrace'>>,
  now: Date = new Date()
): ChatResponse {
  return {
    type: 'error',
    ...plain(APOLOGY_MESSAGE, 'error', {}),
    final_message: APOLOGY_MESSAGE,
    query: state.query,
    user_id: state.userId,
    session_id: state.sessionId,
    timestamp: now.toISOString(),
    agent_trace: [...(state.agentTrace ?? [])],
    tool_trace: [...(state.toolTrace ?? [])],
    car_profile: null,
    flags: {},
  };
}

/** Client-facing record for a finished turn. Never throws. */
export function formatAgentResponse(state: SessionState, now: Date = new Date()): ChatResponse {
  try {
    const type = determinePrimaryType(state);
    return {
      type,
      ...bodyFor(type, state),
      final_message: state.finalMessage,
      query: state.query,
      user_id: state.userId,
      session_id: state.sessionId,
      timestamp: now.toISOString(),
      agent_trace: [...state.agentTrace],
      tool_trace: [...state.toolTrace],
      car_profile: state.carProfile,
      flags: { ...state.flags },
    };
  } catch (err) {
    console.error('[Formatter] could not format response:', getErrorMessage(err));
    return errorResponse(state, now);
  }
}
