import type { ProfileUpdate, ProfileUpdates, SessionState } from '../types.js';
import type { AgentContext, SubAgentDefinition } from './type.js';
import { isJsonObject, parseJsonObject, readNumber, readOptionalString, readString, type JsonObject } from '../responseParser.js';
import { formatProfile, runSubAgent } from './pipeline.js';
import { getErrorMessage } from '../utils/error-utils.js';

export const PROFILE_FALLBACK = "I'll keep that information in mind for future recommendations.";

function readUpdates(obj: JsonObject): ProfileUpdates {
  const raw = obj.updates;
  if (!isJsonObject(raw)) return {};
  const updates: ProfileUpdates = {};
  const make = readOptionalString(raw, 'make');
  const model = readOptionalString(raw, 'model');
  const year = readNumber(raw, 'year');
  const resale = readOptionalString(raw, 'resale_pref');
  if (make) updates.make = make;
  if (model) updates.model = model;
  if (year !== null) updates.year = Math.trunc(year);
  if (resale) updates.resale_pref = resale;
  return updates;
}

export const profileUpdaterAgent: SubAgentDefinition<ProfileUpdate> = {
  name: 'profile_updater',
  temperature: 0.1,
  maxTokens: 800,
  completionNotice: 'Profile reviewed.',
  fallbackMessage: () => PROFILE_FALLBACK,

  buildPrompt: (state) => `You are the "profile_updater" agent. Decide whether the user's message contains car
details that should be stored in their profile (make, model, year, resale preference).

Current profile:
${formatProfile(state)}

User query: ${state.query}

Only include fields you actually found. Be conversational in "response".
Return ONLY JSON:
{"should_update": boolean, "updates": {"make": string|null, "model": string|null, "year": number|null, "resale_pref": string|null},
 "response": string}`,

  parseInitial(raw) {
    const parsed = parseJsonObject(raw);
    const updates = readUpdates(parsed.value);
    const response = readString(parsed.value, 'response').trim();
    const updated = parsed.value.should_update === true && Object.keys(updates).length > 0;
    return {
      payload: parsed.ok && (updated || response) ? { updated, updates, response } : null,
      toolCall: null,
      flags: {},
      parseError: !parsed.ok,
    };
  },

  async persist(state, payload, ctx) {
    if (!payload.updated) {
      state.flags.profile_updated = false;
      return payload;
    }
    try {
      state.carProfile = await ctx.profiles.updateProfile(state.userId, payload.updates);
      state.flags.profile_updated = true;
      return payload;
    } catch (err) {
      console.error(`[Agent:profile_updater] could not store profile for ${state.userId}:`, getErrorMessage(err));
      state.flags.profile_updated = false;
      return { ...payload, updated: false };
    }
  },

  write(state, result) {
    state.profileUpdate = result;
    if (result.status === 'fallback') state.flags.profile_updated = false;
  },
};

export function runProfileUpdaterAgent(state: SessionState, ctx: AgentContext): Promise<SessionState> {
  return runSubAgent(profileUpdaterAgent, state, ctx);
}
