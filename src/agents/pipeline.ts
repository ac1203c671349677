import type { AgentResult, SessionState } from '../types.js';
import type { AgentContext, SubAgentDefinition } from './type.js';
import { toolInput } from '../toolFixtures.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { APOLOGY_MESSAGE } from './messages.js';

// -- prompt context shared by the agents -------------------------------

export function formatProfile(state: SessionState): string {
  return JSON.stringify(state.carProfile, null, 2);
}

export function formatAgentTrace(state: SessionState): string {
  return state.agentTrace.length ? state.agentTrace.map((t, i) => `${i + 1}. ${t}`).join('\n') : 'None';
}

export function formatToolTrace(state: SessionState): string {
  if (!state.toolTrace.length) return 'None';
  return state.toolTrace.map((t) => `- ${t.agent} used ${t.tool}`).join('\n');
}

function toolsUsedBy(state: SessionState, agent: string): string[] {
  return state.toolTrace.filter((t) => t.agent === agent).map((t) => t.tool);
}

// -- pipeline ------------------------------------------------------------

/**
 * Runs one capability end to end: initial completion, optional tool call plus
 * refinement pass, slot write. Never rejects; a failed run writes the agent's
 * fallback text into its slot, and a failed completion also leaves an error
 * line in the trace.
 */
export async function runSubAgent<T>(def: SubAgentDefinition<T>, state: SessionState, ctx: AgentContext): Promise<SessionState> {
  const tag = `[Agent:${def.name}]`;
  state.agentTrace.push(def.name);

  let result: AgentResult<T>;
  let failed = false;
  try {
    const raw = await ctx.completion.complete(def.buildPrompt(state), {
      temperature: def.temperature,
      maxTokens: def.maxTokens,
      json: true,
    });
    const initial = def.parseInitial(raw);
    if (initial.parseError) {
      console.warn(`${tag} could not parse initial output (${raw.length} chars)`);
      state.flags.parse_error = true;
    }
    Object.assign(state.flags, initial.flags);

    let payload = initial.payload;
    const tool = initial.toolCall;
    if (tool && def.refine) {
      if (toolsUsedBy(state, def.name).includes(tool)) {
        console.log(`${tag} skipping ${tool}: already used this turn`);
        state.flags.tool_reuse_skipped = true;
      } else {
        payload = await callToolAndRefine(def, state, ctx, tool, payload);
      }
    }

    if (payload !== null && def.persist) payload = await def.persist(state, payload, ctx);
    result = payload !== null ? { status: 'ok', value: payload } : fallback(def, state);
  } catch (err) {
    const message = getErrorMessage(err);
    console.error(`${tag} failed:`, message);
    state.agentTrace.push(`${def.name} → error: ${message}`);
    failed = true;
    result = fallback(def, state);
  }

  def.write(state, result);
  if (result.status === 'fallback') state.flags[`${def.name}_fallback`] = true;
  if (state.finalMessage === null) state.finalMessage = failed ? APOLOGY_MESSAGE : def.completionNotice;
  console.log(`${tag} done: ${result.status}`);
  return state;
}

async function callToolAndRefine<T>(
  def: SubAgentDefinition<T>,
  state: SessionState,
  ctx: AgentContext,
  tool: string,
  payload: T | null
): Promise<T | null> {
  const refine = def.refine;
  if (!refine) return payload;

  const context = { agent: def.name, query: state.query, carProfile: state.carProfile, mods: def.toolMods?.(payload) };
  const output = await ctx.tools(tool, context);
  state.toolTrace.push({ agent: def.name, tool, input: toolInput(tool, context), output });

  let refined: T | null = null;
  try {
    const raw = await ctx.completion.complete(refine.buildPrompt(state, payload, tool, output), {
      temperature: def.temperature,
      maxTokens: def.maxTokens,
      json: refine.json,
    });
    refined = refine.parse(raw);
    if (refined === null) state.flags.parse_error = true;
  } catch (err) {
    console.warn(`[Agent:${def.name}] refinement failed, keeping initial result:`, getErrorMessage(err));
  }
  state.agentTrace.push(`${def.name}_tool_refiner`);
  return refined ?? payload;
}

function fallback<T>(def: SubAgentDefinition<T>, state: SessionState): AgentResult<T> {
  return { status: 'fallback', message: def.fallbackMessage(state) };
}

export function readToolCall(obj: Record<string, unknown>): string | null {
  const v = obj.tool_call;
  if (typeof v !== 'string') return null;
  const t = v.trim();
  return t && !/^(null|none)$/i.test(t) ? t : null;
}
