import type { ChatResponse, SessionState } from './types.js';
import type { AgentContext } from './agents/type.js';
import { runAgenticPlanner } from './agents/planner.js';
import { MAX_ITERATIONS_MESSAGE } from './agents/messages.js';
import { errorResponse, formatAgentResponse } from './responseFormatter.js';
import { getErrorMessage } from './utils/error-utils.js';

export type Planner = (state: SessionState, ctx: AgentContext) => Promise<SessionState>;

/**
 * Drives the planner until the turn has a final message, then formats it.
 * Nothing thrown below this point reaches the caller.
 */
export async function runAgentSystem(
  state: SessionState,
  ctx: AgentContext,
  planner: Planner = runAgenticPlanner
): Promise<ChatResponse> {
  try {
    const maxIterations = ctx.settings.loopMaxIterations;
    let iteration = 0;
    while (state.finalMessage === null && iteration < maxIterations) {
      iteration++;
      console.log(`[AgentLoop] ${state.userId}/${state.sessionId} pass ${iteration}`);
      await planner(state, ctx);
    }

    if (state.finalMessage === null) {
      console.warn(`[AgentLoop] no final message after ${maxIterations} passes, ending turn`);
      state.finalMessage = MAX_ITERATIONS_MESSAGE;
      state.flags.max_iterations = true;
      state.agentTrace.push(`AgentLoop[${iteration}] → end: Reached maximum iterations`);
    }
    return formatAgentResponse(state);
  } catch (err) {
    const message = getErrorMessage(err);
    console.error(`[AgentLoop] turn failed for ${state.userId}:`, message);
    state.failure = message;
    return errorResponse(state);
  }
}
