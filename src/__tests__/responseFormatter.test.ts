import { describe, it, expect } from 'vitest';
import {
  agentsRun,
  determinePrimaryType,
  errorResponse,
  formatAgentResponse,
  formatBuildPlanText,
  formatModRecommendationsText,
} from '../responseFormatter.js';
import { APOLOGY_MESSAGE } from '../agents/messages.js';
import { DIAGNOSTIC_FALLBACK } from '../agents/diagnostic.js';
import { PROFILE_FALLBACK } from '../agents/profileUpdater.js';
import { newState } from './helpers.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('agentsRun', () => {
  it('counts agent entries and tool refiner entries but not planner lines', () => {
    const ran = agentsRun([
      'Planner[1] → diagnostic: symptoms mentioned',
      'modcoach_tool_refiner',
      'info',
      'Planner[2] → buildplanner: wants a plan',
    ]);
    expect([...ran].sort()).toEqual(['info', 'modcoach']);
  });
});

describe('determinePrimaryType', () => {
  it('uses buildplanner > diagnostic > modcoach > info', () => {
    const state = newState('q');
    state.agentTrace.push('info', 'modcoach', 'diagnostic');
    expect(determinePrimaryType(state)).toBe('diagnostic');
    state.agentTrace.push('buildplanner');
    expect(determinePrimaryType(state)).toBe('buildplanner');
  });

  it('reports profile_update only when no other capability ran', () => {
    const state = newState('q');
    state.agentTrace.push('profile_updater');
    expect(determinePrimaryType(state)).toBe('profile_update');
    state.agentTrace.push('info');
    expect(determinePrimaryType(state)).toBe('info');
  });

  it('reports error only for a failure with nothing run', () => {
    const state = newState('q');
    state.failure = 'boom';
    expect(determinePrimaryType(state)).toBe('error');
    state.agentTrace.push('info');
    expect(determinePrimaryType(state)).toBe('info');
  });

  it('defaults to info', () => {
    expect(determinePrimaryType(newState('q'))).toBe('info');
  });
});

describe('text rendering', () => {
  it('renders mod recommendations', () => {
    const text = formatModRecommendationsText([
      { name: 'Cold Air Intake', type: 'intake', justification: 'More airflow', confidence: 'high' },
      { name: 'Coilovers', type: 'suspension', justification: '', confidence: null },
    ]);
    expect(text).toBe(
      'Based on your car and goals, here are my recommendations:\n\n' +
        '1. **Cold Air Intake** (intake)\n   • More airflow\n   • Confidence: high\n\n' +
        '2. **Coilovers** (suspension)\n   • No details available\n   • Confidence: medium'
    );
  });

  it('renders a build plan', () => {
    const text = formatBuildPlanText([
      { stage: 1, mods: ['Intake', 'Exhaust'], timeline: '1-2 months' },
      { stage: 2, mods: ['Tune'], timeline: null },
    ]);
    expect(text).toBe(
      "Here's your comprehensive build plan:\n\n" +
        '**Stage 1** (Timeline: 1-2 months)\n   • Intake\n   • Exhaust\n\n' +
        '**Stage 2** (Timeline: TBD)\n   • Tune'
    );
  });

  it('handles empty lists', () => {
    expect(formatModRecommendationsText([])).toBe('No specific recommendations available at this time.');
    expect(formatBuildPlanText([])).toBe('No build plan available at this time.');
  });
});

describe('formatAgentResponse', () => {
  it('builds the full record for a build plan', () => {
    const state = newState('Plan my WRX build');
    state.agentTrace.push('Planner[1] → buildplanner: plan', 'buildplanner');
    state.buildPlan = { status: 'ok', value: [{ stage: 1, mods: ['Intake'], timeline: null }] };
    state.finalMessage = 'Build plan ready.';
    state.flags.parse_error = false;

    const result = formatAgentResponse(state, NOW);

    expect(result).toEqual({
      type: 'buildplanner',
      message: "Here's your personalized build plan for your car!",
      response: "Here's your comprehensive build plan:\n\n**Stage 1** (Timeline: TBD)\n   • Intake",
      response_type: 'build_planning',
      data: { build_plan: [{ stage: 1, mods: ['Intake'], timeline: null }], total_stages: 1 },
      final_message: 'Build plan ready.',
      query: 'Plan my WRX build',
      user_id: 'user-1',
      session_id: 'session-1',
      timestamp: '2026-03-01T12:00:00.000Z',
      agent_trace: ['Planner[1] → buildplanner: plan', 'buildplanner'],
      tool_trace: [],
      car_profile: state.carProfile,
      flags: { parse_error: false },
    });
  });

  it('uses the fallback text of the primary agent', () => {
    const state = newState('my car is weird');
    state.agentTrace.push('diagnostic');
    state.diagnosis = { status: 'fallback', message: DIAGNOSTIC_FALLBACK };

    const result = formatAgentResponse(state, NOW);

    expect(result.type).toBe('diagnostic');
    expect(result.message).toBe(DIAGNOSTIC_FALLBACK);
    expect(result.response).toBe(DIAGNOSTIC_FALLBACK);
  });

  it('uses the profile updater reply when it was the only capability', () => {
    const state = newState('I drive a Miata');
    state.agentTrace.push('profile_updater');
    state.profileUpdate = { status: 'ok', value: { updated: true, updates: { make: 'Mazda' }, response: '' } };

    const result = formatAgentResponse(state, NOW);

    expect(result.type).toBe('profile_update');
    expect(result.response).toBe(PROFILE_FALLBACK);
    expect(result.data).toEqual({ updated: true, updates: { make: 'Mazda' } });
  });

  it('copies traces so later mutation does not leak into the record', () => {
    const state = newState('q');
    state.agentTrace.push('info');
    const result = formatAgentResponse(state, NOW);
    state.agentTrace.push('modcoach');
    expect(result.agent_trace).toEqual(['info']);
  });
});

describe('errorResponse', () => {
  it('builds a minimal apology record', () => {
    const result = errorResponse({ query: 'q', userId: 'u', sessionId: 's', agentTrace: ['info'] }, NOW);
    expect(result).toEqual({
      type: 'error',
      message: APOLOGY_MESSAGE,
      response: APOLOGY_MESSAGE,
      response_type: 'error',
      data: {},
      final_message: APOLOGY_MESSAGE,
      query: 'q',
      user_id: 'u',
      session_id: 's',
      timestamp: '2026-03-01T12:00:00.000Z',
      agent_trace: ['info'],
      tool_trace: [],
      car_profile: null,
      flags: {},
    });
  });
});
