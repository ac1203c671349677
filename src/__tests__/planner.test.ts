import { describe, it, expect, vi } from 'vitest';
import { buildPlannerPrompt, parsePlannerDecision, runAgenticPlanner } from '../agents/planner.js';
import { APOLOGY_MESSAGE, CLOSING_MESSAGE, MAX_ITERATIONS_MESSAGE } from '../agents/messages.js';
import { createMemoryStore, NO_MEMORY_CONTEXT } from '../memoryStore.js';
import { ScriptedCompletion, createTestContext, json, newState, plan } from './helpers.js';

describe('parsePlannerDecision', () => {
  it('normalizes case and whitespace of a known action', () => {
    expect(parsePlannerDecision('{"action":" Diagnostic ","reasoning":"symptoms","confidence":0.8}')).toEqual({
      kind: 'action',
      action: 'diagnostic',
      reasoning: 'symptoms',
      confidence: 0.8,
    });
  });

  it('accepts fenced output', () => {
    const decision = parsePlannerDecision('```json\n{"action":"end","reasoning":"done"}\n```');
    expect(decision).toEqual({ kind: 'action', action: 'end', reasoning: 'done', confidence: null });
  });

  it('maps an unknown action to unrecognized', () => {
    expect(parsePlannerDecision('{"action":"teleport"}')).toEqual({
      kind: 'unrecognized',
      reasoning: 'Error parsing response: Invalid action: teleport',
    });
  });

  it('maps unparsable text to unrecognized', () => {
    expect(parsePlannerDecision('I think we should run diagnostics')).toEqual({
      kind: 'unrecognized',
      reasoning: 'Error parsing response: planner output was not a JSON object',
    });
  });
});

describe('buildPlannerPrompt', () => {
  it('renders empty slots as None and fallbacks with their text', () => {
    const state = newState('hello');
    state.diagnosis = { status: 'fallback', message: 'describe symptoms' };
    const prompt = buildPlannerPrompt(state, NO_MEMORY_CONTEXT);
    expect(prompt).toContain('Info answer: None\n');
    expect(prompt).toContain('Diagnosis: None (agent fell back: "describe symptoms")');
    expect(prompt).toContain('Previous actions:\nNone');
    expect(prompt).toContain(NO_MEMORY_CONTEXT);
  });
});

describe('runAgenticPlanner', () => {
  it('ends on the iteration that returns an unknown action', async () => {
    const completion = new ScriptedCompletion({ planner: plan('teleport') });
    const state = newState('What is a turbocharger?');

    await runAgenticPlanner(state, createTestContext(completion));

    expect(completion.kinds()).toEqual(['planner']);
    expect(state.agentTrace).toEqual(['Planner[1] → end: Error parsing response: Invalid action: teleport']);
    expect(state.finalMessage).toBe(CLOSING_MESSAGE);
    expect(state.flags.planner_parse_error).toBe(true);
  });

  it('keeps a final message a sub-agent already set when ending', async () => {
    const completion = new ScriptedCompletion({
      planner: [plan('info'), plan('end', 'answered')],
      info: json({ answer: 'A turbo is an exhaust-driven compressor.', tool_call: null }),
    });
    const state = newState('What is a turbocharger?');

    await runAgenticPlanner(state, createTestContext(completion));

    expect(state.finalMessage).toBe('Answer ready.');
    expect(state.agentTrace).toEqual(['Planner[1] → info: chose info', 'info', 'Planner[2] → end: answered']);
  });

  it('stops at the iteration cap with the cap message', async () => {
    const completion = new ScriptedCompletion({
      planner: plan('info'),
      info: json({ answer: 'Still here.', tool_call: null }),
    });
    const state = newState('loop forever');

    await runAgenticPlanner(state, createTestContext(completion, { settings: { plannerMaxIterations: 3 } }));

    expect(completion.kinds()).toEqual(['planner', 'info', 'planner', 'info', 'planner', 'info']);
    expect(state.finalMessage).toBe(MAX_ITERATIONS_MESSAGE);
    expect(state.flags.max_iterations).toBe(true);
    expect(state.agentTrace.at(-1)).toBe('Planner[3] → end: Reached maximum iterations');
    expect(state.agentTrace).toHaveLength(7);
  });

  it('converts a completion failure into the apology path', async () => {
    const completion = new ScriptedCompletion({ planner: new Error('quota exceeded') });
    const state = newState('hello');

    await runAgenticPlanner(state, createTestContext(completion));

    expect(state.failure).toBe('quota exceeded');
    expect(state.finalMessage).toBe(APOLOGY_MESSAGE);
    expect(state.agentTrace).toEqual(['Planner[1] → error: quota exceeded']);
  });

  it('uses the empty memory context when memory retrieval fails', async () => {
    const base = createMemoryStore({ redis: null, maxRecords: 10, retentionDays: 7 });
    const memory = { ...base, recent: () => Promise.reject(new Error('redis down')) };
    const completion = new ScriptedCompletion({ planner: plan('end') });
    const state = newState('hello');

    await runAgenticPlanner(state, createTestContext(completion, { memory }));

    expect(state.finalMessage).toBe(CLOSING_MESSAGE);
    expect(completion.calls[0]?.prompt).toContain(NO_MEMORY_CONTEXT);
  });

  it('reads memory once per invocation and includes it in every prompt', async () => {
    const memory = createMemoryStore({ redis: null, maxRecords: 10, retentionDays: 7 });
    await memory.store({
      userId: 'user-1',
      sessionId: 'earlier',
      query: 'best first mod?',
      agentTrace: ['info'],
      finalOutput: { type: 'info' },
      carProfileSnapshot: {},
    });
    const recent = vi.spyOn(memory, 'recent');
    const completion = new ScriptedCompletion({
      planner: [plan('info'), plan('end')],
      info: json({ answer: 'An intake.', tool_call: null }),
    });

    await runAgenticPlanner(newState('and after that?'), createTestContext(completion, { memory }));

    expect(recent).toHaveBeenCalledTimes(1);
    expect(recent).toHaveBeenCalledWith('user-1', 3);
    const plannerPrompts = completion.calls.filter(c => c.kind === 'planner');
    expect(plannerPrompts).toHaveLength(2);
    for (const call of plannerPrompts) {
      expect(call.prompt).toContain('1. Query: best first mod?');
    }
  });

  it('asks the planner at temperature 0 in JSON mode', async () => {
    const completion = new ScriptedCompletion({ planner: plan('end') });
    await runAgenticPlanner(newState('hi'), createTestContext(completion));
    expect(completion.calls[0]?.options).toEqual({ temperature: 0, maxTokens: 512, json: true });
  });
});
