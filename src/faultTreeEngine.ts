import { Engine, type RuleProperties } from 'json-rules-engine';
import type { Knowledge, FaultRule } from './reasoner/knowledge.js';

export interface FaultMatch {
  cause: string;
  confidence: number;
  symptom: string;
  steps: string[];
}

/** Runs the fault rules against the classified symptoms; strongest causes first. */
export async function runFaultTree(symptomIds: string[], kb: Knowledge): Promise<FaultMatch[]> {
  const engine = new Engine();
  const byId = new Map<string, FaultRule>();

  kb.faultRules.forEach((rule) => {
    byId.set(rule.id, rule);
    const props: RuleProperties = {
      name: rule.id,
      conditions: {
        all: [{ fact: 'symptoms', operator: 'contains', value: rule.symptom }],
      },
      event: { type: rule.id },
    };
    engine.addRule(props);
  });

  const results = await engine.run({ symptoms: symptomIds });

  return results.events
    .flatMap((ev): FaultMatch[] => {
      const rule = byId.get(ev.type);
      return rule ? [{ cause: rule.cause, confidence: rule.confidence, symptom: rule.symptom, steps: rule.steps }] : [];
    })
    .sort((a, b) => b.confidence - a.confidence || a.cause.localeCompare(b.cause));
}
