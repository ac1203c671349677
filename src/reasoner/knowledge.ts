import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const symptomSchema = z.object({ id: z.string(), aliases: z.array(z.string()) });
const faultRuleSchema = z.object({
  id: z.string(),
  symptom: z.string(),
  cause: z.string(),
  confidence: z.number(),
  steps: z.array(z.string()),
});
const fixturesSchema = z.record(z.record(z.unknown()));

export type Symptom = z.infer<typeof symptomSchema>;
export type FaultRule = z.infer<typeof faultRuleSchema>;
export type Knowledge = {
  symptoms: Symptom[];
  faultRules: FaultRule[];
  fixtures: Record<string, Record<string, unknown>>;
};

function loadJSON<T>(rel: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const p = path.join(process.cwd(), rel);
  return schema.parse(JSON.parse(fs.readFileSync(p, 'utf8')));
}

let cached: Knowledge | null = null;

export function loadKnowledge(): Knowledge {
  if (cached) return cached;
  cached = {
    symptoms: loadJSON('knowledge-base/symptoms.json', z.array(symptomSchema)),
    faultRules: loadJSON('knowledge-base/fault-rules.json', z.object({ rules: z.array(faultRuleSchema) })).rules,
    fixtures: loadJSON('knowledge-base/tool-fixtures.json', fixturesSchema),
  };
  return cached;
}

export function classifySymptoms(freeText: string, kb: Knowledge): string[] {
  const t = (freeText || '').toLowerCase();
  const hits: string[] = [];
  for (const s of kb.symptoms) {
    if (s.aliases.some(a => t.includes(a.toLowerCase()))) hits.push(s.id);
  }
  return Array.from(new Set(hits));
}
