import { z } from 'zod';

export const modRecordSchema = z.object({
  name: z.string(),
  brand: z.string().nullable().default(null),
  status: z.enum(['installed', 'planned']),
  install_date: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
  source_link: z.string().nullable().default(null),
});

export const symptomRecordSchema = z.object({
  description: z.string(),
  severity: z.enum(['low', 'medium', 'high']).nullable().default(null),
  resolved: z.boolean().default(false),
  resolution_notes: z.string().nullable().default(null),
});

export const buildGoalSchema = z.object({
  goal_type: z.string(),
  priority: z.number().int().nullable().default(null),
  notes: z.string().nullable().default(null),
});

export const carProfileSchema = z.object({
  make: z.string().default(''),
  model: z.string().default(''),
  year: z.number().int().default(2020),
  resale_pref: z.string().default(''),
  mods: z.array(modRecordSchema).default([]),
  symptoms: z.array(symptomRecordSchema).default([]),
  goals: z.array(buildGoalSchema).default([]),
});

export type ModRecord = z.infer<typeof modRecordSchema>;
export type SymptomRecord = z.infer<typeof symptomRecordSchema>;
export type BuildGoal = z.infer<typeof buildGoalSchema>;
export type CarProfile = z.infer<typeof carProfileSchema>;

export function defaultCarProfile(): CarProfile {
  return { make: '', model: '', year: 2020, resale_pref: '', mods: [], symptoms: [], goals: [] };
}
