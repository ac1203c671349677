import type { AgentName, CarProfile, ToolOutput } from './types.js';
import { loadKnowledge, classifySymptoms } from './reasoner/knowledge.js';
import { runFaultTree } from './faultTreeEngine.js';

export interface ToolContext {
  agent: AgentName;
  query: string;
  carProfile: CarProfile;
  /** Mod names the calling agent is currently proposing. */
  mods?: string[];
}

export type ToolInvoker = (name: string, context: ToolContext) => Promise<ToolOutput>;

type DynamicTool = (context: ToolContext) => Promise<ToolOutput | null>;

/** The tools each agent may call; anything else is unknown to that agent. */
export const AGENT_TOOLS: Record<AgentName, readonly string[]> = {
  info: ['lookup_glossary_term', 'tech_spec_lookup', 'explain_tuning_concept', 'fetch_forum_threads'],
  diagnostic: ['lookup_official_dtc', 'symptom_fault_matcher', 'get_known_issues'],
  modcoach: ['check_compatibility', 'estimate_power_gains', 'price_analysis'],
  buildplanner: ['suggest_install_order', 'estimate_mod_cost', 'check_compatibility'],
  profile_updater: [],
};

function describeCar(p: CarProfile): string {
  const name = [p.make, p.model].filter(Boolean).join(' ');
  return name ? `your ${name}` : 'your car';
}

const dynamicTools: Record<string, DynamicTool> = {
  async symptom_fault_matcher({ query }) {
    const kb = loadKnowledge();
    const symptoms = classifySymptoms(query, kb);
    const matches = await runFaultTree(symptoms, kb);
    return {
      matched_symptoms: symptoms,
      likely_causes: matches.map(m => ({ cause: m.cause, confidence: m.confidence })),
      diagnostic_steps: Array.from(new Set(matches.flatMap(m => m.steps))),
    };
  },

  // modcoach checks its own proposals; other callers get the platform fixture
  async check_compatibility({ agent, mods, carProfile }) {
    if (agent !== 'modcoach' || !mods) return null;
    return {
      compatible_mods: mods.filter(m => /intake|exhaust/i.test(m)),
      incompatible_mods: [],
      fitment_notes: `All suggested mods are compatible with ${describeCar(carProfile)}`,
      installation_difficulty: 'Easy to Moderate',
    };
  },
};

function toolError(message: string, agent: AgentName): ToolOutput {
  return {
    tool_error: message,
    fallback_data: `Using general automotive knowledge for the ${agent} agent`,
  };
}

/** Deterministic stand-ins for the external lookup services. Never rejects. */
export const invokeTool: ToolInvoker = async (name, context) => {
  if (!AGENT_TOOLS[context.agent].includes(name)) return toolError(`Unknown tool: ${name}`, context.agent);
  try {
    if (Object.hasOwn(dynamicTools, name)) {
      const out = await dynamicTools[name](context);
      if (out) return out;
    }
    const { fixtures } = loadKnowledge();
    if (!Object.hasOwn(fixtures, name)) return toolError(`No fixture for tool: ${name}`, context.agent);
    return structuredClone(fixtures[name]);
  } catch (err) {
    console.error(`[Tools] ${name} failed:`, err);
    return toolError(`Tool failed: ${name}`, context.agent);
  }
};

export function toolInput(name: string, context: ToolContext): Record<string, unknown> {
  return { tool: name, query: context.query, ...(context.mods ? { mods: context.mods } : {}) };
}
