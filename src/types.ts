import type { CarProfile } from './schemas/carProfile.js';

export type { CarProfile, ModRecord, SymptomRecord, BuildGoal } from './schemas/carProfile.js';

export const AGENT_NAMES = ['info', 'diagnostic', 'modcoach', 'buildplanner', 'profile_updater'] as const;
export type AgentName = typeof AGENT_NAMES[number];

export const PLANNER_ACTIONS = [...AGENT_NAMES, 'end'] as const;
export type PlannerAction = typeof PLANNER_ACTIONS[number];

export type ToolOutput = Record<string, unknown>;

export interface ToolTraceEntry {
  agent: AgentName;
  tool: string;
  input: Record<string, unknown>;
  output: ToolOutput;
}

/** A written result slot: the agent's real payload, or its canned fallback text. */
export type AgentResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'fallback'; message: string };

export interface Diagnosis {
  symptomSummary: string;
  followupRecommendations: string[];
}

export interface ModRecommendation {
  name: string;
  type: string;
  justification: string;
  confidence: string | null;
}

export interface BuildStage {
  stage: number;
  mods: string[];
  timeline: string | null;
}

export interface ProfileUpdates {
  make?: string;
  model?: string;
  year?: number;
  resale_pref?: string;
}

export interface ProfileUpdate {
  updated: boolean;
  updates: ProfileUpdates;
  response: string;
}

export interface SessionState {
  readonly query: string;
  readonly userId: string;
  readonly sessionId: string;
  carProfile: CarProfile;

  agentTrace: string[];
  toolTrace: ToolTraceEntry[];
  flags: Record<string, boolean>;

  // result slots, one owner each
  infoAnswer: AgentResult<string> | null;
  diagnosis: AgentResult<Diagnosis> | null;
  modRecommendations: AgentResult<ModRecommendation[]> | null;
  buildPlan: AgentResult<BuildStage[]> | null;
  profileUpdate: AgentResult<ProfileUpdate> | null;

  finalMessage: string | null;
  failure: string | null;
}

export type ResponseType = 'info' | 'diagnostic' | 'modcoach' | 'buildplanner' | 'profile_update' | 'error';

export type ChatResponse = {
  type: ResponseType;
  message: string;
  response: string;
  response_type: string;
  data: Record<string, unknown>;
  final_message: string | null;
  query: string;
  user_id: string;
  session_id: string;
  timestamp: string;
  agent_trace: string[];
  tool_trace: ToolTraceEntry[];
  car_profile: CarProfile | null;
  flags: Record<string, boolean>;
};

export interface ConversationMemory {
  id: string;
  userId: string;
  sessionId: string;
  query: string;
  agentTrace: string[];
  finalOutput: Record<string, unknown>;
  carProfileSnapshot: Record<string, unknown>;
  createdAt: string;
}

export function createSessionState(init: {
  query: string;
  userId: string;
  sessionId?: string;
  carProfile: CarProfile;
}): SessionState {
  return {
    query: init.query,
    userId: init.userId,
    sessionId: init.sessionId ?? 'default',
    carProfile: init.carProfile,
    agentTrace: [],
    toolTrace: [],
    flags: {},
    infoAnswer: null,
    diagnosis: null,
    modRecommendations: null,
    buildPlan: null,
    profileUpdate: null,
    finalMessage: null,
    failure: null,
  };
}
