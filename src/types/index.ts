// ==============================================
// LearnPath Client Types
// ==============================================

export type {
  Prerequisite,
  PrerequisiteCategory,
  Complexity,
  TaskBreakdown,
  LearningResource,
  ResourcesByConcept,
  SessionPhase,
  SessionSnapshot,
  ExportMarkdownResponse,
  UploadFileResponse,
  HealthResponse
} from '../../backend/src/types/index.js';

import type { ResourcesByConcept, SessionPhase, TaskBreakdown } from '../../backend/src/types/index.js';

// App state types
export type AppPhase = SessionPhase;

export interface AgentOutputs {
  plan: string;
  code: string;
  tutor: string;
}

export interface AppState {
  sessionId: string;
  phase: AppPhase;
  taskDescription: string;
  taskBreakdown: TaskBreakdown | null;
  knownPrerequisiteIndices: number[];
  resources: ResourcesByConcept;
  agentOutputs: AgentOutputs;
  isLoading: boolean;
  error: string | null;
}
