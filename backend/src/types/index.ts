// ==============================================
// LearnPath Backend Types
// ==============================================

// Prerequisite types
export type PrerequisiteCategory = 'concept' | 'technology' | 'skill' | 'tool';

export type Complexity = 'beginner' | 'intermediate' | 'advanced';

export interface Prerequisite {
  name: string;
  category: PrerequisiteCategory;
  description: string;
  priority: number; // 0 = learn first, 1 = learn early, 2 = can learn later
}

export interface TaskBreakdown {
  task_description: string;
  prerequisites: Prerequisite[];
  suggested_learning_order: string[];
  estimated_complexity: Complexity;
}

// Resource types
export interface LearningResource {
  title: string;
  url: string;
  description: string;
  source: string;
}

// concept name -> resources in search-rank order
export type ResourcesByConcept = Record<string, LearningResource[]>;

// ==============================================
// Session Types
// ==============================================

export type SessionPhase = 'input' | 'analysis' | 'resources';

export interface SessionSnapshot {
  session_id: string;
  phase: SessionPhase;
  task_description: string;
  known_prerequisite_indices: number[];
  has_breakdown: boolean;
  resource_count: number;
  created_at: string;
  updated_at: string;
}

// ==============================================
// API Types
// ==============================================

export interface AnalyzeTaskRequest {
  task_description: string;
  session_id?: string;
}

export interface FindResourcesRequest {
  known_prerequisite_indices: number[];
  session_id?: string;
}

export interface FindResourcesResponse {
  resources: ResourcesByConcept;
}

export interface SessionRequest {
  session_id?: string;
}

export interface GetCodeExampleRequest {
  concept: string;
  session_id?: string;
}

export interface AskTutorRequest {
  query: string;
  session_id?: string;
}

export interface GeneratePlanResponse {
  plan: string;
}

export interface CodeExampleResponse {
  code: string;
}

export interface TutorResponse {
  response: string;
}

export interface ExportMarkdownResponse {
  markdown: string;
  filename: string;
}

export interface UploadFileResponse {
  content: string;
  filename: string;
}

export interface HealthResponse {
  status: string;
  service: string;
}

export interface ErrorResponse {
  detail: string;
}
