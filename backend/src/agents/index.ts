// AI Agent Layer Exports
export { type LlmClient, OpenAiLlmClient, createOpenAiLlmClient } from './llm.js';
export { TaskAnalyzer, parseTaskBreakdown, extractJsonObject } from './taskAnalyzer.js';
export { ProjectPlanner } from './projectPlanner.js';
export { CodeCompanion } from './codeCompanion.js';
export { TutorAgent, detectTutorMode, type TutorMode } from './tutorAgent.js';
export { LearningOrchestrator, createOrchestrator, type OrchestratorDeps, type OrchestratorOptions } from './orchestrator.js';
