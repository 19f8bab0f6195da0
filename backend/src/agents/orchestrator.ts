import { LlmClient } from './llm.js';
import { TaskAnalyzer } from './taskAnalyzer.js';
import { ProjectPlanner } from './projectPlanner.js';
import { CodeCompanion } from './codeCompanion.js';
import { TutorAgent } from './tutorAgent.js';
import { ResourceFinder, validateKnownIndices } from '../search/resourceFinder.js';
import { Clock, SessionStore, LearningSession } from '../services/sessionStore.js';
import { renderMarkdown, exportFilename } from '../services/markdownExporter.js';
import {
  ExportMarkdownResponse,
  ResourcesByConcept,
  SessionSnapshot,
  TaskBreakdown
} from '../types/index.js';
import { NO_ANALYSIS_MESSAGE, ValidationError } from '../utils/errors.js';

export interface OrchestratorDeps {
  sessions: SessionStore;
  analyzer: TaskAnalyzer;
  finder: ResourceFinder;
  planner: ProjectPlanner;
  codeCompanion: CodeCompanion;
  tutor: TutorAgent;
  now?: Clock;
}

/**
 * Learning Orchestrator
 * Sequences task -> prerequisites -> resources -> helper calls for each session.
 * Session state changes only after the step it belongs to has succeeded.
 */
export class LearningOrchestrator {
  private sessions: SessionStore;
  private analyzer: TaskAnalyzer;
  private finder: ResourceFinder;
  private planner: ProjectPlanner;
  private codeCompanion: CodeCompanion;
  private tutor: TutorAgent;
  private now: Clock;

  constructor(deps: OrchestratorDeps) {
    this.sessions = deps.sessions;
    this.analyzer = deps.analyzer;
    this.finder = deps.finder;
    this.planner = deps.planner;
    this.codeCompanion = deps.codeCompanion;
    this.tutor = deps.tutor;
    this.now = deps.now ?? (() => new Date());
  }

  async analyzeTask(sessionId: string, taskDescription: string): Promise<TaskBreakdown> {
    const breakdown = await this.analyzer.analyzeTask(taskDescription);
    this.sessions.getOrCreate(sessionId).applyBreakdown(breakdown);
    return breakdown;
  }

  /**
   * Searches resources for every prerequisite not listed in `knownIndices`.
   */
  async findResources(sessionId: string, knownIndices: unknown): Promise<ResourcesByConcept> {
    const indices = validateKnownIndices(knownIndices);
    const session = this.requireSession(sessionId);
    const breakdown = session.requireBreakdown();

    const resources = await this.finder.findResources(breakdown, indices);
    session.applyResources(breakdown, indices, resources);
    return resources;
  }

  async generatePlan(sessionId: string): Promise<string> {
    const breakdown = this.requireSession(sessionId).requireBreakdown();
    return this.planner.generatePlan(breakdown);
  }

  async getCodeExample(sessionId: string, concept: string): Promise<string> {
    const breakdown = this.requireSession(sessionId).requireBreakdown();
    return this.codeCompanion.getCodeExample(concept, breakdown.task_description);
  }

  async askTutor(sessionId: string, query: string): Promise<string> {
    const breakdown = this.requireSession(sessionId).requireBreakdown();
    return this.tutor.respond(query, breakdown.task_description);
  }

  exportMarkdown(sessionId: string): ExportMarkdownResponse {
    const session = this.requireSession(sessionId);
    const breakdown = session.requireBreakdown();
    const now = this.now();

    return {
      markdown: renderMarkdown(breakdown, session.resources, now),
      filename: exportFilename(breakdown.task_description, now)
    };
  }

  resetSession(sessionId: string): void {
    this.sessions.reset(sessionId);
  }

  /** Unknown sessions read as a fresh one in phase `input`; nothing is created. */
  getSession(sessionId: string): SessionSnapshot {
    return (this.sessions.get(sessionId) ?? new LearningSession(sessionId, this.now)).snapshot();
  }

  private requireSession(sessionId: string): LearningSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new ValidationError(NO_ANALYSIS_MESSAGE);
    }
    return session;
  }
}

export interface OrchestratorOptions {
  llm: LlmClient;
  finder: ResourceFinder;
  sessions?: SessionStore;
  now?: Clock;
}

/**
 * Wires the agents around one LLM client and search-backed finder.
 */
export function createOrchestrator(options: OrchestratorOptions): LearningOrchestrator {
  return new LearningOrchestrator({
    sessions: options.sessions ?? new SessionStore(options.now),
    analyzer: new TaskAnalyzer(options.llm),
    finder: options.finder,
    planner: new ProjectPlanner(options.llm),
    codeCompanion: new CodeCompanion(options.llm),
    tutor: new TutorAgent(options.llm),
    now: options.now
  });
}
