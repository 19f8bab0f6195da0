/**
 * In-memory session store
 *
 * One LearningSession per client-supplied session id. Sessions live until an
 * explicit reset or process restart. Concurrent writes to the same session
 * are not coordinated: whichever update finishes last wins, except that
 * resources are never stored against a breakdown they were not searched for.
 */

import {
  ResourcesByConcept,
  SessionPhase,
  SessionSnapshot,
  TaskBreakdown
} from '../types/index.js';
import { NO_ANALYSIS_MESSAGE, ValidationError } from '../utils/errors.js';

export const DEFAULT_SESSION_ID = 'default';

// Allowed phase moves; reset is handled by discarding the session
const TRANSITIONS: Record<SessionPhase, SessionPhase[]> = {
  input: ['analysis'],
  analysis: ['analysis', 'resources'],
  resources: ['analysis', 'resources']
};

export function canTransition(from: SessionPhase, to: SessionPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export type Clock = () => Date;

export const STALE_ANALYSIS_MESSAGE =
  'The task was analyzed again while resources were being searched. Please search again.';

export class LearningSession {
  readonly id: string;
  readonly createdAt: Date;
  private clock: Clock;
  private _phase: SessionPhase = 'input';
  private _breakdown: TaskBreakdown | null = null;
  private _knownIndices: number[] = [];
  private _resources: ResourcesByConcept = {};
  private _updatedAt: Date;

  constructor(id: string, clock: Clock = () => new Date()) {
    this.id = id;
    this.clock = clock;
    this.createdAt = clock();
    this._updatedAt = this.createdAt;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  get breakdown(): TaskBreakdown | null {
    return this._breakdown;
  }

  get knownIndices(): number[] {
    return [...this._knownIndices];
  }

  get resources(): ResourcesByConcept {
    return this._resources;
  }

  get taskDescription(): string {
    return this._breakdown?.task_description ?? '';
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  /** Returns the breakdown or rejects the request: every step after analysis needs one. */
  requireBreakdown(): TaskBreakdown {
    if (!this._breakdown) {
      throw new ValidationError(NO_ANALYSIS_MESSAGE);
    }
    return this._breakdown;
  }

  /**
   * A new breakdown supersedes the old one. Known indices pointed into the old
   * prerequisite list, so they are dropped together with its resources.
   */
  applyBreakdown(breakdown: TaskBreakdown): void {
    this.moveTo('analysis');
    this._breakdown = breakdown;
    this._knownIndices = [];
    this._resources = {};
    this.touch();
  }

  /**
   * Stores a search made against `breakdown`. A search that started before the
   * latest analysis is rejected rather than mixed into the newer breakdown.
   */
  applyResources(breakdown: TaskBreakdown, knownIndices: number[], resources: ResourcesByConcept): void {
    if (this.requireBreakdown() !== breakdown) {
      throw new ValidationError(STALE_ANALYSIS_MESSAGE);
    }
    this.moveTo('resources');
    this._knownIndices = [...knownIndices];
    this._resources = resources;
    this.touch();
  }

  snapshot(): SessionSnapshot {
    return {
      session_id: this.id,
      phase: this._phase,
      task_description: this.taskDescription,
      known_prerequisite_indices: this.knownIndices,
      has_breakdown: this._breakdown !== null,
      resource_count: Object.values(this._resources).reduce((sum, list) => sum + list.length, 0),
      created_at: this.createdAt.toISOString(),
      updated_at: this._updatedAt.toISOString()
    };
  }

  private moveTo(next: SessionPhase): void {
    if (!canTransition(this._phase, next)) {
      throw new ValidationError(`Cannot move session from '${this._phase}' to '${next}'`);
    }
    this._phase = next;
  }

  private touch(): void {
    this._updatedAt = this.clock();
  }
}

export class SessionStore {
  private sessions: Map<string, LearningSession> = new Map();

  constructor(private clock: Clock = () => new Date()) {}

  get size(): number {
    return this.sessions.size;
  }

  get(id: string): LearningSession | undefined {
    return this.sessions.get(id);
  }

  getOrCreate(id: string): LearningSession {
    let session = this.sessions.get(id);
    if (!session) {
      session = new LearningSession(id, this.clock);
      this.sessions.set(id, session);
      console.log(`[SessionStore] Created session '${id}' (${this.sessions.size} active)`);
    }
    return session;
  }

  /** Discards all session data. Resetting an unknown session is a no-op. */
  reset(id: string): boolean {
    const existed = this.sessions.delete(id);
    if (existed) {
      console.log(`[SessionStore] Reset session '${id}'`);
    }
    return existed;
  }
}
