import { createStore, type StoreApi } from 'zustand/vanilla';
import type { LearnPathApi } from '../services/api.js';
import type { AppState, ExportMarkdownResponse } from '../types/index.js';

export interface WorkflowActions {
  setTaskDescription: (text: string) => void;
  analyzeTask: () => Promise<void>;
  uploadFile: (file: Blob, filename: string) => Promise<void>;
  toggleKnownPrerequisite: (index: number) => void;
  findResources: () => Promise<void>;
  generatePlan: () => Promise<void>;
  getCodeExample: (concept: string) => Promise<void>;
  askTutor: (query: string) => Promise<void>;
  exportMarkdown: () => Promise<ExportMarkdownResponse | null>;
  reset: () => Promise<void>;
  clearError: () => void;
}

export type WorkflowState = AppState & WorkflowActions;

export type WorkflowStore = StoreApi<WorkflowState>;

export function initialAppState(sessionId: string): AppState {
  return {
    sessionId,
    phase: 'input',
    taskDescription: '',
    taskBreakdown: null,
    knownPrerequisiteIndices: [],
    resources: {},
    agentOutputs: { plan: '', code: '', tutor: '' },
    isLoading: false,
    error: null
  };
}

/**
 * Client-side workflow state: input -> analysis -> resources, back to input on reset.
 * A failed request keeps the current phase and exposes the server's message in `error`.
 */
export function createWorkflowStore(api: LearnPathApi, sessionId = 'default'): WorkflowStore {
  return createStore<WorkflowState>()((set, get) => {
    // Wraps one request with loading/error bookkeeping; null means it failed
    async function run<T>(request: () => Promise<T>): Promise<T | null> {
      set({ isLoading: true, error: null });
      try {
        return await request();
      } catch (error) {
        set({ error: error instanceof Error ? error.message : String(error) });
        return null;
      } finally {
        set({ isLoading: false });
      }
    }

    return {
      ...initialAppState(sessionId),

      setTaskDescription: (text) => {
        set({ taskDescription: text });
      },

      analyzeTask: async () => {
        const task = get().taskDescription.trim();
        if (!task) {
          set({ error: 'Please enter a task description.' });
          return;
        }

        const breakdown = await run(() => api.analyzeTask(task, sessionId));
        if (breakdown) {
          set({
            taskBreakdown: breakdown,
            phase: 'analysis',
            knownPrerequisiteIndices: [],
            resources: {},
            agentOutputs: { plan: '', code: '', tutor: '' }
          });
        }
      },

      uploadFile: async (file, filename) => {
        const uploaded = await run(() => api.uploadFile(file, filename));
        if (uploaded) {
          set({ taskDescription: uploaded.content });
        }
      },

      toggleKnownPrerequisite: (index) => {
        const known = get().knownPrerequisiteIndices;
        set({
          knownPrerequisiteIndices: known.includes(index)
            ? known.filter(i => i !== index)
            : [...known, index].sort((a, b) => a - b)
        });
      },

      findResources: async () => {
        if (!get().taskBreakdown) {
          set({ error: 'Please analyze a task first.' });
          return;
        }

        const resources = await run(() => api.findResources(get().knownPrerequisiteIndices, sessionId));
        if (resources) {
          set({ resources, phase: 'resources' });
        }
      },

      generatePlan: async () => {
        const plan = await run(() => api.generatePlan(sessionId));
        if (plan !== null) {
          set({ agentOutputs: { ...get().agentOutputs, plan } });
        }
      },

      getCodeExample: async (concept) => {
        if (!concept.trim()) return;
        const code = await run(() => api.getCodeExample(concept, sessionId));
        if (code !== null) {
          set({ agentOutputs: { ...get().agentOutputs, code } });
        }
      },

      askTutor: async (query) => {
        if (!query.trim()) return;
        const tutor = await run(() => api.askTutor(query, sessionId));
        if (tutor !== null) {
          set({ agentOutputs: { ...get().agentOutputs, tutor } });
        }
      },

      exportMarkdown: () => run(() => api.exportMarkdown(sessionId)),

      reset: async () => {
        const done = await run(async () => {
          await api.resetSession(sessionId);
          return true;
        });
        if (done) {
          set(initialAppState(sessionId));
        }
      },

      clearError: () => {
        set({ error: null });
      }
    };
  });
}
