import { describe, it, expect, vi } from 'vitest';
import { createWorkflowStore } from '../src/store/workflowStore.js';
import { ApiError, type LearnPathApi } from '../src/services/api.js';
import { SAMPLE_BREAKDOWN } from './helpers/fakes.js';

const RESOURCES = {
  JWT: [{ title: 'JWT Introduction', url: 'https://jwt.io/introduction', description: '', source: 'jwt.io' }]
};

function fakeApi(): LearnPathApi {
  return {
    analyzeTask: vi.fn(async () => SAMPLE_BREAKDOWN),
    uploadFile: vi.fn(async (_file: Blob, filename: string) => ({ content: 'Build a chat app', filename })),
    findResources: vi.fn(async () => RESOURCES),
    generatePlan: vi.fn(async () => '1. Start'),
    getCodeExample: vi.fn(async () => 'const x = 1;'),
    askTutor: vi.fn(async () => 'Because.'),
    exportMarkdown: vi.fn(async () => ({ markdown: '# Learning Resources', filename: 'learning_resources_x.md' })),
    getSession: vi.fn(async () => ({
      session_id: 'tab',
      phase: 'input' as const,
      task_description: '',
      known_prerequisite_indices: [],
      has_breakdown: false,
      resource_count: 0,
      created_at: '2026-01-05T09:00:00.000Z',
      updated_at: '2026-01-05T09:00:00.000Z'
    })),
    resetSession: vi.fn(async () => {}),
    healthCheck: vi.fn(async () => ({ status: 'healthy', service: 'LearnPath API' }))
  };
}

describe('createWorkflowStore', () => {
  it('asks for a task before analyzing', async () => {
    const api = fakeApi();
    const store = createWorkflowStore(api, 'tab');

    await store.getState().analyzeTask();

    expect(store.getState().error).toBe('Please enter a task description.');
    expect(api.analyzeTask).not.toHaveBeenCalled();
  });

  it('moves to analysis after a successful analysis', async () => {
    const api = fakeApi();
    const store = createWorkflowStore(api, 'tab');

    store.getState().setTaskDescription('  Build an API  ');
    await store.getState().analyzeTask();

    expect(api.analyzeTask).toHaveBeenCalledWith('Build an API', 'tab');
    expect(store.getState()).toMatchObject({ phase: 'analysis', taskBreakdown: SAMPLE_BREAKDOWN, isLoading: false, error: null });
  });

  it('keeps known prerequisites sorted and toggles them off', () => {
    const store = createWorkflowStore(fakeApi());

    store.getState().toggleKnownPrerequisite(2);
    store.getState().toggleKnownPrerequisite(0);
    expect(store.getState().knownPrerequisiteIndices).toEqual([0, 2]);

    store.getState().toggleKnownPrerequisite(2);
    expect(store.getState().knownPrerequisiteIndices).toEqual([0]);
  });

  it('finds resources for the unknown prerequisites', async () => {
    const api = fakeApi();
    const store = createWorkflowStore(api, 'tab');

    await store.getState().findResources();
    expect(store.getState().error).toBe('Please analyze a task first.');

    store.getState().setTaskDescription('Build an API');
    await store.getState().analyzeTask();
    store.getState().toggleKnownPrerequisite(0);
    await store.getState().findResources();

    expect(api.findResources).toHaveBeenCalledWith([0], 'tab');
    expect(store.getState()).toMatchObject({ phase: 'resources', resources: RESOURCES, error: null });
  });

  it('keeps the phase and shows the message when a request fails', async () => {
    const api = fakeApi();
    api.findResources = vi.fn(async () => {
      throw new ApiError('Search provider unavailable', 502);
    });
    const store = createWorkflowStore(api);

    store.getState().setTaskDescription('Build an API');
    await store.getState().analyzeTask();
    await store.getState().findResources();

    expect(store.getState()).toMatchObject({
      phase: 'analysis',
      error: 'Search provider unavailable',
      isLoading: false
    });

    store.getState().clearError();
    expect(store.getState().error).toBeNull();
  });

  it('stores helper outputs separately', async () => {
    const store = createWorkflowStore(fakeApi());

    await store.getState().generatePlan();
    await store.getState().getCodeExample('JWT');
    await store.getState().askTutor('   ');

    expect(store.getState().agentOutputs).toEqual({ plan: '1. Start', code: 'const x = 1;', tutor: '' });
  });

  it('fills the task from an uploaded file', async () => {
    const store = createWorkflowStore(fakeApi());
    await store.getState().uploadFile(new Blob(['ignored']), 'task.txt');
    expect(store.getState().taskDescription).toBe('Build a chat app');
  });

  it('returns the exported document', async () => {
    const store = createWorkflowStore(fakeApi());
    expect(await store.getState().exportMarkdown()).toEqual({
      markdown: '# Learning Resources',
      filename: 'learning_resources_x.md'
    });
  });

  it('reset clears everything back to input', async () => {
    const api = fakeApi();
    const store = createWorkflowStore(api, 'tab');
    store.getState().setTaskDescription('Build an API');
    await store.getState().analyzeTask();
    await store.getState().findResources();

    await store.getState().reset();

    expect(api.resetSession).toHaveBeenCalledWith('tab');
    expect(store.getState()).toMatchObject({
      sessionId: 'tab',
      phase: 'input',
      taskDescription: '',
      taskBreakdown: null,
      knownPrerequisiteIndices: [],
      resources: {}
    });
  });
});
