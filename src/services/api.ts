/**
 * LearnPath API Client
 * Service layer talking to the backend API
 */

import type {
  ExportMarkdownResponse,
  HealthResponse,
  ResourcesByConcept,
  SessionSnapshot,
  TaskBreakdown,
  UploadFileResponse
} from '../types/index.js';

export const DEFAULT_API_BASE_URL = 'http://localhost:3001/api';

export class ApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
  }
}

export interface ApiClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
}

export interface LearnPathApi {
  analyzeTask(taskDescription: string, sessionId?: string): Promise<TaskBreakdown>;
  uploadFile(file: Blob, filename: string): Promise<UploadFileResponse>;
  findResources(knownPrerequisiteIndices: number[], sessionId?: string): Promise<ResourcesByConcept>;
  generatePlan(sessionId?: string): Promise<string>;
  getCodeExample(concept: string, sessionId?: string): Promise<string>;
  askTutor(query: string, sessionId?: string): Promise<string>;
  exportMarkdown(sessionId?: string): Promise<ExportMarkdownResponse>;
  getSession(sessionId?: string): Promise<SessionSnapshot>;
  resetSession(sessionId?: string): Promise<void>;
  healthCheck(): Promise<HealthResponse>;
}

function detailOf(body: unknown): string | null {
  if (typeof body === 'object' && body !== null && 'detail' in body && typeof body.detail === 'string') {
    return body.detail;
  }
  return null;
}

export function createLearnPathApi(options: ApiClientOptions = {}): LearnPathApi {
  const baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
  const doFetch = options.fetch ?? fetch;

  // API request helper; error bodies are `{ detail }`
  async function send(endpoint: string, init: RequestInit = {}): Promise<Response> {
    const response = await doFetch(`${baseUrl}${endpoint}`, init);

    if (!response.ok) {
      const body: unknown = await response.json().catch(() => null);
      throw new ApiError(detailOf(body) ?? `Request failed (${response.status})`, response.status);
    }
    return response;
  }

  async function apiRequest<T>(endpoint: string, init: RequestInit = {}): Promise<T> {
    const response = await send(endpoint, init);
    return response.json();
  }

  function postJson<T>(endpoint: string, body: object): Promise<T> {
    return apiRequest<T>(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body)
    });
  }

  return {
    analyzeTask: (taskDescription, sessionId = 'default') =>
      postJson<TaskBreakdown>('/analyze-task', { task_description: taskDescription, session_id: sessionId }),

    uploadFile: (file, filename) => {
      const form = new FormData();
      form.append('file', file, filename);
      return apiRequest<UploadFileResponse>('/upload-file', { method: 'POST', body: form });
    },

    findResources: async (knownPrerequisiteIndices, sessionId = 'default') => {
      const data = await postJson<{ resources: ResourcesByConcept }>('/find-resources', {
        known_prerequisite_indices: knownPrerequisiteIndices,
        session_id: sessionId
      });
      return data.resources;
    },

    generatePlan: async (sessionId = 'default') =>
      (await postJson<{ plan: string }>('/generate-plan', { session_id: sessionId })).plan,

    getCodeExample: async (concept, sessionId = 'default') =>
      (await postJson<{ code: string }>('/get-code-example', { concept, session_id: sessionId })).code,

    askTutor: async (query, sessionId = 'default') =>
      (await postJson<{ response: string }>('/ask-tutor', { query, session_id: sessionId })).response,

    exportMarkdown: (sessionId = 'default') =>
      postJson<ExportMarkdownResponse>('/export-markdown', { session_id: sessionId }),

    getSession: (sessionId = 'default') =>
      apiRequest<SessionSnapshot>(`/session?session_id=${encodeURIComponent(sessionId)}`),

    resetSession: async (sessionId = 'default') => {
      await send(`/reset-session?session_id=${encodeURIComponent(sessionId)}`, { method: 'DELETE' });
    },

    healthCheck: () => apiRequest<HealthResponse>('/health')
  };
}
