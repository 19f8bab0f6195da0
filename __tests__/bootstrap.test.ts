import { describe, it, expect, vi, beforeEach } from 'vitest';
import { buildOrchestrator, createSearchProvider } from '../backend/src/bootstrap.js';
import { loadConfig } from '../backend/src/config/env.js';
import { UpstreamError } from '../backend/src/utils/errors.js';

describe('bootstrap', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('picks the mock provider without a SerpApi key', () => {
    expect(createSearchProvider(loadConfig({})).name).toBe('mock');
  });

  it('picks SerpApi once a key is configured', () => {
    const provider = createSearchProvider(loadConfig({ SERPAPI_KEY: 'test-key' }));
    expect(provider.name).toBe('serpapi');
    expect(provider.isEnabled()).toBe(true);
  });

  it('builds an orchestrator whose LLM calls fail cleanly without an OpenAI key', async () => {
    const orchestrator = buildOrchestrator(loadConfig({}));

    expect(orchestrator.getSession('default').phase).toBe('input');
    await expect(orchestrator.analyzeTask('default', 'Build an API')).rejects.toBeInstanceOf(UpstreamError);
  });
});
