import { AppConfig } from './config/env.js';
import { createOpenAiLlmClient, createOrchestrator, LearningOrchestrator } from './agents/index.js';
import { ResourceFinder } from './search/resourceFinder.js';
import { SearchProvider, createMockSearchProvider, createSerpApiProvider } from './search/providers/index.js';

export function createSearchProvider(config: AppConfig): SearchProvider {
  if (config.useMockSearch) {
    console.log('[Search] Using mock search provider');
    return createMockSearchProvider();
  }
  return createSerpApiProvider({
    apiKey: config.serpApiKey,
    defaultCountry: config.searchCountry,
    defaultLanguage: config.searchLanguage
  });
}

/**
 * Builds the orchestrator with real providers. Server and CLI share this.
 */
export function buildOrchestrator(config: AppConfig): LearningOrchestrator {
  const finder = new ResourceFinder(createSearchProvider(config), {
    maxResultsPerConcept: config.maxResultsPerConcept,
    queriesPerConcept: config.queriesPerConcept,
    country: config.searchCountry,
    language: config.searchLanguage
  });

  return createOrchestrator({
    llm: createOpenAiLlmClient({ apiKey: config.openaiApiKey, model: config.openaiModel }),
    finder
  });
}
