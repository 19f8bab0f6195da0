import dotenv from 'dotenv';

export interface AppConfig {
  port: number;
  frontendUrl: string;
  openaiApiKey: string;
  openaiModel: string;
  serpApiKey: string;
  searchCountry: string;
  searchLanguage: string;
  useMockSearch: boolean;
  maxResultsPerConcept: number;
  queriesPerConcept: number;
}

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Builds the typed configuration from an environment map.
 * Nothing here is required at boot: a missing OpenAI key only fails the LLM calls.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const serpApiKey = env.SERPAPI_KEY || '';

  return {
    port: intFrom(env.PORT, 3001),
    frontendUrl: env.FRONTEND_URL || 'http://localhost:5173',
    openaiApiKey: env.OPENAI_API_KEY || '',
    openaiModel: env.OPENAI_MODEL || 'gpt-4o-mini',
    serpApiKey,
    searchCountry: env.SEARCH_COUNTRY || 'us',
    searchLanguage: env.SEARCH_LANGUAGE || 'en',
    useMockSearch: env.USE_MOCK_SEARCH === 'true' || !serpApiKey,
    maxResultsPerConcept: clamp(intFrom(env.MAX_RESULTS_PER_CONCEPT, 5), 1, 20),
    queriesPerConcept: clamp(intFrom(env.QUERIES_PER_CONCEPT, 2), 1, 5)
  };
}

/** Loads `.env` from the working directory; must run before loadConfig(). */
export function loadEnvFile(): void {
  dotenv.config();
}
