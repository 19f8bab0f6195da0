/**
 * Web Search Provider Types
 *
 * Common types for the web-search providers behind the resource finder.
 */

export type SearchProviderName = 'serpapi' | 'mock';

export interface SearchProvider {
  /** Provider name */
  name: SearchProviderName;

  /** Whether the provider is configured and usable */
  isEnabled(): boolean;

  /** Web search. Failures come back as `success: false`, never as a rejection. */
  search(options: WebSearchOptions): Promise<WebSearchResult>;
}

export interface WebSearchOptions {
  query: string;
  limit?: number;
  country?: string;   // gl (us, gb, de ...)
  language?: string;  // hl (en, de ...)
}

export interface WebSearchHit {
  title: string;
  url: string;
  snippet: string;
  position: number;
}

export interface WebSearchResult {
  provider: SearchProviderName;
  query: string;
  success: boolean;
  hits: WebSearchHit[];
  error?: string;
  responseTimeMs?: number;
}
