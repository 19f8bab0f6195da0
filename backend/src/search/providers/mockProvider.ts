/**
 * Mock Web Search Provider
 *
 * Used when no SerpApi key is configured, or with USE_MOCK_SEARCH=true.
 * Returns deterministic documentation and tutorial links for local development and demos.
 */

import {
  SearchProvider,
  SearchProviderName,
  WebSearchOptions,
  WebSearchResult,
  WebSearchHit
} from './types.js';

const MOCK_SITES = [
  { host: 'developer.mozilla.org', path: 'en-US/docs/Learn', label: 'MDN Learn' },
  { host: 'www.freecodecamp.org', path: 'news', label: 'freeCodeCamp' },
  { host: 'www.geeksforgeeks.org', path: 'tutorials', label: 'GeeksforGeeks' },
  { host: 'dev.to', path: 't', label: 'DEV Community' },
  { host: 'github.com', path: 'topics', label: 'GitHub Topics' }
];

function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export class MockSearchProvider implements SearchProvider {
  name: SearchProviderName = 'mock';

  isEnabled(): boolean {
    return true;
  }

  async search(options: WebSearchOptions): Promise<WebSearchResult> {
    const startTime = Date.now();
    const hits = this.generateHits(options.query).slice(0, options.limit || 10);

    return {
      provider: this.name,
      query: options.query,
      success: true,
      hits,
      responseTimeMs: Date.now() - startTime
    };
  }

  private generateHits(query: string): WebSearchHit[] {
    const slug = slugify(query) || 'topic';

    return MOCK_SITES.map((site, index) => ({
      title: `${query} - ${site.label} Tutorial`,
      url: `https://${site.host}/${site.path}/${slug}`,
      snippet: `A beginner-friendly guide to ${query} on ${site.label}.`,
      position: index + 1
    }));
  }
}

export function createMockSearchProvider(): MockSearchProvider {
  return new MockSearchProvider();
}
