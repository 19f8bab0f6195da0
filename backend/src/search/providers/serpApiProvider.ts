/**
 * SerpApi Google Web Search Provider
 *
 * Google organic results through SerpApi.
 *
 * Configuration:
 * - SERPAPI_KEY: SerpApi API key
 *
 * See: https://serpapi.com/search-api
 */

import axios from 'axios';
import {
  SearchProvider,
  SearchProviderName,
  WebSearchOptions,
  WebSearchResult,
  WebSearchHit
} from './types.js';
import { errorMessage } from '../../utils/errors.js';

export interface SerpApiConfig {
  apiKey?: string;
  enabled?: boolean;
  defaultCountry?: string;
  defaultLanguage?: string;
  timeoutMs?: number;
}

// SerpApi response types (only the fields used here)
interface SerpApiOrganicResult {
  position: number;
  title?: string;
  link?: string;
  snippet?: string;
  source?: string;
}

interface SerpApiResponse {
  search_metadata?: {
    id: string;
    status: string;
  };
  organic_results?: SerpApiOrganicResult[];
  error?: string;
}

export const SERPAPI_ENDPOINT = 'https://serpapi.com/search';

export class SerpApiProvider implements SearchProvider {
  name: SearchProviderName = 'serpapi';

  private apiKey: string;
  private enabled: boolean;
  private defaultCountry: string;
  private defaultLanguage: string;
  private timeoutMs: number;

  constructor(config?: SerpApiConfig) {
    this.apiKey = config?.apiKey || '';
    this.enabled = config?.enabled !== false && !!this.apiKey;
    this.defaultCountry = config?.defaultCountry || 'us';
    this.defaultLanguage = config?.defaultLanguage || 'en';
    this.timeoutMs = config?.timeoutMs ?? 15000;

    if (!this.enabled) {
      console.warn('[SerpApiProvider] API key not configured. Provider disabled.');
    } else {
      console.log('[SerpApiProvider] Initialized with Google Search API');
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  async search(options: WebSearchOptions): Promise<WebSearchResult> {
    const startTime = Date.now();

    if (!this.enabled) {
      return {
        provider: this.name,
        query: options.query,
        success: false,
        hits: [],
        error: 'SerpApi key not configured'
      };
    }

    try {
      const params: Record<string, string | number> = {
        engine: 'google',
        q: options.query,
        api_key: this.apiKey,
        gl: options.country || this.defaultCountry,
        hl: options.language || this.defaultLanguage,
        num: Math.min(options.limit || 10, 100)
      };

      const response = await axios.get<SerpApiResponse>(SERPAPI_ENDPOINT, {
        params,
        timeout: this.timeoutMs
      });

      if (response.data.error) {
        throw new Error(response.data.error);
      }

      const hits = this.mapOrganicResults(response.data.organic_results || []);

      return {
        provider: this.name,
        query: options.query,
        success: true,
        hits,
        responseTimeMs: Date.now() - startTime
      };
    } catch (error) {
      console.error('[SerpApiProvider] Search error:', errorMessage(error));

      return {
        provider: this.name,
        query: options.query,
        success: false,
        hits: [],
        error: errorMessage(error),
        responseTimeMs: Date.now() - startTime
      };
    }
  }

  // ====================================================
  // Private Methods
  // ====================================================

  private mapOrganicResults(results: SerpApiOrganicResult[]): WebSearchHit[] {
    return results.map((item, index) => ({
      title: item.title || '',
      url: item.link || '',
      snippet: item.snippet || '',
      position: item.position || index + 1
    }));
  }
}

export function createSerpApiProvider(config?: SerpApiConfig): SerpApiProvider {
  return new SerpApiProvider(config);
}
