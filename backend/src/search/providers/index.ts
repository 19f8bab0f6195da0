/**
 * Web Search Providers Index
 */

export * from './types.js';

export { SerpApiProvider, createSerpApiProvider, type SerpApiConfig } from './serpApiProvider.js';
export { MockSearchProvider, createMockSearchProvider } from './mockProvider.js';
