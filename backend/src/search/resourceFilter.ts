/**
 * Learning resource relevance filter
 *
 * Heuristics only: keyword matching against the concept, a domain block list,
 * and a score that favours documentation and tutorial sites.
 */

import domainLists from '../data/resourceDomains.json' with { type: 'json' };
import { LearningResource } from '../types/index.js';
import { WebSearchHit } from './providers/types.js';

export interface DomainLists {
  relevanceStopWords: string[];
  titleStopWords: string[];
  highValueMarkers: string[];
  mediumValueMarkers: string[];
  educationalTitleKeywords: string[];
  lowQualityTitleIndicators: string[];
  blockedDomains: string[];
  educationalMarkers: string[];
  lmsIndicators: string[];
  validityKeywords: string[];
  englishTlds: string[];
}

const LISTS: DomainLists = domainLists;

const MAX_DESCRIPTION_LENGTH = 200;
const MAX_NON_ASCII_RATIO = 0.3;

function stripParentheses(text: string): string {
  return text.replace(/\([^)]*\)/g, '');
}

/** Words inside the first parenthesised group: "Python ML (NumPy, PIL/OpenCV)" -> numpy, pil, opencv */
function parentheticalWords(conceptLower: string): string[] {
  const match = conceptLower.match(/\(([^)]+)\)/);
  if (!match) return [];
  return match[1]
    .replace(/[/,]/g, ' ')
    .split(/\s+/)
    .map(w => w.trim())
    .filter(w => w.length > 2);
}

function splitWords(text: string, stopWords: string[]): string[] {
  return text.split(/\s+/).filter(w => w.length > 0 && !stopWords.includes(w));
}

export function conceptKeywords(concept: string): string[] {
  const lower = concept.toLowerCase();
  return [
    ...splitWords(stripParentheses(lower), LISTS.relevanceStopWords),
    ...parentheticalWords(lower)
  ];
}

function containsAny(haystacks: string[], needles: string[]): boolean {
  return needles.some(needle => haystacks.some(h => h.includes(needle)));
}

/** The part of the URL after scheme and host. */
function urlPath(urlLower: string): string {
  const parts = urlLower.split('/');
  return parts.length > 3 ? parts.slice(3).join('/') : parts[parts.length - 1];
}

export function isRelevant(hit: WebSearchHit, concept: string): boolean {
  const title = hit.title.toLowerCase();
  const url = hit.url.toLowerCase();
  const words = conceptKeywords(concept);

  if (words.length > 0) {
    return containsAny([title, url], words.slice(0, 5));
  }
  const prefix = concept.toLowerCase().slice(0, 20);
  return title.includes(prefix) || url.includes(prefix);
}

export function isValidLearningResource(url: string, title: string, concept: string): boolean {
  const urlLower = url.toLowerCase();
  const titleLower = title.toLowerCase();

  if (LISTS.blockedDomains.some(domain => urlLower.includes(domain))) {
    return false;
  }

  // Mostly non-ASCII titles are taken as non-English pages
  const nonAscii = Array.from(title).filter(c => c.charCodeAt(0) > 127).length;
  if (title.length > 0 && nonAscii / title.length > MAX_NON_ASCII_RATIO) {
    return false;
  }

  if (containsAny([urlLower, titleLower], LISTS.educationalMarkers)) {
    return true;
  }

  const path = urlPath(urlLower);
  if (LISTS.lmsIndicators.some(ind => path.includes(ind) || titleLower.includes(ind))) {
    return false;
  }

  const conceptWords = splitWords(stripParentheses(concept.toLowerCase()), LISTS.titleStopWords);
  const hasKeyword = LISTS.validityKeywords.some(k => titleLower.includes(k));
  const hasConcept = conceptWords.slice(0, 3).some(w => titleLower.includes(w));
  if (!hasKeyword && !hasConcept) {
    return false;
  }

  return LISTS.englishTlds.some(tld => urlLower.includes(tld));
}

/**
 * Educational value score; higher is better, never negative.
 */
export function scoreResource(url: string, title: string, concept: string): number {
  const urlLower = url.toLowerCase();
  const titleLower = title.toLowerCase();
  let score = 1;

  if (containsAny([urlLower, titleLower], LISTS.highValueMarkers)) score += 10;
  if (containsAny([urlLower, titleLower], LISTS.mediumValueMarkers)) score += 5;
  if (LISTS.educationalTitleKeywords.some(k => titleLower.includes(k))) score += 3;

  const conceptLower = concept.toLowerCase();
  const conceptWords = splitWords(stripParentheses(conceptLower), LISTS.titleStopWords);
  if (conceptWords.length > 0) {
    if (conceptWords.slice(0, 3).some(w => titleLower.includes(w))) score += 2;
    if (parentheticalWords(conceptLower).slice(0, 2).some(w => titleLower.includes(w))) score += 2;
  }

  if (LISTS.lowQualityTitleIndicators.some(ind => titleLower.includes(ind))) score -= 2;

  return Math.max(0, score);
}

export function truncateDescription(snippet: string): string {
  return snippet.length > MAX_DESCRIPTION_LENGTH
    ? `${snippet.slice(0, MAX_DESCRIPTION_LENGTH)}...`
    : snippet;
}

export function sourceOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return 'web';
  }
}

/**
 * Filters raw hits (already in rank order, possibly from several queries) down to
 * at most `maxResults` resources, best score first. Equal scores keep rank order.
 */
export function selectResources(
  hits: WebSearchHit[],
  concept: string,
  maxResults: number
): LearningResource[] {
  const seen = new Set<string>();
  const scored: Array<{ score: number; resource: LearningResource }> = [];

  for (const hit of hits) {
    if (!hit.url || !hit.title || seen.has(hit.url)) continue;
    if (!isRelevant(hit, concept)) continue;
    if (!isValidLearningResource(hit.url, hit.title, concept)) continue;

    seen.add(hit.url);
    scored.push({
      score: scoreResource(hit.url, hit.title, concept),
      resource: {
        title: hit.title,
        url: hit.url,
        description: truncateDescription(hit.snippet),
        source: sourceOf(hit.url)
      }
    });
  }

  return scored
    .sort((a, b) => b.score - a.score)
    .slice(0, maxResults)
    .map(entry => entry.resource);
}
