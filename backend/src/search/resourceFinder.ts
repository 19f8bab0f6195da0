/**
 * Resource Finder
 *
 * Searches the web for learning resources for every prerequisite the learner
 * has not marked as known.
 *
 * - several queries per concept ("<name> tutorial", "learn <name>", ...)
 * - concepts searched in parallel, result map keeps prerequisite order
 * - a concept whose searches all fail is logged and left out; the rest still populate
 */

import { Prerequisite, ResourcesByConcept, LearningResource, TaskBreakdown } from '../types/index.js';
import { SearchProvider, WebSearchHit } from './providers/types.js';
import { selectResources } from './resourceFilter.js';
import { ValidationError, errorMessage } from '../utils/errors.js';

export const QUERY_TEMPLATES = [
  (name: string) => `${name} tutorial`,
  (name: string) => `learn ${name}`,
  (name: string) => `${name} documentation`,
  (name: string) => `${name} course`,
  (name: string) => `${name} getting started guide`
];

export interface ResourceFinderOptions {
  maxResultsPerConcept?: number;
  queriesPerConcept?: number;
  resultsPerQuery?: number;
  country?: string;
  language?: string;
}

export class ConceptSearchError extends Error {
  constructor(readonly concept: string, readonly reasons: string[]) {
    super(`All searches failed for "${concept}": ${reasons.join('; ')}`);
    this.name = 'ConceptSearchError';
  }
}

/**
 * Indices must be non-negative integers. Out-of-range indices are accepted and match nothing.
 */
export function validateKnownIndices(indices: unknown): number[] {
  if (!Array.isArray(indices)) {
    throw new ValidationError('known_prerequisite_indices must be an array of integers');
  }
  const valid: number[] = [];
  for (const index of indices) {
    if (typeof index !== 'number' || !Number.isInteger(index) || index < 0) {
      throw new ValidationError(`Invalid prerequisite index: ${JSON.stringify(index)}`);
    }
    if (!valid.includes(index)) valid.push(index);
  }
  return valid;
}

/**
 * Prerequisites whose index is not in the known-set, in breakdown order,
 * one entry per distinct name.
 */
export function selectUnknownPrerequisites(
  breakdown: TaskBreakdown,
  knownIndices: number[]
): Prerequisite[] {
  const known = new Set(knownIndices);
  const names = new Set<string>();
  const unknown: Prerequisite[] = [];

  breakdown.prerequisites.forEach((prereq, index) => {
    if (known.has(index) || names.has(prereq.name)) return;
    names.add(prereq.name);
    unknown.push(prereq);
  });
  return unknown;
}

export class ResourceFinder {
  private maxResultsPerConcept: number;
  private queriesPerConcept: number;
  private resultsPerQuery: number;
  private country?: string;
  private language?: string;

  constructor(private provider: SearchProvider, options: ResourceFinderOptions = {}) {
    this.maxResultsPerConcept = options.maxResultsPerConcept ?? 5;
    this.queriesPerConcept = Math.min(
      Math.max(options.queriesPerConcept ?? 2, 1),
      QUERY_TEMPLATES.length
    );
    this.resultsPerQuery = options.resultsPerQuery ?? 10;
    this.country = options.country;
    this.language = options.language;
  }

  /**
   * Searches every query for one concept. Individual query failures are tolerated;
   * only a concept with no successful query at all is an error.
   */
  async findResourcesForConcept(concept: string): Promise<LearningResource[]> {
    const hits: WebSearchHit[] = [];
    const failures: string[] = [];

    for (const template of QUERY_TEMPLATES.slice(0, this.queriesPerConcept)) {
      const query = template(concept);
      const result = await this.provider.search({
        query,
        limit: this.resultsPerQuery,
        country: this.country,
        language: this.language
      });

      if (!result.success) {
        console.warn(`[ResourceFinder] Search failed for '${query}': ${result.error ?? 'unknown error'}`);
        failures.push(result.error ?? 'unknown error');
        continue;
      }
      hits.push(...result.hits);
    }

    if (failures.length === this.queriesPerConcept) {
      throw new ConceptSearchError(concept, failures);
    }

    const resources = selectResources(hits, concept, this.maxResultsPerConcept);
    if (resources.length === 0) {
      console.warn(`[ResourceFinder] No resources found for '${concept}' (${hits.length} raw results)`);
    } else {
      console.log(`[ResourceFinder] Found ${resources.length} resource(s) for '${concept}'`);
    }
    return resources;
  }

  async findResourcesForPrerequisites(prerequisites: Prerequisite[]): Promise<ResourcesByConcept> {
    const settled = await Promise.allSettled(
      prerequisites.map(prereq => this.findResourcesForConcept(prereq.name))
    );

    // Names come from the model; fromEntries keeps "__proto__" as an own key
    const entries: Array<[string, LearningResource[]]> = [];
    settled.forEach((outcome, index) => {
      const name = prerequisites[index].name;
      if (outcome.status === 'fulfilled') {
        entries.push([name, outcome.value]);
      } else {
        console.error(`[ResourceFinder] Skipping '${name}': ${errorMessage(outcome.reason)}`);
      }
    });

    return Object.fromEntries(entries);
  }

  async findResources(breakdown: TaskBreakdown, knownIndices: number[]): Promise<ResourcesByConcept> {
    const unknown = selectUnknownPrerequisites(breakdown, knownIndices);
    console.log(
      `[ResourceFinder] Searching ${unknown.length}/${breakdown.prerequisites.length} prerequisites via ${this.provider.name}`
    );
    return this.findResourcesForPrerequisites(unknown);
  }
}
