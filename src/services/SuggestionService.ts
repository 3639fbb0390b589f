/**
 * Question suggestions drawn from the pattern cache.
 */

import type { QuerySuggestion } from '../types/api.js';
import type { PatternEntry } from '../types/models.js';
import { successRate, type PatternStore } from './PatternStore.js';

const DEFAULT_LIMIT = 5;
const MAX_LIMIT = 50;

export class SuggestionService {
  constructor(private readonly patternStore: PatternStore) {}

  /**
   * Empty fragment: most-used entries. Otherwise entries whose question
   * contains the fragment, best success rate first. Flagged entries never
   * appear.
   */
  async suggest(partial: string, limit: number = DEFAULT_LIMIT): Promise<QuerySuggestion[]> {
    const size = Math.min(Math.max(Math.floor(limit), 0), MAX_LIMIT);
    if (size === 0) return [];

    const fragment = partial.trim().toLowerCase();
    const entries = await this.patternStore.searchQuestions(fragment, size * 4);

    const matching = entries.filter(
      (e) => e.flaggedAt === null && e.question.toLowerCase().includes(fragment)
    );
    matching.sort(fragment === '' ? byUsage : byQuality);

    return matching.slice(0, size).map((e) => ({
      question: e.question,
      successRate: successRate(e),
      uses: uses(e),
    }));
  }
}

function uses(e: PatternEntry): number {
  return e.successCount + e.failureCount;
}

function byUsage(a: PatternEntry, b: PatternEntry): number {
  return uses(b) - uses(a) || successRate(b) - successRate(a) || a.question.localeCompare(b.question);
}

function byQuality(a: PatternEntry, b: PatternEntry): number {
  return successRate(b) - successRate(a) || uses(b) - uses(a) || a.question.localeCompare(b.question);
}
