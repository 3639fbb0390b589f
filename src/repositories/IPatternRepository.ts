/**
 * Pattern cache data access interface.
 */

import type {
  NewPatternEntryRow,
  PatternEntryRow,
  ScoredPatternEntryRow,
} from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';

export interface CounterDelta {
  success: number;
  failure: number;
}

export interface IPatternRepository {
  insert(row: NewPatternEntryRow): Promise<PatternEntryRow>;

  findById(id: string): Promise<PatternEntryRow | null>;

  findByCanonical(canonicalText: string): Promise<PatternEntryRow | null>;

  update(id: string, data: Partial<PatternEntryRow>): Promise<PatternEntryRow>;

  /** Atomically add to the counters and stamp `last_used`. Null if the row is gone. */
  incrementCounters(
    id: string,
    delta: CounterDelta,
    usedAt: string
  ): Promise<PatternEntryRow | null>;

  delete(id: string): Promise<void>;

  /** Cosine-similarity search, highest first. */
  matchNearest(
    embedding: number[],
    matchCount: number
  ): Promise<ScoredPatternEntryRow[]>;

  listFlagged(): Promise<PatternEntryRow[]>;

  /** All entries, oldest first. */
  list(options: PaginationOptions): Promise<PatternEntryRow[]>;

  /**
   * Unflagged entries whose question contains `fragment` (case-insensitive);
   * every unflagged entry when `fragment` is empty.
   */
  searchQuestions(fragment: string, maxResults: number): Promise<PatternEntryRow[]>;
}
