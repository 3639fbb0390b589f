/**
 * Supabase implementation of IPatternRepository.
 * Similarity search and counter increments run as RPC functions so they
 * execute in one statement on the database side.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { CounterDelta, IPatternRepository } from './IPatternRepository.js';
import type {
  NewPatternEntryRow,
  PatternEntryRow,
  ScoredPatternEntryRow,
} from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import { ValidationError } from '../errors.js';

/** Width of the `vector` columns in the pattern_entries migration. */
export const PATTERN_VECTOR_DIMENSIONS = 1536;

/** The configured embedding width must match the migrated columns. */
export function assertVectorDimensions(configured: number): void {
  if (configured !== PATTERN_VECTOR_DIMENSIONS) {
    throw new ValidationError(
      `embeddingDimensions is ${configured} but pattern_entries stores vector(${PATTERN_VECTOR_DIMENSIONS}); ` +
        'change both together',
      { configured, stored: PATTERN_VECTOR_DIMENSIONS }
    );
  }
}

/** Escape `%`, `_` and backslashes so they match literally under ILIKE. */
export function escapeLikePattern(fragment: string): string {
  return fragment.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export class SupabasePatternRepository implements IPatternRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: NewPatternEntryRow): Promise<PatternEntryRow> {
    const { data, error } = await this.db
      .from('pattern_entries')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert pattern entry: ${error.message}`);
    return data as PatternEntryRow;
  }

  async findById(id: string): Promise<PatternEntryRow | null> {
    const { data, error } = await this.db
      .from('pattern_entries')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find pattern entry: ${error.message}`);
    return data as PatternEntryRow | null;
  }

  async findByCanonical(canonicalText: string): Promise<PatternEntryRow | null> {
    const { data, error } = await this.db
      .from('pattern_entries')
      .select('*')
      .eq('canonical_text', canonicalText)
      .maybeSingle();

    if (error) throw new Error(`Failed to find pattern entry: ${error.message}`);
    return data as PatternEntryRow | null;
  }

  async update(id: string, data: Partial<PatternEntryRow>): Promise<PatternEntryRow> {
    const { data: updated, error } = await this.db
      .from('pattern_entries')
      .update({ ...data, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update pattern entry: ${error.message}`);
    return updated as PatternEntryRow;
  }

  async incrementCounters(
    id: string,
    delta: CounterDelta,
    usedAt: string
  ): Promise<PatternEntryRow | null> {
    const { data, error } = await this.db
      .rpc('increment_pattern_counters', {
        entry_id: id,
        success_delta: delta.success,
        failure_delta: delta.failure,
        used_at: usedAt,
      })
      .maybeSingle();

    if (error) throw new Error(`Failed to increment pattern counters: ${error.message}`);
    return data as PatternEntryRow | null;
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('pattern_entries').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete pattern entry: ${error.message}`);
  }

  /**
   * Vector similarity search using pgvector.
   * Calls a Supabase RPC function that orders by cosine similarity.
   */
  async matchNearest(
    embedding: number[],
    matchCount: number
  ): Promise<ScoredPatternEntryRow[]> {
    const { data, error } = await this.db.rpc('match_pattern_entries', {
      query_embedding: JSON.stringify(embedding),
      match_count: matchCount,
    });

    if (error) throw new Error(`Failed to search pattern entries: ${error.message}`);
    return (data ?? []) as ScoredPatternEntryRow[];
  }

  async listFlagged(): Promise<PatternEntryRow[]> {
    const { data, error } = await this.db
      .from('pattern_entries')
      .select('*')
      .not('flagged_at', 'is', null)
      .order('flagged_at', { ascending: true });

    if (error) throw new Error(`Failed to list flagged patterns: ${error.message}`);
    return (data ?? []) as PatternEntryRow[];
  }

  async list(options: PaginationOptions): Promise<PatternEntryRow[]> {
    const { data, error } = await this.db
      .from('pattern_entries')
      .select('*')
      .order('created_at', { ascending: true })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to list pattern entries: ${error.message}`);
    return (data ?? []) as PatternEntryRow[];
  }

  async searchQuestions(fragment: string, maxResults: number): Promise<PatternEntryRow[]> {
    const { data, error } = await this.db.rpc('search_pattern_questions', {
      fragment: escapeLikePattern(fragment),
      max_results: maxResults,
    });

    if (error) throw new Error(`Failed to search pattern questions: ${error.message}`);
    return (data ?? []) as PatternEntryRow[];
  }
}
