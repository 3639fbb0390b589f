/**
 * Supabase implementation of IQueryRecordRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IQueryRecordRepository } from './IQueryRecordRepository.js';
import type { QueryRecordRow } from '../types/database.js';
import type { ErrorKind, QueryOutcome } from '../types/models.js';

export class SupabaseQueryRecordRepository implements IQueryRecordRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: QueryRecordRow): Promise<QueryRecordRow> {
    const { data, error } = await this.db
      .from('query_records')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert query record: ${error.message}`);
    return data as QueryRecordRow;
  }

  async findById(id: string): Promise<QueryRecordRow | null> {
    const { data, error } = await this.db
      .from('query_records')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find query record: ${error.message}`);
    return data as QueryRecordRow | null;
  }

  /** The RPC only updates rows still marked pending. */
  async setOutcome(
    id: string,
    outcome: Exclude<QueryOutcome, 'pending'>,
    errorKind?: ErrorKind
  ): Promise<boolean> {
    const { data, error } = await this.db.rpc('set_query_outcome', {
      record_id: id,
      new_outcome: outcome,
      error_kind: errorKind ?? null,
    });

    if (error) throw new Error(`Failed to set query outcome: ${error.message}`);
    return data === true;
  }
}
