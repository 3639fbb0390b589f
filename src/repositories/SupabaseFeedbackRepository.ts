/**
 * Supabase implementation of IFeedbackRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IFeedbackRepository } from './IFeedbackRepository.js';
import type { FeedbackRecordRow } from '../types/database.js';

export class SupabaseFeedbackRepository implements IFeedbackRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: FeedbackRecordRow): Promise<FeedbackRecordRow> {
    const { data, error } = await this.db
      .from('feedback_records')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert feedback: ${error.message}`);
    return data as FeedbackRecordRow;
  }
}
