/**
 * In-memory mock for IFeedbackRepository.
 */

import type { IFeedbackRepository } from '../../src/repositories/IFeedbackRepository.js';
import type { FeedbackRecordRow } from '../../src/types/database.js';

export class MockFeedbackRepository implements IFeedbackRepository {
  readonly rows: FeedbackRecordRow[] = [];

  async insert(row: FeedbackRecordRow): Promise<FeedbackRecordRow> {
    this.rows.push({ ...row });
    return { ...row };
  }
}
