/**
 * Feedback data access interface.
 */

import type { FeedbackRecordRow } from '../types/database.js';

export interface IFeedbackRepository {
  insert(row: FeedbackRecordRow): Promise<FeedbackRecordRow>;
}
