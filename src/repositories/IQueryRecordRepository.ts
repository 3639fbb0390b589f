/**
 * Query record data access interface.
 */

import type { QueryRecordRow } from '../types/database.js';
import type { ErrorKind, QueryOutcome } from '../types/models.js';

export interface IQueryRecordRepository {
  insert(row: QueryRecordRow): Promise<QueryRecordRow>;

  findById(id: string): Promise<QueryRecordRow | null>;

  /**
   * Move a pending record to a decided outcome and append `errorKind` when
   * given. Returns false when the record was already decided.
   */
  setOutcome(
    id: string,
    outcome: Exclude<QueryOutcome, 'pending'>,
    errorKind?: ErrorKind
  ): Promise<boolean>;
}
