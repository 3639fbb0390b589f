/**
 * In-memory mock for IQueryRecordRepository.
 */

import type { IQueryRecordRepository } from '../../src/repositories/IQueryRecordRepository.js';
import type { QueryRecordRow } from '../../src/types/database.js';
import type { ErrorKind, QueryOutcome } from '../../src/types/models.js';

export class MockQueryRecordRepository implements IQueryRecordRepository {
  private records = new Map<string, QueryRecordRow>();

  async insert(row: QueryRecordRow): Promise<QueryRecordRow> {
    if (this.records.has(row.id)) {
      throw new Error(`duplicate query record "${row.id}"`);
    }
    this.records.set(row.id, { ...row });
    return { ...row };
  }

  async findById(id: string): Promise<QueryRecordRow | null> {
    const row = this.records.get(id);
    return row ? { ...row } : null;
  }

  async setOutcome(
    id: string,
    outcome: Exclude<QueryOutcome, 'pending'>,
    errorKind?: ErrorKind
  ): Promise<boolean> {
    const row = this.records.get(id);
    if (!row || row.outcome !== 'pending') return false;
    this.records.set(id, {
      ...row,
      outcome,
      error_kinds: errorKind ? [...row.error_kinds, errorKind] : row.error_kinds,
    });
    return true;
  }

  // ── Test Helpers ──

  get size(): number {
    return this.records.size;
  }
}
