/**
 * Semantic cache of solved (question, artifact) pairs.
 *
 * Entries are keyed by canonical question text and ranked by embedding
 * similarity. Usage counters drive low-performer flagging; flagged entries
 * stop serving direct hits and leave the cache only through a reviewed
 * `prune`. All writes for one canonical key go through a keyed lock, reads
 * never wait.
 */

import type { IPatternRepository } from '../repositories/IPatternRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { PatternEntryRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type {
  PatternEntry,
  PatternProvenance,
  ScoredPattern,
} from '../types/models.js';
import { EmbeddingDimensionError } from '../errors.js';
import { KeyedLock } from '../concurrency/KeyedLock.js';
import { parseEmbedding, serializeEmbedding } from './vector.js';

export interface NewPattern {
  question: string;
  artifact: string;
  embedding: number[];
  provenance: PatternProvenance;
  /** Starting success count for a fresh entry. Default 0. */
  successCount?: number;
}

export type UpsertStatus = 'inserted' | 'replaced' | 'kept';

export interface UpsertResult {
  status: UpsertStatus;
  entry: PatternEntry;
}

export interface ThresholdLookup {
  /** Best unflagged entry at or above the threshold. */
  hit: ScoredPattern | null;
  /** Ranked nearest entries, the hit included. */
  candidates: ScoredPattern[];
}

export interface PatternStoreOptions {
  dimensions: number;
  /** success_rate below this after `lowPerformerMinUses` uses flags an entry. */
  lowPerformerFloor: number;
  lowPerformerMinUses: number;
}

/** Upsert key: trimmed, whitespace-collapsed, lower-cased question. */
export function canonicalize(question: string): string {
  return question.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Unused entries rank as if they had never failed. */
export function successRate(entry: Pick<PatternEntry, 'successCount' | 'failureCount'>): number {
  const uses = entry.successCount + entry.failureCount;
  return uses === 0 ? 1 : entry.successCount / uses;
}

/** Similarity desc, then success rate, then corrections, then most recently used. */
export function compareScored(a: ScoredPattern, b: ScoredPattern): number {
  return (
    b.similarity - a.similarity ||
    successRate(b.entry) - successRate(a.entry) ||
    provenanceRank(b.entry.provenance) - provenanceRank(a.entry.provenance) ||
    b.entry.lastUsed.getTime() - a.entry.lastUsed.getTime()
  );
}

function provenanceRank(provenance: PatternProvenance): number {
  return provenance === 'user_correction' ? 1 : 0;
}

export function rowToEntry(row: PatternEntryRow): PatternEntry {
  return {
    id: row.id,
    canonicalText: row.canonical_text,
    question: row.question,
    artifact: row.artifact,
    embedding: parseEmbedding(row.embedding),
    successCount: row.success_count,
    failureCount: row.failure_count,
    lastUsed: new Date(row.last_used),
    provenance: row.provenance,
    flaggedAt: row.flagged_at ? new Date(row.flagged_at) : null,
    createdAt: new Date(row.created_at),
  };
}

export class PatternStore {
  constructor(
    private readonly repo: IPatternRepository,
    private readonly logger: ILogProvider,
    private readonly options: PatternStoreOptions,
    private readonly lock: KeyedLock = new KeyedLock()
  ) {}

  get dimensions(): number {
    return this.options.dimensions;
  }

  // ── Writes ──

  async upsert(pattern: NewPattern): Promise<UpsertResult> {
    this.checkDimensions(pattern.embedding);
    const canonical = canonicalize(pattern.question);

    return this.lock.run(canonical, async () => {
      const now = new Date().toISOString();
      const existing = await this.repo.findByCanonical(canonical);

      if (!existing) {
        const row = await this.repo.insert({
          canonical_text: canonical,
          question: pattern.question.trim(),
          artifact: pattern.artifact,
          embedding: serializeEmbedding(pattern.embedding),
          success_count: pattern.successCount ?? 0,
          failure_count: 0,
          last_used: now,
          provenance: pattern.provenance,
          flagged_at: null,
        });
        this.logger.debug('Pattern inserted', {
          patternId: row.id,
          provenance: row.provenance,
        });
        return { status: 'inserted', entry: rowToEntry(row) };
      }

      if (existing.provenance === 'user_correction' && pattern.provenance === 'auto') {
        return { status: 'kept', entry: rowToEntry(existing) };
      }

      const sameArtifact = existing.artifact === pattern.artifact;
      const row = await this.repo.update(existing.id, {
        artifact: pattern.artifact,
        embedding: serializeEmbedding(pattern.embedding),
        provenance: pattern.provenance,
        last_used: now,
        ...(!sameArtifact && {
          success_count: pattern.successCount ?? 0,
          failure_count: 0,
          flagged_at: null,
        }),
      });
      this.logger.debug('Pattern replaced', {
        patternId: row.id,
        provenance: row.provenance,
        previousProvenance: existing.provenance,
        countersReset: !sameArtifact,
      });
      return { status: 'replaced', entry: rowToEntry(row) };
    });
  }

  recordSuccess(id: string): Promise<PatternEntry | null> {
    return this.increment(id, { success: 1, failure: 0 });
  }

  recordFailure(id: string): Promise<PatternEntry | null> {
    return this.increment(id, { success: 0, failure: 1 });
  }

  /** Stamp `last_used` after a cache hit. */
  async touch(id: string): Promise<PatternEntry | null> {
    const current = await this.repo.findById(id);
    if (!current) return null;

    return this.lock.run(current.canonical_text, async () => {
      const row = await this.repo.update(id, { last_used: new Date().toISOString() });
      return rowToEntry(row);
    });
  }

  /**
   * Delete reviewed low performers. Ids that are missing or no longer
   * flagged are skipped. Returns the ids actually deleted.
   */
  async prune(ids: string[], reviewer: string): Promise<string[]> {
    const pruned: string[] = [];

    for (const id of ids) {
      const current = await this.repo.findById(id);
      if (!current) {
        this.logger.warn('Prune skipped missing pattern', { patternId: id, reviewer });
        continue;
      }

      const deleted = await this.lock.run(current.canonical_text, async () => {
        const row = await this.repo.findById(id);
        if (!row || row.flagged_at === null) return false;
        await this.repo.delete(id);
        this.logger.info('Pattern pruned', {
          patternId: id,
          reviewer,
          question: row.question,
          successCount: row.success_count,
          failureCount: row.failure_count,
          flaggedAt: row.flagged_at,
        });
        return true;
      });

      if (deleted) {
        pruned.push(id);
      } else {
        this.logger.warn('Prune skipped unflagged pattern', { patternId: id, reviewer });
      }
    }

    return pruned;
  }

  // ── Reads ──

  async getById(id: string): Promise<PatternEntry | null> {
    const row = await this.repo.findById(id);
    return row ? rowToEntry(row) : null;
  }

  async findByQuestion(question: string): Promise<PatternEntry | null> {
    const row = await this.repo.findByCanonical(canonicalize(question));
    return row ? rowToEntry(row) : null;
  }

  async queryNearest(embedding: number[], k: number): Promise<ScoredPattern[]> {
    this.checkDimensions(embedding);
    if (k <= 0) return [];

    const rows = await this.repo.matchNearest(embedding, k);
    return rows
      .map((row) => ({ entry: rowToEntry(row), similarity: row.similarity }))
      .sort(compareScored)
      .slice(0, k);
  }

  async thresholdLookup(
    embedding: number[],
    threshold: number,
    k: number
  ): Promise<ThresholdLookup> {
    const candidates = await this.queryNearest(embedding, k);
    const hit =
      candidates.find((c) => c.similarity >= threshold && c.entry.flaggedAt === null) ?? null;
    return { hit, candidates };
  }

  async listFlagged(): Promise<PatternEntry[]> {
    const rows = await this.repo.listFlagged();
    return rows.map(rowToEntry);
  }

  async list(options: PaginationOptions): Promise<PatternEntry[]> {
    const rows = await this.repo.list(options);
    return rows.map(rowToEntry);
  }

  async searchQuestions(fragment: string, maxResults: number): Promise<PatternEntry[]> {
    const rows = await this.repo.searchQuestions(fragment.trim(), maxResults);
    return rows.map(rowToEntry);
  }

  // ── Internals ──

  private async increment(
    id: string,
    delta: { success: number; failure: number }
  ): Promise<PatternEntry | null> {
    const current = await this.repo.findById(id);
    if (!current) return null;

    return this.lock.run(current.canonical_text, async () => {
      const row = await this.repo.incrementCounters(id, delta, new Date().toISOString());
      if (!row) return null;
      return rowToEntry(await this.reevaluateFlag(row));
    });
  }

  private async reevaluateFlag(row: PatternEntryRow): Promise<PatternEntryRow> {
    const uses = row.success_count + row.failure_count;
    const rate = uses === 0 ? 1 : row.success_count / uses;
    const lowPerformer =
      uses >= this.options.lowPerformerMinUses && rate < this.options.lowPerformerFloor;

    if (lowPerformer && row.flagged_at === null) {
      this.logger.warn('Pattern flagged as low performer', {
        patternId: row.id,
        successRate: rate,
        uses,
      });
      return this.repo.update(row.id, { flagged_at: new Date().toISOString() });
    }
    if (!lowPerformer && row.flagged_at !== null) {
      this.logger.info('Pattern recovered, flag cleared', {
        patternId: row.id,
        successRate: rate,
        uses,
      });
      return this.repo.update(row.id, { flagged_at: null });
    }
    return row;
  }

  private checkDimensions(embedding: number[]): void {
    if (embedding.length !== this.options.dimensions) {
      throw new EmbeddingDimensionError(this.options.dimensions, embedding.length);
    }
  }
}
