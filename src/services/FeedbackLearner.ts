/**
 * Feedback ingestion and the learning loop.
 *
 * A verdict on a resolved query adjusts the pattern cache: positive feedback
 * reinforces (or creates) the entry behind the artifact, negative feedback
 * counts a failure against it, and a correction installs a `user_correction`
 * entry for the question. The acknowledgement comes back as soon as the
 * query is known; everything else runs as deferred work.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import type { DeferredTasks } from '../concurrency/DeferredTasks.js';
import { withDeadline } from '../concurrency/deadline.js';
import { KeyedLock } from '../concurrency/KeyedLock.js';
import {
  EmbeddingDimensionError,
  EmbeddingProviderUnavailableError,
  FeedbackForUnknownQueryError,
  ValidationError,
} from '../errors.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IFeedbackRepository } from '../repositories/IFeedbackRepository.js';
import type { IQueryRecordRepository } from '../repositories/IQueryRecordRepository.js';
import type {
  FeedbackAck,
  FeedbackRequest,
  PatternImportItem,
  PatternImportSummary,
  RetrainingSignal,
  TrainingExample,
} from '../types/api.js';
import type {
  ErrorKind,
  FeedbackRecord,
  PatternEntry,
  PatternProvenance,
  QueryRecord,
} from '../types/models.js';
import { canonicalize, type PatternStore } from './PatternStore.js';
import type { PerformanceMonitor } from './PerformanceMonitor.js';
import { queryRecordKey, rowToQueryRecord } from './ResolutionRouter.js';

const VERDICTS = new Set(['positive', 'negative', 'neutral']);
const EXPORT_PAGE_SIZE = 500;

export interface FeedbackLearnerDeps {
  patternStore: PatternStore;
  queryRepo: IQueryRecordRepository;
  feedbackRepo: IFeedbackRepository;
  embeddings: IEmbeddingProvider;
  monitor: PerformanceMonitor;
  deferred: DeferredTasks;
  logger: ILogProvider;
  /** Novel feedback events between retraining signals. */
  retrainingThreshold: number;
  embeddingTimeoutMs: number;
  /** Texts per embedding call in `importPatterns`. */
  importBatchSize: number;
  generateId?: () => string;
}

export class FeedbackLearner {
  private readonly events = new EventEmitter();
  private readonly generateId: () => string;
  // Feedback on one query is applied in arrival order.
  private readonly applyLock = new KeyedLock();
  private novelTotal = 0;
  private novelSinceSignal = 0;

  constructor(private readonly deps: FeedbackLearnerDeps) {
    this.generateId = deps.generateId ?? randomUUID;
  }

  /** Cumulative feedback events that changed a pattern entry. */
  get novelFeedbackTotal(): number {
    return this.novelTotal;
  }

  /** Subscribe to retraining signals. Returns an unsubscribe function. */
  onRetrainingRecommended(listener: (signal: RetrainingSignal) => void): () => void {
    this.events.on('retraining-recommended', listener);
    return () => {
      this.events.off('retraining-recommended', listener);
    };
  }

  async recordFeedback(request: FeedbackRequest): Promise<FeedbackAck> {
    const correction = this.validate(request);
    const { deferred, queryRepo, feedbackRepo } = this.deps;

    // The query record itself may still be in flight.
    await deferred.settled(queryRecordKey(request.queryId));

    const row = await queryRepo.findById(request.queryId);
    if (!row) {
      throw new FeedbackForUnknownQueryError(request.queryId);
    }
    const query = rowToQueryRecord(row);

    const feedback: FeedbackRecord = {
      id: this.generateId(),
      queryId: query.id,
      verdict: request.verdict,
      correction,
      createdAt: new Date(),
    };

    deferred.run(
      'persist feedback',
      () =>
        feedbackRepo.insert({
          id: feedback.id,
          query_id: feedback.queryId,
          verdict: feedback.verdict,
          correction: feedback.correction,
          created_at: feedback.createdAt.toISOString(),
        }),
      feedbackKey(query.id)
    );
    deferred.run(
      'apply feedback',
      () =>
        this.applyLock.run(query.id, async () => {
          // Let the resolution's own pattern proposal land first.
          await deferred.settled(query.id);
          await this.apply(query, feedback);
        }),
      feedbackKey(query.id)
    );

    return { feedbackId: feedback.id, queryId: query.id, verdict: feedback.verdict };
  }

  /**
   * Prompt/completion pairs for fine-tuning: every user correction, plus
   * unflagged entries with at least one recorded success.
   */
  async exportTrainingExamples(): Promise<TrainingExample[]> {
    const examples: TrainingExample[] = [];

    for (let offset = 0; ; offset += EXPORT_PAGE_SIZE) {
      const page = await this.deps.patternStore.list({ limit: EXPORT_PAGE_SIZE, offset });
      for (const entry of page) {
        const trainable =
          entry.provenance === 'user_correction' ||
          (entry.flaggedAt === null && entry.successCount > 0);
        if (trainable) {
          examples.push({
            prompt: entry.question,
            completion: entry.artifact,
            provenance: entry.provenance,
            successCount: entry.successCount,
          });
        }
      }
      if (page.length < EXPORT_PAGE_SIZE) break;
    }

    return examples;
  }

  /**
   * Seed the cache with known question/artifact pairs, one embedding call
   * per batch. Each pair goes through `upsert`, so an `auto` import never
   * overwrites a user correction. Batches already written stay written if a
   * later one fails.
   */
  async importPatterns(
    items: PatternImportItem[],
    provenance: PatternProvenance = 'auto'
  ): Promise<PatternImportSummary> {
    const { patternStore, importBatchSize, logger } = this.deps;
    const pairs = items.map(validateImportItem);
    const summary: PatternImportSummary = { total: pairs.length, inserted: 0, replaced: 0, kept: 0 };

    for (let start = 0; start < pairs.length; start += importBatchSize) {
      const batch = pairs.slice(start, start + importBatchSize);
      const embeddings = await this.embedBatch(batch.map((p) => p.question));

      const wrong = embeddings.find((e) => e.length !== patternStore.dimensions);
      if (wrong) {
        throw new EmbeddingDimensionError(patternStore.dimensions, wrong.length);
      }

      for (const [i, pair] of batch.entries()) {
        const result = await patternStore.upsert({
          question: pair.question,
          artifact: pair.artifact,
          embedding: embeddings[i],
          provenance,
        });
        summary[result.status]++;
      }
    }

    logger.info('Patterns imported', { ...summary, provenance });
    return summary;
  }

  // ── Internals ──

  private validate(request: FeedbackRequest): string | null {
    if (!VERDICTS.has(request.verdict)) {
      throw new ValidationError(`Unknown verdict "${request.verdict}"`);
    }
    if (request.correction === undefined) return null;

    const correction = request.correction.trim();
    if (correction.length === 0) {
      throw new ValidationError('Correction must not be empty');
    }
    if (request.verdict !== 'negative') {
      throw new ValidationError('A correction can only accompany a negative verdict');
    }
    return correction;
  }

  private async apply(query: QueryRecord, feedback: FeedbackRecord): Promise<void> {
    let changed = false;

    switch (feedback.verdict) {
      case 'positive':
        changed = await this.reinforce(query);
        await this.decide(query.id, 'success');
        break;
      case 'negative':
        if (feedback.correction !== null) {
          changed = await this.correct(query, feedback.correction);
          await this.decide(query.id, 'failure', 'user_correction');
        } else {
          changed = await this.penalize(query);
          await this.decide(query.id, 'failure', 'negative_feedback');
        }
        break;
      case 'neutral':
        break;
    }

    if (changed) this.noteNovel();
  }

  private async reinforce(query: QueryRecord): Promise<boolean> {
    const { patternStore } = this.deps;
    const contributing = await this.findContributing(query);
    if (contributing) {
      return (await patternStore.recordSuccess(contributing.id)) !== null;
    }
    if (query.tierUsed === 'cache' || query.artifact.trim() === '') return false;

    const result = await patternStore.upsert({
      question: query.rawText,
      artifact: query.artifact,
      embedding: await this.embed(query.rawText),
      provenance: 'auto',
      successCount: 1,
    });
    return result.status !== 'kept';
  }

  private async penalize(query: QueryRecord): Promise<boolean> {
    const contributing = await this.findContributing(query);
    if (!contributing) return false;
    return (await this.deps.patternStore.recordFailure(contributing.id)) !== null;
  }

  private async correct(query: QueryRecord, correction: string): Promise<boolean> {
    const { patternStore, logger } = this.deps;
    const contributing = await this.findContributing(query);

    const result = await patternStore.upsert({
      question: query.rawText,
      artifact: correction,
      embedding: await this.embed(query.rawText),
      provenance: 'user_correction',
    });
    logger.info('Correction stored', {
      queryId: query.id,
      patternId: result.entry.id,
      status: result.status,
    });

    if (contributing && contributing.canonicalText !== canonicalize(query.rawText)) {
      await patternStore.recordFailure(contributing.id);
    }
    return true;
  }

  private embed(text: string): Promise<number[]> {
    const { embeddings, embeddingTimeoutMs } = this.deps;
    return withDeadline(
      (signal) => embeddings.generate(text, signal),
      embeddingTimeoutMs,
      () => new EmbeddingProviderUnavailableError(`Embedding timed out after ${embeddingTimeoutMs}ms`)
    );
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    const { embeddings, embeddingTimeoutMs } = this.deps;
    const vectors = await withDeadline(
      (signal) => embeddings.generateBatch(texts, signal),
      embeddingTimeoutMs,
      () => new EmbeddingProviderUnavailableError(`Embedding timed out after ${embeddingTimeoutMs}ms`)
    );
    if (vectors.length !== texts.length) {
      throw new EmbeddingProviderUnavailableError(
        `Expected ${texts.length} embeddings, got ${vectors.length}`
      );
    }
    return vectors;
  }

  /**
   * The entry behind a query's artifact: the served entry for cache hits,
   * otherwise the entry for the same question if it holds the same artifact.
   */
  private async findContributing(query: QueryRecord): Promise<PatternEntry | null> {
    const { patternStore } = this.deps;
    if (query.patternId !== null) {
      return patternStore.getById(query.patternId);
    }
    const entry = await patternStore.findByQuestion(query.rawText);
    return entry && entry.artifact === query.artifact ? entry : null;
  }

  private async decide(
    queryId: string,
    outcome: 'success' | 'failure',
    cause?: ErrorKind
  ): Promise<void> {
    const changed = await this.deps.queryRepo.setOutcome(queryId, outcome, cause);
    if (changed) {
      this.deps.monitor.recordOutcome(queryId, outcome, cause);
    }
  }

  private noteNovel(): void {
    const threshold = this.deps.retrainingThreshold;
    this.novelTotal++;
    this.novelSinceSignal++;
    if (this.novelSinceSignal < threshold) return;

    this.novelSinceSignal = 0;
    const signal: RetrainingSignal = {
      novelFeedbackTotal: this.novelTotal,
      threshold,
      emittedAt: new Date(),
    };
    this.deps.logger.info('Retraining recommended', {
      novelFeedbackTotal: signal.novelFeedbackTotal,
      threshold,
    });
    this.events.emit('retraining-recommended', signal);
  }
}

function validateImportItem(item: PatternImportItem, index: number): PatternImportItem {
  const question = item.question.trim();
  const artifact = item.artifact.trim();
  if (question === '' || artifact === '') {
    throw new ValidationError(`Import item ${index} needs a question and an artifact`, { index });
  }
  return { question, artifact };
}

function feedbackKey(queryId: string): string {
  return `feedback:${queryId}`;
}
