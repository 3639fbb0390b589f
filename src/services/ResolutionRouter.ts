/**
 * Tiered query resolution.
 *
 * Per request: classify, consult the pattern cache, then the specialized
 * backend, then the general backend. The first tier whose calibrated
 * confidence clears its floor wins; otherwise the general tier's answer (or
 * the best artifact still available) comes back flagged low-confidence.
 * Tier failures are absorbed here and recorded as error kinds, so `resolve`
 * never throws. Persistence and pattern growth are deferred.
 */

import { randomUUID } from 'node:crypto';
import type { EngineConfig } from '../config.js';
import type { DeferredTasks } from '../concurrency/DeferredTasks.js';
import { sleep, withDeadline } from '../concurrency/deadline.js';
import {
  BackendTimeoutError,
  EmbeddingDimensionError,
  EmbeddingProviderUnavailableError,
} from '../errors.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { IGeneralBackend } from '../providers/IGeneralBackend.js';
import type { ILogProvider, ResolutionLogEvent } from '../providers/ILogProvider.js';
import type { ISchemaContextProvider, SchemaContext } from '../providers/ISchemaContextProvider.js';
import type { ISpecializedBackend } from '../providers/ISpecializedBackend.js';
import type { IQueryRecordRepository } from '../repositories/IQueryRecordRepository.js';
import type { ResolveResult } from '../types/api.js';
import type { QueryRecordRow } from '../types/database.js';
import type {
  ErrorKind,
  QueryAnalysis,
  QueryRecord,
  ResolutionState,
  ScoredPattern,
  TerminalState,
  Tier,
} from '../types/models.js';
import type { ArtifactScanner } from './ArtifactScanner.js';
import type { ConfidenceCalibrator } from './ConfidenceCalibrator.js';
import type { EntityClassifier } from './EntityClassifier.js';
import type { PatternStore } from './PatternStore.js';
import type { PerformanceMonitor } from './PerformanceMonitor.js';
import type { PromptBuilder } from './PromptBuilder.js';

export interface ResolutionRouterDeps {
  classifier: EntityClassifier;
  patternStore: PatternStore;
  embeddings: IEmbeddingProvider;
  specialized: ISpecializedBackend;
  general: IGeneralBackend;
  schemaContext: ISchemaContextProvider;
  calibrator: ConfidenceCalibrator;
  scanner: ArtifactScanner;
  promptBuilder: PromptBuilder;
  queryRepo: IQueryRecordRepository;
  monitor: PerformanceMonitor;
  deferred: DeferredTasks;
  logger: ILogProvider;
  config: EngineConfig;
  generateId?: () => string;
}

/** Per-request working state. */
interface Attempt {
  queryId: string;
  text: string;
  startedAt: number;
  analysis: QueryAnalysis;
  trace: ResolutionState[];
  errors: ErrorKind[];
  embedding: number[] | null;
  candidates: ScoredPattern[];
  schema: SchemaContext | null | undefined;
  logger: ILogProvider;
}

interface Selection {
  tier: Tier;
  artifact: string;
  confidence: number;
  lowConfidence: boolean;
  patternId: string | null;
}

/** Deferred-task key for the write that makes a query visible to feedback. */
export function queryRecordKey(queryId: string): string {
  return `record:${queryId}`;
}

export function rowToQueryRecord(row: QueryRecordRow): QueryRecord {
  return {
    id: row.id,
    rawText: row.raw_text,
    createdAt: new Date(row.created_at),
    entities: row.entities,
    classification: row.classification,
    tierUsed: row.tier_used,
    artifact: row.artifact,
    confidence: row.confidence,
    lowConfidence: row.low_confidence,
    patternId: row.pattern_id,
    latencyMs: row.latency_ms,
    errorKinds: row.error_kinds,
    outcome: row.outcome,
  };
}

export class ResolutionRouter {
  private readonly generateId: () => string;

  constructor(private readonly deps: ResolutionRouterDeps) {
    this.generateId = deps.generateId ?? randomUUID;
  }

  async resolve(text: string): Promise<ResolveResult> {
    const queryId = this.generateId();
    const attempt: Attempt = {
      queryId,
      text,
      startedAt: Date.now(),
      analysis: this.deps.classifier.analyze(text),
      trace: ['RECEIVED'],
      errors: [],
      embedding: null,
      candidates: [],
      schema: undefined,
      logger: this.deps.logger.child({ queryId }),
    };
    attempt.trace.push('CLASSIFIED');
    if (attempt.analysis.classification.ambiguous) {
      attempt.errors.push('classification_ambiguous');
    }

    const cached = await this.tryCache(attempt);
    attempt.trace.push('CACHE_CHECKED');
    if (cached) return this.finish(attempt, cached);

    let rejectedSpecialized: Selection | null = null;
    if (attempt.analysis.classification.type !== 'unknown') {
      attempt.trace.push('TIER2_ATTEMPTED');
      const specialized = await this.trySpecialized(attempt);
      if (specialized && !specialized.lowConfidence) {
        return this.finish(attempt, specialized);
      }
      rejectedSpecialized = specialized;
    }

    attempt.trace.push('TIER3_ATTEMPTED');
    const general = await this.tryGeneral(attempt);
    if (general) {
      if (general.lowConfidence) attempt.errors.push('no_tier_succeeded');
      return this.finish(attempt, general);
    }

    attempt.errors.push('no_tier_succeeded');
    return this.finish(attempt, this.fallback(attempt, rejectedSpecialized));
  }

  // ── Tiers ──

  private async tryCache(attempt: Attempt): Promise<Selection | null> {
    const { config, patternStore, calibrator } = this.deps;

    attempt.embedding = await this.embed(attempt);
    if (!attempt.embedding) return null;

    try {
      const lookup = await patternStore.thresholdLookup(
        attempt.embedding,
        config.highConfidence,
        config.candidateCount
      );
      attempt.candidates = lookup.candidates;
      if (!lookup.hit) return null;

      return {
        tier: 'cache',
        artifact: lookup.hit.entry.artifact,
        confidence: calibrator.calibrate('cache', lookup.hit.similarity),
        lowConfidence: false,
        patternId: lookup.hit.entry.id,
      };
    } catch (err) {
      attempt.errors.push('pattern_store_unavailable');
      attempt.logger.warn('Pattern store lookup failed, skipping cache tier', {
        error: errorMessage(err),
      });
      return null;
    }
  }

  /**
   * Returns the tier-2 result, flagged low-confidence when it scored below
   * the floor, or null when the backend failed or the artifact was rejected.
   */
  private async trySpecialized(attempt: Attempt): Promise<Selection | null> {
    const { specialized, config, calibrator } = this.deps;
    const schema = (await this.loadSchema(attempt)) ?? { tables: [] };

    try {
      const result = await this.callBackend(
        attempt,
        specialized.name,
        config.specialized.timeoutMs,
        (signal) => specialized.generate(attempt.text, schema, signal)
      );
      if (!this.passesScanner(attempt, result.artifact, 'specialized')) return null;

      const confidence = calibrator.calibrate('specialized', result.confidence);
      const lowConfidence = confidence < config.specialized.floor;
      if (lowConfidence) {
        attempt.logger.debug('Specialized result below floor', {
          confidence,
          floor: config.specialized.floor,
        });
      }
      return {
        tier: 'specialized',
        artifact: result.artifact,
        confidence,
        lowConfidence,
        patternId: null,
      };
    } catch {
      // already recorded in attempt.errors
      return null;
    }
  }

  private async tryGeneral(attempt: Attempt): Promise<Selection | null> {
    const { general, config, calibrator, promptBuilder, classifier } = this.deps;
    const schema = await this.loadSchema(attempt);

    const prompt = promptBuilder.build({
      question: attempt.text,
      analysis: attempt.analysis,
      candidates: attempt.candidates,
      schema,
      rules: classifier.ruleTable,
    });

    try {
      const artifact = await this.callBackend(
        attempt,
        general.name,
        config.general.timeoutMs,
        (signal) => general.generate(prompt, signal)
      );
      if (!this.passesScanner(attempt, artifact, 'general')) return null;

      const confidence = calibrator.calibrate('general', config.general.baseline);
      return {
        tier: 'general',
        artifact,
        confidence,
        lowConfidence: confidence < config.general.floor,
        patternId: null,
      };
    } catch {
      return null;
    }
  }

  /** Best artifact left once the general backend has failed. */
  private fallback(attempt: Attempt, rejectedSpecialized: Selection | null): Selection {
    if (rejectedSpecialized) {
      return { ...rejectedSpecialized, lowConfidence: true };
    }

    const top = attempt.candidates[0];
    if (top) {
      return {
        tier: 'cache',
        artifact: top.entry.artifact,
        confidence: this.deps.calibrator.calibrate('cache', top.similarity),
        lowConfidence: true,
        patternId: top.entry.id,
      };
    }

    return { tier: 'general', artifact: '', confidence: 0, lowConfidence: true, patternId: null };
  }

  // ── Collaborator calls ──

  private async embed(attempt: Attempt): Promise<number[] | null> {
    const { embeddings, config, patternStore } = this.deps;
    try {
      const embedding = await withDeadline(
        (signal) => embeddings.generate(attempt.text, signal),
        config.embeddingTimeoutMs,
        () =>
          new EmbeddingProviderUnavailableError(
            `Embedding timed out after ${config.embeddingTimeoutMs}ms`
          )
      );
      if (embedding.length !== patternStore.dimensions) {
        throw new EmbeddingDimensionError(patternStore.dimensions, embedding.length);
      }
      return embedding;
    } catch (err) {
      attempt.errors.push('embedding_provider_unavailable');
      attempt.logger.warn('Embedding unavailable, skipping cache tier', {
        error: errorMessage(err),
      });
      return null;
    }
  }

  /** Fetched at most once per request; null when the provider fails. */
  private async loadSchema(attempt: Attempt): Promise<SchemaContext | null> {
    if (attempt.schema !== undefined) return attempt.schema;
    try {
      attempt.schema = await this.deps.schemaContext.getSchemaContext();
    } catch (err) {
      attempt.errors.push('schema_context_unavailable');
      attempt.logger.warn('Schema context unavailable', { error: errorMessage(err) });
      attempt.schema = null;
    }
    return attempt.schema;
  }

  /** One retry after a timeout; any other failure escalates at once. */
  private async callBackend<T>(
    attempt: Attempt,
    backend: string,
    timeoutMs: number,
    call: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    for (let tries = 1; ; tries++) {
      try {
        return await withDeadline(call, timeoutMs, () => new BackendTimeoutError(backend, timeoutMs));
      } catch (err) {
        if (err instanceof BackendTimeoutError) {
          attempt.errors.push('backend_timeout');
          if (tries < 2) {
            attempt.logger.warn('Backend timed out, retrying', { backend, timeoutMs });
            await sleep(this.deps.config.retryBackoffMs);
            continue;
          }
        } else {
          attempt.errors.push('backend_error');
        }
        attempt.logger.warn('Backend failed', { backend, error: errorMessage(err) });
        throw err;
      }
    }
  }

  private passesScanner(attempt: Attempt, artifact: string, tier: Tier): boolean {
    if (!this.deps.config.artifactGuard.enabled) return true;
    const scan = this.deps.scanner.scan(artifact);
    if (!scan.flagged) return true;

    attempt.errors.push('artifact_rejected');
    attempt.logger.warn('Artifact rejected', { tier, reasons: scan.reasons });
    return false;
  }

  // ── Completion ──

  private finish(attempt: Attempt, selection: Selection): ResolveResult {
    const { deferred, queryRepo, patternStore, monitor, logger } = this.deps;
    const state: TerminalState = selection.lowConfidence ? 'RESOLVED_LOW_CONFIDENCE' : 'RESOLVED';
    attempt.trace.push(state, 'FEEDBACK_PENDING');

    const latencyMs = Date.now() - attempt.startedAt;
    const createdAt = new Date(attempt.startedAt);
    const { queryId, analysis } = attempt;

    const row: QueryRecordRow = {
      id: queryId,
      raw_text: attempt.text,
      entities: analysis.entities,
      classification: analysis.classification,
      tier_used: selection.tier,
      artifact: selection.artifact,
      confidence: selection.confidence,
      low_confidence: selection.lowConfidence,
      pattern_id: selection.patternId,
      latency_ms: latencyMs,
      error_kinds: [...attempt.errors],
      outcome: 'pending',
      created_at: createdAt.toISOString(),
    };
    deferred.run('persist query record', () => queryRepo.insert(row), queryRecordKey(queryId));

    if (selection.tier === 'cache' && !selection.lowConfidence && selection.patternId) {
      const patternId = selection.patternId;
      deferred.run('touch cached pattern', () => patternStore.touch(patternId), queryId);
    }

    const embedding = attempt.embedding;
    if (selection.tier !== 'cache' && !selection.lowConfidence && embedding) {
      deferred.run(
        'propose pattern',
        () =>
          patternStore.upsert({
            question: attempt.text,
            artifact: selection.artifact,
            embedding,
            provenance: 'auto',
          }),
        queryId
      );
    }

    monitor.record({
      queryId,
      at: createdAt,
      tier: selection.tier,
      latencyMs,
      lowConfidence: selection.lowConfidence,
      errorKinds: attempt.errors,
    });

    const event: ResolutionLogEvent = {
      level: selection.lowConfidence ? 'warn' : 'info',
      message: 'Query resolved',
      queryId,
      tier: selection.tier,
      confidence: selection.confidence,
      lowConfidence: selection.lowConfidence,
      durationMs: latencyMs,
      fields: { state, errors: attempt.errors },
    };
    logger.log(event);

    return {
      queryId,
      artifact: selection.artifact,
      tierUsed: selection.tier,
      confidence: selection.confidence,
      lowConfidence: selection.lowConfidence,
      entities: analysis.entities,
      classification: analysis.classification,
      state,
      trace: [...attempt.trace],
      errors: [...attempt.errors],
      candidates: attempt.candidates.map((c) => ({
        patternId: c.entry.id,
        question: c.entry.question,
        similarity: c.similarity,
      })),
    };
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
