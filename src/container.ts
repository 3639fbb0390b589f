/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes
 * Supabase repositories and real providers; tests pass in-memory doubles.
 */

import type { EngineConfig } from './config.js';
import type { IPatternRepository } from './repositories/IPatternRepository.js';
import type { IQueryRecordRepository } from './repositories/IQueryRecordRepository.js';
import type { IFeedbackRepository } from './repositories/IFeedbackRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ISpecializedBackend } from './providers/ISpecializedBackend.js';
import type { IGeneralBackend } from './providers/IGeneralBackend.js';
import type { ISchemaContextProvider } from './providers/ISchemaContextProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { RuleTable } from './rules/schema.js';
import type {
  FeedbackAck,
  FeedbackRequest,
  PatternImportItem,
  PatternImportSummary,
  QuerySuggestion,
  ResolveResult,
  SnapshotWindow,
  TrainingExample,
} from './types/api.js';
import type { PatternEntry, PatternProvenance, PerformanceSnapshot } from './types/models.js';
import { DeferredTasks } from './concurrency/DeferredTasks.js';
import { EntityClassifier } from './services/EntityClassifier.js';
import { PatternStore } from './services/PatternStore.js';
import { ConfidenceCalibrator } from './services/ConfidenceCalibrator.js';
import { ArtifactScanner } from './services/ArtifactScanner.js';
import { PromptBuilder } from './services/PromptBuilder.js';
import { ResolutionRouter } from './services/ResolutionRouter.js';
import { FeedbackLearner } from './services/FeedbackLearner.js';
import { PerformanceMonitor } from './services/PerformanceMonitor.js';
import { SuggestionService } from './services/SuggestionService.js';

export interface ContainerDeps {
  config: EngineConfig;
  rules: RuleTable;
  patternRepo: IPatternRepository;
  queryRepo: IQueryRecordRepository;
  feedbackRepo: IFeedbackRepository;
  embeddingProvider: IEmbeddingProvider;
  specializedBackend: ISpecializedBackend;
  generalBackend: IGeneralBackend;
  schemaContext: ISchemaContextProvider;
  logProvider: ILogProvider;
  generateId?: () => string;
}

export interface Container {
  classifier: EntityClassifier;
  patternStore: PatternStore;
  router: ResolutionRouter;
  learner: FeedbackLearner;
  monitor: PerformanceMonitor;
  suggestions: SuggestionService;
  deferred: DeferredTasks;
  logProvider: ILogProvider;

  resolve(query: string): Promise<ResolveResult>;
  recordFeedback(request: FeedbackRequest): Promise<FeedbackAck>;
  getPerformanceSnapshot(window: SnapshotWindow): PerformanceSnapshot;
  suggest(partial: string, limit?: number): Promise<QuerySuggestion[]>;
  exportTrainingExamples(): Promise<TrainingExample[]>;
  importPatterns(
    items: PatternImportItem[],
    provenance?: PatternProvenance
  ): Promise<PatternImportSummary>;
  listFlagged(): Promise<PatternEntry[]>;
  prune(ids: string[], reviewer: string): Promise<string[]>;
  /** Wait for deferred persistence, then flush logs. */
  shutdown(): Promise<void>;
}

export function createContainer(deps: ContainerDeps): Container {
  const { config, logProvider } = deps;

  const deferred = new DeferredTasks(logProvider);
  const classifier = new EntityClassifier(deps.rules);
  const patternStore = new PatternStore(deps.patternRepo, logProvider, {
    dimensions: config.embeddingDimensions,
    lowPerformerFloor: config.patterns.lowPerformerFloor,
    lowPerformerMinUses: config.patterns.lowPerformerMinUses,
  });
  const monitor = new PerformanceMonitor(
    {
      successRateFloor: config.monitor.successRateFloor,
      maxSamples: config.monitor.maxSamples,
    },
    logProvider
  );

  const router = new ResolutionRouter({
    classifier,
    patternStore,
    embeddings: deps.embeddingProvider,
    specialized: deps.specializedBackend,
    general: deps.generalBackend,
    schemaContext: deps.schemaContext,
    calibrator: ConfidenceCalibrator.fromConfig(config),
    scanner: new ArtifactScanner(),
    promptBuilder: new PromptBuilder(config.promptExampleCount),
    queryRepo: deps.queryRepo,
    monitor,
    deferred,
    logger: logProvider,
    config,
    generateId: deps.generateId,
  });

  const learner = new FeedbackLearner({
    patternStore,
    queryRepo: deps.queryRepo,
    feedbackRepo: deps.feedbackRepo,
    embeddings: deps.embeddingProvider,
    monitor,
    deferred,
    logger: logProvider,
    retrainingThreshold: config.feedback.retrainingThreshold,
    embeddingTimeoutMs: config.embeddingTimeoutMs,
    importBatchSize: config.patterns.importBatchSize,
    generateId: deps.generateId,
  });

  const suggestions = new SuggestionService(patternStore);

  return {
    classifier,
    patternStore,
    router,
    learner,
    monitor,
    suggestions,
    deferred,
    logProvider,
    resolve: (query) => router.resolve(query),
    recordFeedback: (request) => learner.recordFeedback(request),
    getPerformanceSnapshot: (window) => monitor.snapshot(window),
    suggest: (partial, limit) => suggestions.suggest(partial, limit),
    exportTrainingExamples: () => learner.exportTrainingExamples(),
    importPatterns: (items, provenance) => learner.importPatterns(items, provenance),
    listFlagged: () => patternStore.listFlagged(),
    prune: (ids, reviewer) => patternStore.prune(ids, reviewer),
    async shutdown() {
      await deferred.drain();
      await logProvider.flush();
    },
  };
}
