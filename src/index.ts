export { createContainer } from './container.js';
export type { Container, ContainerDeps } from './container.js';
export { getProductionContainer } from './container.production.js';
export type { ProductionContainer } from './container.production.js';
export { loadConfig, parseConfig, EngineConfigSchema } from './config.js';
export type { EngineConfig, EngineConfigInput, TierCalibration } from './config.js';
export * from './errors.js';
export { RuleTableSource, parseRuleTable, DEFAULT_RULES_PATH } from './rules/RuleTableSource.js';
export type { RuleTable, RuleTableInput, CategoryRule, FormulaRule } from './rules/schema.js';
export { EntityClassifier } from './services/EntityClassifier.js';
export { PatternStore, canonicalize, successRate } from './services/PatternStore.js';
export type { NewPattern, UpsertResult, UpsertStatus, ThresholdLookup } from './services/PatternStore.js';
export { ResolutionRouter } from './services/ResolutionRouter.js';
export { FeedbackLearner } from './services/FeedbackLearner.js';
export { PerformanceMonitor } from './services/PerformanceMonitor.js';
export { SuggestionService } from './services/SuggestionService.js';
export { ArtifactScanner } from './services/ArtifactScanner.js';
export { ConfidenceCalibrator } from './services/ConfidenceCalibrator.js';
export { PromptBuilder } from './services/PromptBuilder.js';
export * from './providers/index.js';
export type * from './types/api.js';
export type * from './types/models.js';
