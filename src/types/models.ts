/**
 * Domain models: core entities as the engine understands them.
 * Decoupled from both the public result shapes and database row shapes.
 */

// ── Classification ──

export type QueryType =
  | 'unknown'
  | 'general'
  | 'analytical'
  | 'hybrid'
  | (string & {});

export type Complexity = 'simple' | 'moderate' | 'complex';

/** Category name → matched terms, in rule-table declaration order. */
export type EntityMap = Record<string, string[]>;

export interface Classification {
  type: QueryType;
  complexity: Complexity;
  /** Backends owning the matched categories, in rule-table order. */
  targetBackends: string[];
  requiresFusion: boolean;
  isAnalytical: boolean;
  isRealTime: boolean;
  /** Ids of domain formulas whose trigger phrase matched. */
  formulaHints: string[];
  requiresFormulaHint: boolean;
  /** Entities matched but no backend owns any of them. */
  ambiguous: boolean;
}

export interface QueryAnalysis {
  entities: EntityMap;
  classification: Classification;
}

// ── Resolution ──

export type Tier = 'cache' | 'specialized' | 'general';

export type QueryOutcome = 'pending' | 'success' | 'failure';

export type ResolutionState =
  | 'RECEIVED'
  | 'CLASSIFIED'
  | 'CACHE_CHECKED'
  | 'TIER2_ATTEMPTED'
  | 'TIER3_ATTEMPTED'
  | 'RESOLVED'
  | 'RESOLVED_LOW_CONFIDENCE'
  | 'FEEDBACK_PENDING';

export type TerminalState = Extract<ResolutionState, 'RESOLVED' | 'RESOLVED_LOW_CONFIDENCE'>;

/** Failure causes tracked by the performance monitor. */
export type ErrorKind =
  | 'classification_ambiguous'
  | 'embedding_provider_unavailable'
  | 'pattern_store_unavailable'
  | 'schema_context_unavailable'
  | 'backend_timeout'
  | 'backend_error'
  | 'artifact_rejected'
  | 'no_tier_succeeded'
  | 'negative_feedback'
  | 'user_correction';

export interface QueryRecord {
  id: string;
  rawText: string;
  createdAt: Date;
  entities: EntityMap;
  classification: Classification;
  tierUsed: Tier;
  artifact: string;
  confidence: number;
  lowConfidence: boolean;
  /** Pattern that served a cache hit; null for backend tiers. */
  patternId: string | null;
  latencyMs: number;
  errorKinds: ErrorKind[];
  outcome: QueryOutcome;
}

// ── Pattern cache ──

export type PatternProvenance = 'auto' | 'user_correction';

export interface PatternEntry {
  id: string;
  canonicalText: string;
  question: string;
  artifact: string;
  embedding: number[];
  successCount: number;
  failureCount: number;
  lastUsed: Date;
  provenance: PatternProvenance;
  flaggedAt: Date | null;
  createdAt: Date;
}

export interface ScoredPattern {
  entry: PatternEntry;
  similarity: number;
}

// ── Feedback ──

export type FeedbackVerdict = 'positive' | 'negative' | 'neutral';

export interface FeedbackRecord {
  id: string;
  queryId: string;
  verdict: FeedbackVerdict;
  correction: string | null;
  createdAt: Date;
}

// ── Monitoring ──

export type HealthStatus = 'healthy' | 'needs_attention';

export interface LatencyPercentiles {
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

export interface PerformanceSnapshot {
  windowStart: Date;
  windowEnd: Date;
  totalQueries: number;
  decidedQueries: number;
  /** successes / decided outcomes; null while nothing is decided. */
  successRate: number | null;
  latency: LatencyPercentiles;
  errorKinds: Partial<Record<ErrorKind, number>>;
  tierUsage: Record<Tier, number>;
  lowConfidenceRate: number;
  health: HealthStatus;
}
