/**
 * Public request/result shapes exposed by the engine.
 * Decoupled from domain models so callers can evolve independently.
 */

import type {
  Classification,
  EntityMap,
  ErrorKind,
  FeedbackVerdict,
  PatternProvenance,
  ResolutionState,
  TerminalState,
  Tier,
} from './models.js';

// ── Requests ──

export interface FeedbackRequest {
  queryId: string;
  verdict: FeedbackVerdict;
  correction?: string;
}

/** A known question and the artifact that answers it. */
export interface PatternImportItem {
  question: string;
  artifact: string;
}

/** Either explicit bounds or a trailing duration ending now. */
export type SnapshotWindow =
  | { from: Date; to: Date }
  | { lastMs: number };

// ── Responses ──

export interface CandidateSummary {
  patternId: string;
  question: string;
  similarity: number;
}

export interface ResolveResult {
  queryId: string;
  artifact: string;
  tierUsed: Tier;
  confidence: number;
  lowConfidence: boolean;
  entities: EntityMap;
  classification: Classification;
  state: TerminalState;
  /** Visited states, RECEIVED through FEEDBACK_PENDING. */
  trace: ResolutionState[];
  errors: ErrorKind[];
  /** Closest cached questions, including those below the hit threshold. */
  candidates: CandidateSummary[];
}

export interface FeedbackAck {
  feedbackId: string;
  queryId: string;
  verdict: FeedbackVerdict;
}

export interface RetrainingSignal {
  novelFeedbackTotal: number;
  threshold: number;
  emittedAt: Date;
}

export interface TrainingExample {
  prompt: string;
  completion: string;
  provenance: PatternProvenance;
  successCount: number;
}

/** Upsert outcomes of a bulk import, by status. */
export interface PatternImportSummary {
  total: number;
  inserted: number;
  replaced: number;
  kept: number;
}

export interface QuerySuggestion {
  question: string;
  successRate: number;
  uses: number;
}
