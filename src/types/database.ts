/**
 * Database row types. They mirror the Supabase table schemas in
 * supabase/migrations. Column names use snake_case to match PostgreSQL.
 */

import type {
  Classification,
  EntityMap,
  ErrorKind,
  FeedbackVerdict,
  PatternProvenance,
  QueryOutcome,
  Tier,
} from './models.js';

export interface PatternEntryRow {
  id: string;
  canonical_text: string;
  question: string;
  artifact: string;
  embedding: string; // pgvector serialized
  success_count: number;
  failure_count: number;
  last_used: string;
  provenance: PatternProvenance;
  flagged_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface ScoredPatternEntryRow extends PatternEntryRow {
  similarity: number;
}

export type NewPatternEntryRow = Omit<PatternEntryRow, 'id' | 'created_at' | 'updated_at'>;

export interface QueryRecordRow {
  id: string;
  raw_text: string;
  entities: EntityMap;
  classification: Classification;
  tier_used: Tier;
  artifact: string;
  confidence: number;
  low_confidence: boolean;
  pattern_id: string | null;
  latency_ms: number;
  error_kinds: ErrorKind[];
  outcome: QueryOutcome;
  created_at: string;
}

export interface FeedbackRecordRow {
  id: string;
  query_id: string;
  verdict: FeedbackVerdict;
  correction: string | null;
  created_at: string;
}
