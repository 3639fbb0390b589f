/**
 * Engine configuration.
 * Every threshold the router, store, learner and monitor use lives here so it
 * can be tuned per deployment. Values come from RESOLVER_* environment
 * variables on top of the schema defaults.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

const CalibrationSchema = z.object({
  scale: z.number().default(1),
  offset: z.number().default(0),
});

const unit = () => z.number().min(0).max(1);
const positiveInt = () => z.number().int().positive();

export const EngineConfigSchema = z.object({
  embeddingDimensions: positiveInt().default(1536),
  embeddingTimeoutMs: positiveInt().default(5_000),
  embeddingCacheSize: z.number().int().min(0).default(1_000),
  /** Minimum cache similarity for a direct hit. */
  highConfidence: unit().default(0.9),
  /** Top-k cache candidates fetched as general-backend context. */
  candidateCount: positiveInt().default(5),
  /** How many candidates the prompt shows as worked examples. */
  promptExampleCount: positiveInt().default(3),
  retryBackoffMs: z.number().int().min(0).default(250),
  cache: z
    .object({ calibration: CalibrationSchema.default({}) })
    .default({}),
  specialized: z
    .object({
      floor: unit().default(0.7),
      timeoutMs: positiveInt().default(20_000),
      calibration: CalibrationSchema.default({}),
    })
    .default({}),
  general: z
    .object({
      floor: unit().default(0.6),
      baseline: unit().default(0.7),
      timeoutMs: positiveInt().default(30_000),
      calibration: CalibrationSchema.default({}),
    })
    .default({}),
  patterns: z
    .object({
      lowPerformerFloor: unit().default(0.5),
      lowPerformerMinUses: positiveInt().default(5),
      /** Texts per embedding call when importing patterns. */
      importBatchSize: positiveInt().default(100),
    })
    .default({}),
  feedback: z
    .object({ retrainingThreshold: positiveInt().default(100) })
    .default({}),
  monitor: z
    .object({
      successRateFloor: unit().default(0.8),
      maxSamples: positiveInt().default(10_000),
    })
    .default({}),
  artifactGuard: z
    .object({ enabled: z.boolean().default(true) })
    .default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type TierCalibration = z.infer<typeof CalibrationSchema>;

export function parseConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid engine configuration', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

type Env = Record<string, string | undefined>;

/** Build configuration from RESOLVER_* variables; unset variables keep defaults. */
export function loadConfig(env: Env = process.env): EngineConfig {
  return parseConfig({
    embeddingDimensions: num(env.RESOLVER_EMBEDDING_DIMENSIONS),
    embeddingTimeoutMs: num(env.RESOLVER_EMBEDDING_TIMEOUT_MS),
    embeddingCacheSize: num(env.RESOLVER_EMBEDDING_CACHE_SIZE),
    highConfidence: num(env.RESOLVER_HIGH_CONFIDENCE),
    candidateCount: num(env.RESOLVER_CANDIDATE_COUNT),
    retryBackoffMs: num(env.RESOLVER_RETRY_BACKOFF_MS),
    specialized: {
      floor: num(env.RESOLVER_SPECIALIZED_FLOOR),
      timeoutMs: num(env.RESOLVER_SPECIALIZED_TIMEOUT_MS),
    },
    general: {
      floor: num(env.RESOLVER_GENERAL_FLOOR),
      baseline: num(env.RESOLVER_GENERAL_BASELINE),
      timeoutMs: num(env.RESOLVER_GENERAL_TIMEOUT_MS),
    },
    patterns: {
      lowPerformerFloor: num(env.RESOLVER_LOW_PERFORMER_FLOOR),
      lowPerformerMinUses: num(env.RESOLVER_LOW_PERFORMER_MIN_USES),
      importBatchSize: num(env.RESOLVER_IMPORT_BATCH_SIZE),
    },
    feedback: {
      retrainingThreshold: num(env.RESOLVER_RETRAINING_THRESHOLD),
    },
    monitor: {
      successRateFloor: num(env.RESOLVER_HEALTH_FLOOR),
      maxSamples: num(env.RESOLVER_MONITOR_MAX_SAMPLES),
    },
    artifactGuard: {
      enabled: env.RESOLVER_ARTIFACT_GUARD === undefined
        ? undefined
        : env.RESOLVER_ARTIFACT_GUARD !== 'false',
    },
  });
}

/** Unset or blank → undefined; anything else → Number (NaN fails validation). */
function num(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}
