/**
 * Per-tier calibration of raw scores into [0,1]:
 * `clamp(scale * raw + offset)`.
 */

import type { EngineConfig, TierCalibration } from '../config.js';
import type { Tier } from '../types/models.js';

export class ConfidenceCalibrator {
  constructor(private readonly calibrations: Record<Tier, TierCalibration>) {}

  static fromConfig(config: EngineConfig): ConfidenceCalibrator {
    return new ConfidenceCalibrator({
      cache: config.cache.calibration,
      specialized: config.specialized.calibration,
      general: config.general.calibration,
    });
  }

  calibrate(tier: Tier, raw: number): number {
    if (!Number.isFinite(raw)) return 0;
    const { scale, offset } = this.calibrations[tier];
    return Math.min(1, Math.max(0, scale * raw + offset));
  }
}
