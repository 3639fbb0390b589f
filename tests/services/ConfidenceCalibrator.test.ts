import { describe, it, expect } from 'vitest';
import { ConfidenceCalibrator } from '../../src/services/ConfidenceCalibrator.js';
import { parseConfig } from '../../src/config.js';

describe('ConfidenceCalibrator', () => {
  const identity = { scale: 1, offset: 0 };

  it('should apply scale and offset per tier', () => {
    const calibrator = new ConfidenceCalibrator({
      cache: identity,
      specialized: { scale: 0.5, offset: 0.1 },
      general: identity,
    });

    expect(calibrator.calibrate('specialized', 0.8)).toBe(0.5);
    expect(calibrator.calibrate('cache', 0.8)).toBe(0.8);
  });

  it('should clamp into [0, 1]', () => {
    const calibrator = new ConfidenceCalibrator({
      cache: { scale: 2, offset: 0 },
      specialized: { scale: 1, offset: -0.5 },
      general: identity,
    });

    expect(calibrator.calibrate('cache', 0.9)).toBe(1);
    expect(calibrator.calibrate('specialized', 0.2)).toBe(0);
  });

  it('should score non-finite raw values as zero', () => {
    const calibrator = ConfidenceCalibrator.fromConfig(parseConfig());

    expect(calibrator.calibrate('general', Number.NaN)).toBe(0);
    expect(calibrator.calibrate('general', Number.POSITIVE_INFINITY)).toBe(0);
  });

  it('should read calibrations from configuration', () => {
    const calibrator = ConfidenceCalibrator.fromConfig(
      parseConfig({ specialized: { calibration: { scale: 2 } } })
    );

    expect(calibrator.calibrate('specialized', 0.4)).toBe(0.8);
    expect(calibrator.calibrate('cache', 0.4)).toBe(0.4);
  });
});
