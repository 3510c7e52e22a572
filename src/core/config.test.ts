import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ANALYTICS_CONFIG,
  ELEVATION_SMOOTHING_WINDOW,
  STOP_SPEED_THRESHOLD_MPS,
  loadAnalyticsConfigFromEnv,
  resolveAnalyticsConfig,
} from './config';
import { InvalidConfigError } from './errors';

describe('resolveAnalyticsConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveAnalyticsConfig()).toEqual({
      stopSpeedThreshold: 0.75,
      minStopDuration: 10_000,
      recordingGapThreshold: 300_000,
      elevationNoiseThreshold: 1,
      elevationSmoothingWindow: 5,
    });
  });

  it('merges overrides onto the defaults', () => {
    const config = resolveAnalyticsConfig({ stopSpeedThreshold: 1.2, elevationSmoothingWindow: 3 });

    expect(config.stopSpeedThreshold).toBe(1.2);
    expect(config.elevationSmoothingWindow).toBe(3);
    expect(config.minStopDuration).toBe(DEFAULT_ANALYTICS_CONFIG.minStopDuration);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('rejects an even smoothing window', () => {
    expect(() => resolveAnalyticsConfig({ elevationSmoothingWindow: 4 })).toThrow(
      'Invalid analytics configuration: elevationSmoothingWindow: Smoothing window must be odd',
    );
  });

  it('rejects negative thresholds', () => {
    expect(() => resolveAnalyticsConfig({ minStopDuration: -1 })).toThrow(InvalidConfigError);
  });

  it('rejects a zero gap threshold', () => {
    expect(() => resolveAnalyticsConfig({ recordingGapThreshold: 0 })).toThrow(InvalidConfigError);
  });
});

describe('loadAnalyticsConfigFromEnv', () => {
  it('falls back to the defaults for unset or blank variables', () => {
    const config = loadAnalyticsConfigFromEnv({ ACTIVITY_STOP_SPEED_MPS: '  ' });

    expect(config.stopSpeedThreshold).toBe(STOP_SPEED_THRESHOLD_MPS);
    expect(config.elevationSmoothingWindow).toBe(ELEVATION_SMOOTHING_WINDOW);
  });

  it('reads numeric overrides', () => {
    const config = loadAnalyticsConfigFromEnv({
      ACTIVITY_STOP_SPEED_MPS: '0.5',
      ACTIVITY_MIN_STOP_MS: '20000',
      ACTIVITY_GAP_THRESHOLD_MS: '60000',
      ACTIVITY_ELEVATION_NOISE_M: '2',
      ACTIVITY_ELEVATION_WINDOW: '7',
    });

    expect(config).toEqual({
      stopSpeedThreshold: 0.5,
      minStopDuration: 20_000,
      recordingGapThreshold: 60_000,
      elevationNoiseThreshold: 2,
      elevationSmoothingWindow: 7,
    });
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadAnalyticsConfigFromEnv({ ACTIVITY_MIN_STOP_MS: 'ten seconds' })).toThrow(
      'ACTIVITY_MIN_STOP_MS must be a number, got "ten seconds"',
    );
  });
});
