// =============================================================================
// ACTIVITY ANALYTICS
// =============================================================================

import { ActivitySummary, ActivityTrack, AnalyticsConfig } from '../types/app-types';
import { DEFAULT_ANALYTICS_CONFIG } from './config';
import { distanceProfile } from './distance';
import { EmptyTrackError } from './errors';
import { stoppedDuration } from './stop-detection';

/**
 * Centred moving average. The window shrinks symmetrically near the ends so
 * the first and last readings are kept as recorded.
 */
export function smoothAltitudes(altitudes: readonly number[], window: number): number[] {
  const halfWindow = Math.floor(window / 2);

  return altitudes.map((_, index) => {
    const half = Math.min(halfWindow, index, altitudes.length - 1 - index);
    let sum = 0;
    for (let i = index - half; i <= index + half; i++) {
      sum += altitudes[i];
    }
    return sum / (2 * half + 1);
  });
}

/**
 * Sums climbs through a hysteresis filter: the reference follows the terrain
 * down, and a climb only counts once it clears the noise threshold.
 */
export function elevationGain(track: ActivityTrack, config: AnalyticsConfig = DEFAULT_ANALYTICS_CONFIG): number {
  const altitudes = track.samples
    .map((sample) => sample.altitude)
    .filter((altitude): altitude is number => altitude !== undefined);

  if (altitudes.length < 2) return 0;

  const smoothed = smoothAltitudes(altitudes, config.elevationSmoothingWindow);
  let reference = smoothed[0];
  let gain = 0;

  for (const altitude of smoothed.slice(1)) {
    if (altitude < reference) {
      reference = altitude;
    } else if (altitude - reference >= config.elevationNoiseThreshold) {
      gain += altitude - reference;
      reference = altitude;
    }
  }

  return gain;
}

/**
 * Computes the derived summary of a track. Pure: the same track and config
 * always give the same summary.
 */
export function summarize(track: ActivityTrack, config: AnalyticsConfig = DEFAULT_ANALYTICS_CONFIG): ActivitySummary {
  const { samples } = track;
  if (samples.length === 0) {
    throw new EmptyTrackError();
  }

  const first = samples[0];
  const last = samples[samples.length - 1];
  const profile = distanceProfile(track);
  const elapsedTime = last.timestamp - first.timestamp;
  const stoppedTime = Math.min(stoppedDuration(track, config, profile), elapsedTime);

  return Object.freeze({
    startTimestamp: first.timestamp,
    endTimestamp: last.timestamp,
    sampleCount: samples.length,
    totalDistance: profile.cumulative[profile.cumulative.length - 1],
    distanceSource: profile.source,
    distanceIncomplete: profile.incomplete,
    elevationGain: elevationGain(track, config),
    elapsedTime,
    activeTime: elapsedTime - stoppedTime,
    stoppedTime,
  });
}
