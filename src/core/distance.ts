// =============================================================================
// DISTANCE PROFILE
// =============================================================================

import { ActivityTrack, DistanceSource, Sample } from '../types/app-types';
import { PositionedSample, hasPosition, haversineDistance } from '../utils/gps-utils';

export interface DistanceProfile {
  /** Cumulative meters from the first sample, one entry per sample, never decreasing. */
  cumulative: number[];
  /** `segmentKnown[i]` tells whether the step from sample i - 1 to i had usable data; index 0 is always false. */
  segmentKnown: boolean[];
  source: DistanceSource;
  incomplete: boolean;
}

function recordedDistanceIsUsable(samples: readonly Readonly<Sample>[]): boolean {
  let present = 0;
  let previous = -Infinity;

  for (const sample of samples) {
    if (sample.distance === undefined) continue;
    if (sample.distance < previous) return false;
    previous = sample.distance;
    present += 1;
  }

  return present >= 2;
}

function recordedProfile(samples: readonly Readonly<Sample>[]): DistanceProfile {
  const first = samples.find((sample) => sample.distance !== undefined)?.distance ?? 0;
  const cumulative: number[] = [];
  const segmentKnown: boolean[] = [];
  let current = 0;

  samples.forEach((sample, index) => {
    if (sample.distance !== undefined) {
      current = sample.distance - first;
    }
    cumulative.push(current);
    segmentKnown.push(index > 0 && sample.distance !== undefined && samples[index - 1].distance !== undefined);
  });

  return { cumulative, segmentKnown, source: 'recorded', incomplete: false };
}

function derivedProfile(samples: readonly Readonly<Sample>[]): DistanceProfile {
  const cumulative: number[] = [];
  const segmentKnown: boolean[] = [];
  let total = 0;
  let incomplete = false;
  let lastFix: PositionedSample | undefined;
  // True while nothing has been measured since lastFix, so the next fix may bridge the span.
  let bridgeable = false;

  samples.forEach((sample, index) => {
    if (index > 0) {
      const previous = samples[index - 1];
      let step: number | undefined;
      let bridged = false;

      if (hasPosition(previous) && hasPosition(sample)) {
        step = haversineDistance(previous.latitude, previous.longitude, sample.latitude, sample.longitude);
      } else if (
        previous.distance !== undefined &&
        sample.distance !== undefined &&
        sample.distance >= previous.distance
      ) {
        step = sample.distance - previous.distance;
      } else if (hasPosition(sample) && lastFix && bridgeable) {
        step = haversineDistance(lastFix.latitude, lastFix.longitude, sample.latitude, sample.longitude);
        bridged = true;
      }

      if (step === undefined || bridged) {
        incomplete = true;
      }
      if (step !== undefined) {
        total += step;
        if (!bridged) bridgeable = false;
      }
      segmentKnown.push(step !== undefined && !bridged);
    } else {
      segmentKnown.push(false);
    }

    cumulative.push(total);
    if (hasPosition(sample)) {
      lastFix = sample;
      bridgeable = true;
    }
  });

  return { cumulative, segmentKnown, source: 'derived', incomplete };
}

/**
 * Cumulative distance per sample. Recorded distance is used when at least two
 * samples carry it and it never decreases; otherwise each step is derived from
 * GPS fixes, then from a recorded delta. Samples without either are bridged
 * from the last fix to the next one; spans with no fix on one side contribute
 * zero. Bridged and missing spans flag the profile as incomplete.
 */
export function distanceProfile(track: ActivityTrack): DistanceProfile {
  return recordedDistanceIsUsable(track.samples) ? recordedProfile(track.samples) : derivedProfile(track.samples);
}
