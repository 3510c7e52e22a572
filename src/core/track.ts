// =============================================================================
// ACTIVITY TRACK
// =============================================================================

import { ActivityTrack, ExtraField, Sample, TrackMetadata } from '../types/app-types';
import { InvalidTrackError } from './errors';

export const SAMPLE_NUMERIC_FIELDS = [
  'latitude',
  'longitude',
  'altitude',
  'distance',
  'speed',
  'power',
  'cadence',
  'heartRate',
] as const;

export type SampleNumericField = (typeof SAMPLE_NUMERIC_FIELDS)[number];

function freezeSample(sample: Readonly<Sample>): Readonly<Sample> {
  const copy: Sample = { timestamp: sample.timestamp };

  for (const field of SAMPLE_NUMERIC_FIELDS) {
    const value = sample[field];
    if (value !== undefined) {
      copy[field] = value;
    }
  }

  if (sample.extraFields && sample.extraFields.length > 0) {
    // Typed arrays cannot be frozen; the field descriptors and the list can.
    copy.extraFields = Object.freeze(
      sample.extraFields.map((extra): ExtraField => Object.freeze({ ...extra, bytes: Uint8Array.from(extra.bytes) })),
    );
  }

  return Object.freeze(copy);
}

/**
 * Builds an immutable track. Samples must carry finite timestamps in
 * non-decreasing order; the input array is copied, never re-sorted.
 */
export function createTrack(samples: readonly Readonly<Sample>[], metadata: TrackMetadata): ActivityTrack {
  let previous = -Infinity;

  samples.forEach((sample, index) => {
    if (!Number.isFinite(sample.timestamp)) {
      throw new InvalidTrackError(`Sample ${index} has no valid timestamp`);
    }
    if (sample.timestamp < previous) {
      throw new InvalidTrackError(`Sample ${index} is earlier than the sample before it`);
    }
    previous = sample.timestamp;
  });

  const frozenMetadata: TrackMetadata = {
    sourceFormat: metadata.sourceFormat,
    warnings: Object.freeze([...metadata.warnings]),
  };
  if (metadata.device) frozenMetadata.device = Object.freeze({ ...metadata.device });
  if (metadata.protocolVersion !== undefined) frozenMetadata.protocolVersion = metadata.protocolVersion;
  if (metadata.profileVersion !== undefined) frozenMetadata.profileVersion = metadata.profileVersion;

  return Object.freeze({
    samples: Object.freeze(samples.map(freezeSample)),
    metadata: Object.freeze(frozenMetadata),
  });
}
