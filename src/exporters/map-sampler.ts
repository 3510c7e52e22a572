// =============================================================================
// MAP SAMPLING
// =============================================================================

import { ActivityTrack, GeoPoint } from '../types/app-types';
import { NoGeodataError } from '../core/errors';
import { PositionedSample, hasPosition } from '../utils/gps-utils';

function toGeoPoint(sample: PositionedSample): GeoPoint {
  const point: GeoPoint = { latitude: sample.latitude, longitude: sample.longitude };
  if (sample.altitude !== undefined) point.altitude = sample.altitude;
  return point;
}

/**
 * Picks `targetCount` GPS points at a uniform stride, always keeping the first
 * and last fix. Returns every GPS point when fewer are available.
 */
export function sampleForMap(track: ActivityTrack, targetCount: number): GeoPoint[] {
  if (!Number.isInteger(targetCount) || targetCount < 1) {
    throw new RangeError(`targetCount must be a positive integer, got ${targetCount}`);
  }

  const positioned = track.samples.filter(hasPosition);
  if (positioned.length === 0) {
    throw new NoGeodataError();
  }

  if (targetCount >= positioned.length) {
    return positioned.map(toGeoPoint);
  }
  if (targetCount === 1) {
    return [toGeoPoint(positioned[0])];
  }

  const stride = (positioned.length - 1) / (targetCount - 1);
  const points: GeoPoint[] = [];
  for (let i = 0; i < targetCount; i++) {
    points.push(toGeoPoint(positioned[Math.round(i * stride)]));
  }
  return points;
}
