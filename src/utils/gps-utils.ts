// =============================================================================
// GPS UTILITY FUNCTIONS
// =============================================================================

import { Sample } from '../types/app-types';

export const SEMICIRCLES_TO_DEGREES = 180 / Math.pow(2, 31);
export const EARTH_RADIUS_M = 6371008.8;

export type PositionedSample = Readonly<Sample> & { latitude: number; longitude: number };

/**
 * Converts a position from Garmin's semicircle format to decimal degrees
 */
export function semicirclesToDegrees(semicircles: number): number {
  return semicircles * SEMICIRCLES_TO_DEGREES;
}

export function degreesToSemicircles(degrees: number): number {
  return Math.round(degrees / SEMICIRCLES_TO_DEGREES);
}

export function hasPosition(sample: Readonly<Sample>): sample is PositionedSample {
  return sample.latitude !== undefined && sample.longitude !== undefined;
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Great-circle distance in meters between two positions
 */
export function haversineDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.asin(Math.min(1, Math.sqrt(a)));
}
