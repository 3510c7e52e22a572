// =============================================================================
// GPX EXPORT
// =============================================================================

import { ActivityTrack } from '../types/app-types';
import { NoGeodataError } from '../core/errors';
import { toIsoTimestamp } from '../core/time-utils';
import { hasPosition } from '../utils/gps-utils';

export interface GpxOptions {
  name?: string;
  creator?: string;
}

const DEFAULT_CREATOR = 'activity-engine';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

const COORDINATE_DIGITS = 9;
const ELEVATION_DIGITS = 3;

/**
 * Plain decimal notation (xsd:decimal) with trailing zeros trimmed; never an exponent.
 */
export function formatDecimal(value: number, digits: number): string {
  const fixed = value.toFixed(digits).replace(/\.?0+$/, '');
  return fixed === '-0' ? '0' : fixed;
}

/**
 * Renders the track as a GPX 1.1 document with one trkpt per GPS sample.
 * Samples without a position are left out rather than zero-filled.
 */
export function toGpx(track: ActivityTrack, options: GpxOptions = {}): string {
  const points = track.samples.filter(hasPosition);
  if (points.length === 0) {
    throw new NoGeodataError();
  }

  const creator = escapeXml(options.creator ?? DEFAULT_CREATOR);
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<gpx version="1.1" creator="${creator}" xmlns="http://www.topografix.com/GPX/1/1">`,
    '  <metadata>',
    `    <time>${toIsoTimestamp(points[0].timestamp)}</time>`,
    '  </metadata>',
    '  <trk>',
  ];

  if (options.name) {
    lines.push(`    <name>${escapeXml(options.name)}</name>`);
  }
  lines.push('    <trkseg>');

  for (const point of points) {
    lines.push(
      `      <trkpt lat="${formatDecimal(point.latitude, COORDINATE_DIGITS)}" lon="${formatDecimal(point.longitude, COORDINATE_DIGITS)}">`,
    );
    if (point.altitude !== undefined) {
      lines.push(`        <ele>${formatDecimal(point.altitude, ELEVATION_DIGITS)}</ele>`);
    }
    lines.push(`        <time>${toIsoTimestamp(point.timestamp)}</time>`);
    lines.push('      </trkpt>');
  }

  lines.push('    </trkseg>', '  </trk>', '</gpx>');
  return lines.join('\n') + '\n';
}
