// =============================================================================
// RAW COLUMN EXTRACTION
// =============================================================================

import { encode } from '@msgpack/msgpack';
import { ActivityTrack, Sample } from '../types/app-types';
import { DEFAULT_RAW_COLUMNS, RAW_COLUMN_NAMES, RawColumnName } from '../core/config';

export type ColumnValues = (number | null)[];
export type ColumnSet = Partial<Record<RawColumnName, ColumnValues>>;

const COLUMN_ACCESSORS: Record<RawColumnName, (sample: Readonly<Sample>) => number | undefined> = {
  timestamp: (sample) => sample.timestamp,
  position_lat: (sample) => sample.latitude,
  position_long: (sample) => sample.longitude,
  altitude: (sample) => sample.altitude,
  distance: (sample) => sample.distance,
  speed: (sample) => sample.speed,
  power: (sample) => sample.power,
  cadence: (sample) => sample.cadence,
  heart_rate: (sample) => sample.heartRate,
};

const KNOWN_COLUMNS: ReadonlySet<string> = new Set<string>(RAW_COLUMN_NAMES);

function isRawColumnName(name: string): name is RawColumnName {
  return KNOWN_COLUMNS.has(name);
}

/**
 * Parses a comma separated column list such as "timestamp,power".
 */
export function parseColumnList(columns: string | undefined): string[] {
  if (!columns) return [];
  return columns
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Extracts the requested columns in sample order. Unknown names are dropped and
 * an empty request means DEFAULT_RAW_COLUMNS. A column no sample carries comes
 * back empty; otherwise it has one entry per sample, null where absent.
 */
export function extractColumns(track: ActivityTrack, names: readonly string[]): ColumnSet {
  const requested = names.length === 0 ? DEFAULT_RAW_COLUMNS : names.filter(isRawColumnName);
  const columns: ColumnSet = {};

  for (const name of requested) {
    if (columns[name]) continue;

    const accessor = COLUMN_ACCESSORS[name];
    const values = track.samples.map((sample) => accessor(sample) ?? null);
    columns[name] = values.some((value) => value !== null) ? values : [];
  }

  return columns;
}

/**
 * MessagePack encoding of a column set for transport.
 */
export function encodeColumns(columns: ColumnSet): Uint8Array {
  return encode(columns);
}
