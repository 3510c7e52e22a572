// =============================================================================
// ACTIVITY ENGINE ENTRY POINT
// =============================================================================
//
// Upload path:  FIT bytes -> decode -> summarize -> encode blob
// Read paths:   blob -> decode track -> GPX / columns / map image

import type { ActivitySummary, ActivityTrack, AnalyticsConfig, DecodeOptions } from './types/app-types';
import { summarize } from './core/analytics';
import { DEFAULT_ANALYTICS_CONFIG } from './core/config';
import { decodeFitFile } from './core/fit-parser';
import { formatDuration } from './core/time-utils';
import { decodeTrack, encodeTrack } from './core/track-codec';
import { ColumnSet, encodeColumns, extractColumns } from './exporters/columns';
import { GpxOptions, toGpx } from './exporters/gpx';
import { MapRenderer, RenderMapOptions, renderActivityMap } from './exporters/map-renderer';
import { createLogger } from './utils/logger';

const log = createLogger('activity-engine');

// =============================================================================
// HIGH-LEVEL ORCHESTRATION FUNCTIONS
// =============================================================================

export interface IngestOptions extends DecodeOptions {
  analytics?: AnalyticsConfig;
}

export interface IngestedActivity {
  track: ActivityTrack;
  summary: ActivitySummary;
  blob: Uint8Array;
}

/**
 * Decodes an uploaded recording, summarizes it and produces the blob to store.
 */
export function ingestActivity(bytes: Uint8Array | ArrayBuffer, options: IngestOptions = {}): IngestedActivity {
  const track = decodeFitFile(bytes, { unknownFields: options.unknownFields });
  const summary = summarize(track, options.analytics ?? DEFAULT_ANALYTICS_CONFIG);
  const blob = encodeTrack(track);

  log.info(
    `Ingested ${summary.sampleCount} samples: ${(summary.totalDistance / 1000).toFixed(2)} km, ` +
      `active ${formatDuration(summary.activeTime)}, +${Math.round(summary.elevationGain)} m`,
  );

  return { track, summary, blob };
}

/**
 * Restores a stored track.
 */
export function loadActivity(blob: Uint8Array): ActivityTrack {
  return decodeTrack(blob);
}

export function activityGpx(blob: Uint8Array, options?: GpxOptions): string {
  return toGpx(loadActivity(blob), options);
}

export function activityColumns(blob: Uint8Array, names: readonly string[] = []): ColumnSet {
  return extractColumns(loadActivity(blob), names);
}

export function activityColumnsPacked(blob: Uint8Array, names: readonly string[] = []): Uint8Array {
  return encodeColumns(activityColumns(blob, names));
}

export function activityMap(blob: Uint8Array, renderer: MapRenderer, options?: RenderMapOptions): Promise<Uint8Array> {
  return renderActivityMap(loadActivity(blob), renderer, options);
}

// =============================================================================
// PUBLIC API
// =============================================================================

export type {
  ActivitySummary,
  ActivityTrack,
  AnalyticsConfig,
  DecodeOptions,
  DeviceInfo,
  DistanceSource,
  ExtraField,
  GeoPoint,
  RecordingGap,
  Sample,
  SourceFormat,
  StopInterval,
  TrackMetadata,
  UnknownFieldPolicy,
} from './types/app-types';
export { decodeFitFile, readFileHeader } from './core/fit-parser';
export type { FitFileHeader } from './core/fit-parser';
export { createTrack } from './core/track';
export { summarize, elevationGain, smoothAltitudes } from './core/analytics';
export { distanceProfile } from './core/distance';
export type { DistanceProfile } from './core/distance';
export { detectStops, findRecordingGaps, sampleSpeeds, stoppedDuration } from './core/stop-detection';
export { decodeTrack, encodeTrack } from './core/track-codec';
export {
  DEFAULT_ANALYTICS_CONFIG,
  DEFAULT_MAP_RENDER_TIMEOUT_MS,
  DEFAULT_MAP_SAMPLE_COUNT,
  DEFAULT_RAW_COLUMNS,
  ELEVATION_NOISE_THRESHOLD_M,
  ELEVATION_SMOOTHING_WINDOW,
  MIN_STOP_DURATION_MS,
  RAW_COLUMN_NAMES,
  RECORDING_GAP_THRESHOLD_MS,
  STOP_SPEED_THRESHOLD_MPS,
  loadAnalyticsConfigFromEnv,
  resolveAnalyticsConfig,
} from './core/config';
export type { AnalyticsConfigOverrides, RawColumnName } from './core/config';
export * from './core/errors';
export { toGpx } from './exporters/gpx';
export type { GpxOptions } from './exporters/gpx';
export { sampleForMap } from './exporters/map-sampler';
export { HttpMapRenderer, renderActivityMap } from './exporters/map-renderer';
export type { HttpMapRendererOptions, MapRenderRequest, MapRenderer, RenderMapOptions } from './exporters/map-renderer';
export { encodeColumns, extractColumns, parseColumnList } from './exporters/columns';
export type { ColumnSet, ColumnValues } from './exporters/columns';
