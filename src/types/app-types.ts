// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/**
 * An unrecognised record field or developer field kept as raw bytes.
 * `developerIndex` is set for developer fields only.
 */
export interface ExtraField {
  field: number;
  developerIndex?: number;
  bytes: Uint8Array;
}

/**
 * One time-series observation. Timestamps are milliseconds since the Unix epoch.
 */
export interface Sample {
  timestamp: number;
  latitude?: number;
  longitude?: number;
  altitude?: number;   // meters
  distance?: number;   // cumulative meters
  speed?: number;      // m/s
  power?: number;      // watts
  cadence?: number;    // rpm
  heartRate?: number;  // bpm
  extraFields?: readonly ExtraField[];
}

export type SourceFormat = 'fit' | 'synthetic';

export interface DeviceInfo {
  manufacturer?: number;
  product?: number;
  serialNumber?: number;
  timeCreated?: number;
}

export interface TrackMetadata {
  sourceFormat: SourceFormat;
  warnings: readonly string[];
  device?: Readonly<DeviceInfo>;
  protocolVersion?: number;
  profileVersion?: number;
}

/**
 * Immutable, chronologically ordered collection of samples for one recorded session.
 * Only `createTrack` builds these.
 */
export interface ActivityTrack {
  readonly samples: readonly Readonly<Sample>[];
  readonly metadata: Readonly<TrackMetadata>;
}

export type DistanceSource = 'recorded' | 'derived';

export interface ActivitySummary {
  startTimestamp: number;
  endTimestamp: number;
  sampleCount: number;
  totalDistance: number;
  distanceSource: DistanceSource;
  distanceIncomplete: boolean;
  elevationGain: number;
  elapsedTime: number;
  activeTime: number;
  stoppedTime: number;
}

export interface GeoPoint {
  latitude: number;
  longitude: number;
  altitude?: number;
}

export interface RecordingGap {
  startTime: number;
  endTime: number;
  gapDuration: number;
  startDistance: number;
  endDistance: number;
  startGpsPoint: [number, number] | null;
  endGpsPoint: [number, number] | null;
}

export interface StopInterval {
  kind: 'stop' | 'gap';
  startTime: number;
  endTime: number;
  duration: number;
  sampleCount: number;
  startDistance: number;
  endDistance: number;
}

export interface AnalyticsConfig {
  stopSpeedThreshold: number;     // m/s, samples at or below count as stopped
  minStopDuration: number;        // ms
  recordingGapThreshold: number;  // ms
  elevationNoiseThreshold: number; // meters
  elevationSmoothingWindow: number; // samples, odd
}

export type UnknownFieldPolicy = 'drop' | 'retain';

export interface DecodeOptions {
  unknownFields?: UnknownFieldPolicy;
}
