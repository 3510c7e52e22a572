// =============================================================================
// CONSTANTS & CONFIGURATION
// =============================================================================

import { z } from 'zod';
import { AnalyticsConfig } from '../types/app-types';
import { InvalidConfigError } from './errors';

export const STOP_SPEED_THRESHOLD_MPS = 0.75; // m/s threshold for stopped samples
export const MIN_STOP_DURATION_MS = 10 * 1000;
export const RECORDING_GAP_THRESHOLD_MS = 5 * 60 * 1000;
export const ELEVATION_NOISE_THRESHOLD_M = 1;
export const ELEVATION_SMOOTHING_WINDOW = 5;

export const DEFAULT_MAP_SAMPLE_COUNT = 200;
export const DEFAULT_MAP_RENDER_TIMEOUT_MS = 10 * 1000;

export const RAW_COLUMN_NAMES = [
  'timestamp',
  'position_lat',
  'position_long',
  'altitude',
  'distance',
  'speed',
  'power',
  'cadence',
  'heart_rate',
] as const;

export type RawColumnName = (typeof RAW_COLUMN_NAMES)[number];

export const DEFAULT_RAW_COLUMNS: readonly RawColumnName[] = [
  'timestamp',
  'power',
  'distance',
  'speed',
  'altitude',
  'position_lat',
  'position_long',
];

export const DEFAULT_ANALYTICS_CONFIG: Readonly<AnalyticsConfig> = Object.freeze({
  stopSpeedThreshold: STOP_SPEED_THRESHOLD_MPS,
  minStopDuration: MIN_STOP_DURATION_MS,
  recordingGapThreshold: RECORDING_GAP_THRESHOLD_MS,
  elevationNoiseThreshold: ELEVATION_NOISE_THRESHOLD_M,
  elevationSmoothingWindow: ELEVATION_SMOOTHING_WINDOW,
});

const analyticsConfigSchema = z.object({
  stopSpeedThreshold: z.number().finite().nonnegative(),
  minStopDuration: z.number().finite().nonnegative(),
  recordingGapThreshold: z.number().finite().positive(),
  elevationNoiseThreshold: z.number().finite().nonnegative(),
  elevationSmoothingWindow: z
    .number()
    .int()
    .positive()
    .refine((value) => value % 2 === 1, { message: 'Smoothing window must be odd' }),
});

export type AnalyticsConfigOverrides = Partial<AnalyticsConfig>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

/**
 * Merges overrides onto the defaults and validates the result.
 */
export function resolveAnalyticsConfig(overrides: AnalyticsConfigOverrides = {}): Readonly<AnalyticsConfig> {
  const result = analyticsConfigSchema.safeParse({ ...DEFAULT_ANALYTICS_CONFIG, ...overrides });
  if (!result.success) {
    throw new InvalidConfigError(`Invalid analytics configuration: ${describeIssues(result.error)}`, result.error);
  }
  return Object.freeze(result.data);
}

const ENV_KEYS: Record<keyof AnalyticsConfig, string> = {
  stopSpeedThreshold: 'ACTIVITY_STOP_SPEED_MPS',
  minStopDuration: 'ACTIVITY_MIN_STOP_MS',
  recordingGapThreshold: 'ACTIVITY_GAP_THRESHOLD_MS',
  elevationNoiseThreshold: 'ACTIVITY_ELEVATION_NOISE_M',
  elevationSmoothingWindow: 'ACTIVITY_ELEVATION_WINDOW',
};

const envNumber = z.coerce.number().finite();

/**
 * Builds a config from ACTIVITY_* environment variables, falling back to the defaults.
 */
export function loadAnalyticsConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Readonly<AnalyticsConfig> {
  const overrides: AnalyticsConfigOverrides = {};

  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') continue;

    const parsed = envNumber.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidConfigError(`${envKey} must be a number, got "${raw}"`, parsed.error);
    }
    if (isConfigKey(key)) {
      overrides[key] = parsed.data;
    }
  }

  return resolveAnalyticsConfig(overrides);
}

function isConfigKey(key: string): key is keyof AnalyticsConfig {
  return Object.hasOwn(ENV_KEYS, key);
}
