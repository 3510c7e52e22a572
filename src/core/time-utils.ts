// =============================================================================
// TIME UTILITY FUNCTIONS
// =============================================================================

/**
 * FIT date_time values count seconds from 1989-12-31T00:00:00Z.
 */
export const FIT_EPOCH_MS = Date.UTC(1989, 11, 31, 0, 0, 0);

export function fitTimestampToMs(fitSeconds: number): number {
  return FIT_EPOCH_MS + fitSeconds * 1000;
}

/**
 * Resolves a 5-bit compressed timestamp offset against the last full timestamp,
 * handling the 32-second rollover.
 */
export function resolveCompressedTimestamp(lastFitTimestamp: number, timeOffset: number): number {
  const lastOffset = lastFitTimestamp & 0x1f;
  const base = lastFitTimestamp - lastOffset;
  return timeOffset >= lastOffset ? base + timeOffset : base + timeOffset + 0x20;
}

export function toIsoTimestamp(ms: number): string {
  return new Date(ms).toISOString().replace('.000Z', 'Z');
}

/**
 * Formats a duration in milliseconds to a human-readable string
 */
export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.round(durationMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (totalSeconds >= 3600) {
    return `${hours}h ${minutes}m ${seconds}s`;
  } else {
    return `${minutes}m ${seconds}s`;
  }
}
