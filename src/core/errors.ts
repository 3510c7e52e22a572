// =============================================================================
// ERROR TAXONOMY
// =============================================================================

/**
 * decode      - the uploaded file is rejected (4xx)
 * unavailable - valid data, but not enough of it for the requested view (404)
 * integrity   - stored blob is corrupt or from an unknown codec version (500)
 * config      - invalid threshold overrides
 * render      - the external map renderer failed or timed out
 */
export type ErrorCategory = 'decode' | 'unavailable' | 'integrity' | 'config' | 'render';

export class ActivityError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;

  constructor(message: string, options: { code: string; category: ErrorCategory; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ActivityError';
    this.code = options.code;
    this.category = options.category;
  }
}

export class MalformedHeaderError extends ActivityError {
  constructor(message: string) {
    super(message, { code: 'MALFORMED_HEADER', category: 'decode' });
    this.name = 'MalformedHeaderError';
  }
}

export class UnsupportedVersionError extends ActivityError {
  public readonly version: number;

  constructor(version: number) {
    super(`Unsupported FIT protocol version ${version >> 4}.${version & 0x0f}`, {
      code: 'UNSUPPORTED_VERSION',
      category: 'decode',
    });
    this.name = 'UnsupportedVersionError';
    this.version = version;
  }
}

export class TruncatedStreamError extends ActivityError {
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super(message, { code: 'TRUNCATED_STREAM', category: 'decode' });
    this.name = 'TruncatedStreamError';
    this.offset = offset;
  }
}

export class EmptyTrackError extends ActivityError {
  constructor() {
    super('Track contains no samples', { code: 'EMPTY_TRACK', category: 'unavailable' });
    this.name = 'EmptyTrackError';
  }
}

export class NoGeodataError extends ActivityError {
  constructor() {
    super('GPS data not available', { code: 'NO_GEODATA', category: 'unavailable' });
    this.name = 'NoGeodataError';
  }
}

export class CorruptBlobError extends ActivityError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'CORRUPT_BLOB', category: 'integrity', cause });
    this.name = 'CorruptBlobError';
  }
}

export class InvalidTrackError extends ActivityError {
  constructor(message: string) {
    super(message, { code: 'INVALID_TRACK', category: 'decode' });
    this.name = 'InvalidTrackError';
  }
}

export class InvalidConfigError extends ActivityError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'INVALID_CONFIG', category: 'config', cause });
    this.name = 'InvalidConfigError';
  }
}

export class MapRenderError extends ActivityError {
  public readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { code: 'MAP_RENDER_FAILED', category: 'render', cause: options?.cause });
    this.name = 'MapRenderError';
    this.status = options?.status;
  }
}

export class MapRenderTimeoutError extends ActivityError {
  constructor(timeoutMs: number) {
    super(`Map rendering timed out after ${timeoutMs}ms`, { code: 'MAP_RENDER_TIMEOUT', category: 'render' });
    this.name = 'MapRenderTimeoutError';
  }
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  decode: 400,
  unavailable: 404,
  integrity: 500,
  config: 500,
  render: 502,
};

/**
 * HTTP-equivalent status for an error raised by the engine. Anything else is a 500.
 */
export function errorStatus(error: unknown): number {
  if (error instanceof ActivityError) {
    return STATUS_BY_CATEGORY[error.category];
  }
  return 500;
}
