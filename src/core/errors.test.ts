import { describe, expect, it } from 'vitest';

import {
  ActivityError,
  CorruptBlobError,
  EmptyTrackError,
  InvalidConfigError,
  MalformedHeaderError,
  MapRenderTimeoutError,
  NoGeodataError,
  UnsupportedVersionError,
  errorStatus,
} from './errors';

describe('errors', () => {
  it('maps each category to a status', () => {
    expect(errorStatus(new MalformedHeaderError('Missing .FIT signature'))).toBe(400);
    expect(errorStatus(new EmptyTrackError())).toBe(404);
    expect(errorStatus(new NoGeodataError())).toBe(404);
    expect(errorStatus(new CorruptBlobError('Blob checksum mismatch'))).toBe(500);
    expect(errorStatus(new InvalidConfigError('bad window'))).toBe(500);
    expect(errorStatus(new MapRenderTimeoutError(100))).toBe(502);
    expect(errorStatus(new Error('boom'))).toBe(500);
    expect(errorStatus('boom')).toBe(500);
  });

  it('describes the protocol version as major.minor', () => {
    const error = new UnsupportedVersionError(0x30);

    expect(error.message).toBe('Unsupported FIT protocol version 3.0');
    expect(error.version).toBe(0x30);
    expect(error.code).toBe('UNSUPPORTED_VERSION');
  });

  it('keeps the error hierarchy and cause', () => {
    const cause = new Error('inflate failed');
    const error = new CorruptBlobError('Blob payload could not be unpacked', cause);

    expect(error).toBeInstanceOf(ActivityError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CorruptBlobError');
    expect(error.cause).toBe(cause);
  });
});
