// =============================================================================
// TRACK PERSISTENCE CODEC
// =============================================================================
//
// Storage format for tracks, independent of the FIT grammar:
//
//   0   "ATRK"                 magic
//   4   u8                     codec version
//   5   u8                     flags (bit 0: payload is deflated)
//   6   u32 LE                 sample count
//   10  u32 LE                 payload length
//   14  payload                MessagePack, see BlobPayload
//   ..  8 bytes                SHA-256 prefix of everything before it
//
// Numeric columns are stored as a presence bitmap plus little-endian float64
// values for the present entries, so every value survives bit-for-bit.

import { createHash } from 'node:crypto';
import { deflateRawSync, inflateRawSync } from 'node:zlib';
import { decode as unpack, encode as pack } from '@msgpack/msgpack';
import { z } from 'zod';
import { ActivityTrack, ExtraField, Sample, TrackMetadata } from '../types/app-types';
import { CorruptBlobError } from './errors';
import { SAMPLE_NUMERIC_FIELDS, SampleNumericField, createTrack } from './track';
import { createLogger } from '../utils/logger';

const log = createLogger('track-codec');

export const BLOB_MAGIC = 'ATRK';
export const BLOB_VERSION = 1;
const FLAG_DEFLATED = 0x01;
const HEADER_SIZE = 14;
const CHECKSUM_SIZE = 8;
const FLOAT64_SIZE = 8;

const bytesSchema = z.instanceof(Uint8Array);

const columnSchema = z.object({
  present: bytesSchema,
  values: bytesSchema,
});

const payloadSchema = z.object({
  meta: z.object({
    sourceFormat: z.enum(['fit', 'synthetic']),
    warnings: z.array(z.string()),
    device: z
      .object({
        manufacturer: z.number().optional(),
        product: z.number().optional(),
        serialNumber: z.number().optional(),
        timeCreated: z.number().optional(),
      })
      .optional(),
    protocolVersion: z.number().optional(),
    profileVersion: z.number().optional(),
  }),
  timestamps: bytesSchema,
  columns: z.record(z.string(), columnSchema),
  // [sample index, field number, developer data index or -1, raw bytes]
  extras: z.array(z.tuple([z.number().int().nonnegative(), z.number().int(), z.number().int(), bytesSchema])),
});

type BlobPayload = z.infer<typeof payloadSchema>;
type ExtraEntry = BlobPayload['extras'][number];

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function packFloat64(values: readonly number[]): Uint8Array {
  const bytes = new Uint8Array(values.length * FLOAT64_SIZE);
  const view = viewOf(bytes);
  values.forEach((value, index) => view.setFloat64(index * FLOAT64_SIZE, value, true));
  return bytes;
}

function unpackFloat64(bytes: Uint8Array): number[] {
  const view = viewOf(bytes);
  const values: number[] = [];
  for (let offset = 0; offset < bytes.byteLength; offset += FLOAT64_SIZE) {
    values.push(view.getFloat64(offset, true));
  }
  return values;
}

function checksum(bytes: Uint8Array): Uint8Array {
  return createHash('sha256').update(bytes).digest().subarray(0, CHECKSUM_SIZE);
}

function encodeMetadata(metadata: Readonly<TrackMetadata>): BlobPayload['meta'] {
  const meta: BlobPayload['meta'] = {
    sourceFormat: metadata.sourceFormat,
    warnings: [...metadata.warnings],
  };
  if (metadata.device) meta.device = { ...metadata.device };
  if (metadata.protocolVersion !== undefined) meta.protocolVersion = metadata.protocolVersion;
  if (metadata.profileVersion !== undefined) meta.profileVersion = metadata.profileVersion;
  return meta;
}

function encodeColumn(samples: readonly Readonly<Sample>[], field: SampleNumericField) {
  const present = new Uint8Array(Math.ceil(samples.length / 8));
  const values: number[] = [];

  samples.forEach((sample, index) => {
    const value = sample[field];
    if (value !== undefined) {
      present[index >> 3] |= 1 << (index & 7);
      values.push(value);
    }
  });

  return values.length > 0 ? { present, values: packFloat64(values) } : undefined;
}

/**
 * Serializes a track into an opaque, checksummed blob.
 */
export function encodeTrack(track: ActivityTrack): Uint8Array {
  const { samples } = track;
  const columns: BlobPayload['columns'] = {};

  for (const field of SAMPLE_NUMERIC_FIELDS) {
    const column = encodeColumn(samples, field);
    if (column) columns[field] = column;
  }

  const extras: ExtraEntry[] = [];
  samples.forEach((sample, index) => {
    for (const extra of sample.extraFields ?? []) {
      extras.push([index, extra.field, extra.developerIndex ?? -1, extra.bytes]);
    }
  });

  const payload: BlobPayload = {
    meta: encodeMetadata(track.metadata),
    timestamps: packFloat64(samples.map((sample) => sample.timestamp)),
    columns,
    extras,
  };
  const body = deflateRawSync(pack(payload, { ignoreUndefined: true }));

  const blob = new Uint8Array(HEADER_SIZE + body.length + CHECKSUM_SIZE);
  const view = viewOf(blob);
  blob.set(new TextEncoder().encode(BLOB_MAGIC), 0);
  view.setUint8(4, BLOB_VERSION);
  view.setUint8(5, FLAG_DEFLATED);
  view.setUint32(6, samples.length, true);
  view.setUint32(10, body.length, true);
  blob.set(body, HEADER_SIZE);
  blob.set(checksum(blob.subarray(0, HEADER_SIZE + body.length)), HEADER_SIZE + body.length);

  return blob;
}

function corrupt(message: string, cause?: unknown): CorruptBlobError {
  const error = new CorruptBlobError(message, cause);
  log.error(message, cause ?? '');
  return error;
}

function readPayload(blob: Uint8Array): { payload: BlobPayload; sampleCount: number } {
  if (blob.length < HEADER_SIZE + CHECKSUM_SIZE) {
    throw corrupt(`Blob is ${blob.length} bytes, too short to hold a track`);
  }

  const view = viewOf(blob);
  const magic = new TextDecoder().decode(blob.subarray(0, 4));
  if (magic !== BLOB_MAGIC) {
    throw corrupt('Blob does not start with the track magic');
  }

  const version = view.getUint8(4);
  if (version !== BLOB_VERSION) {
    throw corrupt(`Unsupported blob version ${version}`);
  }

  const flags = view.getUint8(5);
  const sampleCount = view.getUint32(6, true);
  const payloadLength = view.getUint32(10, true);
  if (HEADER_SIZE + payloadLength + CHECKSUM_SIZE !== blob.length) {
    throw corrupt(`Blob length ${blob.length} does not match its declared payload of ${payloadLength} bytes`);
  }

  const bodyEnd = HEADER_SIZE + payloadLength;
  const expected = checksum(blob.subarray(0, bodyEnd));
  const actual = blob.subarray(bodyEnd);
  if (!expected.every((byte, index) => byte === actual[index])) {
    throw corrupt('Blob checksum mismatch');
  }

  let decoded: unknown;
  try {
    const body = blob.subarray(HEADER_SIZE, bodyEnd);
    decoded = unpack(flags & FLAG_DEFLATED ? inflateRawSync(body) : body);
  } catch (error) {
    throw corrupt('Blob payload could not be unpacked', error);
  }

  const parsed = payloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw corrupt('Blob payload has an unexpected shape', parsed.error);
  }

  return { payload: parsed.data, sampleCount };
}

function popCount(bitmap: Uint8Array, length: number): number {
  let count = 0;
  for (let i = 0; i < length; i++) {
    if (bitmap[i >> 3] & (1 << (i & 7))) count += 1;
  }
  return count;
}

/**
 * Restores a track from a blob produced by `encodeTrack`.
 */
export function decodeTrack(blob: Uint8Array): ActivityTrack {
  const { payload, sampleCount } = readPayload(blob);

  if (payload.timestamps.byteLength !== sampleCount * FLOAT64_SIZE) {
    throw corrupt(`Timestamp column does not hold ${sampleCount} samples`);
  }
  const samples: Sample[] = unpackFloat64(payload.timestamps).map((timestamp) => ({ timestamp }));

  for (const field of SAMPLE_NUMERIC_FIELDS) {
    const column = payload.columns[field];
    if (!column) continue;

    if (column.present.byteLength !== Math.ceil(sampleCount / 8)) {
      throw corrupt(`Presence bitmap of ${field} has the wrong length`);
    }
    if (column.values.byteLength !== popCount(column.present, sampleCount) * FLOAT64_SIZE) {
      throw corrupt(`Column ${field} does not match its presence bitmap`);
    }

    const values = unpackFloat64(column.values);
    let next = 0;
    samples.forEach((sample, index) => {
      if (column.present[index >> 3] & (1 << (index & 7))) {
        sample[field] = values[next];
        next += 1;
      }
    });
  }

  for (const [index, field, developerIndex, bytes] of payload.extras) {
    const sample = samples[index];
    if (!sample) {
      throw corrupt(`Extra field refers to missing sample ${index}`);
    }
    const extra: ExtraField = developerIndex >= 0 ? { field, developerIndex, bytes } : { field, bytes };
    sample.extraFields = [...(sample.extraFields ?? []), extra];
  }

  try {
    return createTrack(samples, payload.meta);
  } catch (error) {
    throw corrupt('Blob holds samples that do not form a valid track', error);
  }
}
