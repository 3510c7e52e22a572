import { Decoder, Stream } from '@garmin/fitsdk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { decodeFitFile, readFileHeader } from './fit-parser';
import { MalformedHeaderError, TruncatedStreamError, UnsupportedVersionError } from './errors';
import { FIT_EPOCH_MS } from './time-utils';
import { BaseTypes, FitFileBuilder, RECORD_DEFINITION, RECORD_MESSAGE_SIZE, activityFile } from '../test/fit-builder';
import { degreesToSemicircles, semicirclesToDegrees } from '../utils/gps-utils';

const fitTime = (seconds: number) => FIT_EPOCH_MS + seconds * 1000;

describe('decodeFitFile', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('decodes record fields with scale, offset and semicircle conversion', () => {
    const bytes = activityFile([
      { time: 1000, lat: 51.5, lon: -0.12, altitude: 35.2, heartRate: 120, cadence: 85, distance: 0, speed: 5.123, power: 210 },
      { time: 1001, lat: 51.50005, lon: -0.12, altitude: 35.4, heartRate: 121, cadence: 86, distance: 5.12, speed: 5.2, power: 215 },
    ]).build();

    const track = decodeFitFile(bytes);

    expect(track.samples).toHaveLength(2);
    const [first, second] = track.samples;
    expect(first.timestamp).toBe(fitTime(1000));
    expect(first.latitude).toBe(semicirclesToDegrees(degreesToSemicircles(51.5)));
    expect(first.latitude).toBeCloseTo(51.5, 6);
    expect(first.longitude).toBeCloseTo(-0.12, 6);
    expect(first.altitude).toBeCloseTo(35.2, 6);
    expect(first.heartRate).toBe(120);
    expect(first.cadence).toBe(85);
    expect(first.distance).toBe(0);
    expect(first.speed).toBe(5.123);
    expect(first.power).toBe(210);
    expect(second.timestamp).toBe(fitTime(1001));
    expect(second.distance).toBe(5.12);
    expect(track.metadata.warnings).toEqual([]);
  });

  it('fills provenance metadata from the header and file_id message', () => {
    const track = decodeFitFile(activityFile([{ time: 1000, power: 100 }]).build());

    expect(track.metadata).toEqual({
      sourceFormat: 'fit',
      warnings: [],
      device: {
        manufacturer: 1,
        product: 3121,
        serialNumber: 12345,
        timeCreated: fitTime(1000000000),
      },
      protocolVersion: 0x20,
      profileVersion: 2132,
    });
  });

  it('maps invalid sentinels to absent fields instead of zero', () => {
    const track = decodeFitFile(activityFile([{ time: 1000, power: 150 }]).build());

    expect(track.samples[0]).toEqual({ timestamp: fitTime(1000), power: 150 });
    expect('latitude' in track.samples[0]).toBe(false);
  });

  it('prefers enhanced speed and altitude over the 16-bit fields', () => {
    const bytes = new FitFileBuilder()
      .definition(0, 20, [
        { number: 253, size: 4, baseType: BaseTypes.uint32 },
        { number: 73, size: 4, baseType: BaseTypes.uint32 },
        { number: 6, size: 2, baseType: BaseTypes.uint16 },
        { number: 78, size: 4, baseType: BaseTypes.uint32 },
        { number: 2, size: 2, baseType: BaseTypes.uint16 },
      ])
      .message(0, [1000, 4250, 4000, 2612, 2600])
      .build();

    const [sample] = decodeFitFile(bytes).samples;

    expect(sample.speed).toBe(4.25);
    expect(sample.altitude).toBeCloseTo(22.4, 6);
  });

  it('resolves compressed timestamp headers with rollover', () => {
    const bytes = new FitFileBuilder()
      .definition(0, 20, [
        { number: 253, size: 4, baseType: BaseTypes.uint32 },
        { number: 7, size: 2, baseType: BaseTypes.uint16 },
      ])
      .definition(1, 20, [{ number: 7, size: 2, baseType: BaseTypes.uint16 }])
      .message(0, [1000, 100])
      .compressed(1, 10, [110])
      .compressed(1, 3, [120])
      .build();

    const track = decodeFitFile(bytes);

    expect(track.samples.map((sample) => sample.timestamp)).toEqual([fitTime(1000), fitTime(1002), fitTime(1027)]);
    expect(track.samples.map((sample) => sample.power)).toEqual([100, 110, 120]);
  });

  it('honours big-endian definitions', () => {
    const bytes = new FitFileBuilder()
      .definition(0, 20, [
        { number: 253, size: 4, baseType: BaseTypes.uint32 },
        { number: 7, size: 2, baseType: BaseTypes.uint16 },
      ], { bigEndian: true })
      .message(0, [2000, 300])
      .build();

    expect(decodeFitFile(bytes).samples).toEqual([{ timestamp: fitTime(2000), power: 300 }]);
  });

  describe('unknown fields', () => {
    const build = () =>
      new FitFileBuilder()
        .definition(0, 20, [
          { number: 253, size: 4, baseType: BaseTypes.uint32 },
          { number: 7, size: 2, baseType: BaseTypes.uint16 },
          { number: 13, size: 1, baseType: BaseTypes.sint8 },
        ], { developerFields: [{ number: 0, size: 2, developerIndex: 0 }] })
        .message(0, [3000, 200, 25, new Uint8Array([1, 2])])
        .build();

    it('drops them by default', () => {
      expect(decodeFitFile(build()).samples).toEqual([{ timestamp: fitTime(3000), power: 200 }]);
    });

    it('keeps them as opaque bytes when asked to', () => {
      const [sample] = decodeFitFile(build(), { unknownFields: 'retain' }).samples;

      expect(sample.extraFields).toEqual([
        { field: 13, bytes: new Uint8Array([25]) },
        { field: 0, developerIndex: 0, bytes: new Uint8Array([1, 2]) },
      ]);
    });
  });

  it('skips unsupported message types with one warning per type', () => {
    const bytes = activityFile([{ time: 1000, power: 100 }])
      .definition(2, 21, [
        { number: 253, size: 4, baseType: BaseTypes.uint32 },
        { number: 0, size: 1, baseType: BaseTypes.enum },
      ])
      .message(2, [1001, 0])
      .message(2, [1002, 4])
      .build();

    const track = decodeFitFile(bytes);

    expect(track.samples).toHaveLength(1);
    expect(track.metadata.warnings).toEqual(['Skipped 2 message(s) of unsupported type 21']);
  });

  it('keeps the samples before a truncated trailing record and reports a warning', () => {
    const builder = activityFile([
      { time: 1000, power: 100 },
      { time: 1001, power: 110 },
      { time: 1002, power: 120 },
    ]);
    const cutAt = 14 + builder.dataLength + 1;
    const bytes = builder.raw([0x01, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]).build();

    const track = decodeFitFile(bytes);

    expect(track.samples).toHaveLength(3);
    expect(track.metadata.warnings).toEqual([
      `Message 20 at byte ${cutAt} needs ${RECORD_MESSAGE_SIZE} bytes but only 10 remain; kept 3 samples decoded before it`,
    ]);
  });

  it('throws TruncatedStreamError when nothing could be decoded', () => {
    const bytes = new FitFileBuilder()
      .definition(1, 20, RECORD_DEFINITION)
      .raw([0x01, 1, 2, 3])
      .build();

    expect(() => decodeFitFile(bytes)).toThrow(TruncatedStreamError);
  });

  it('stops at a data message with an undefined local type', () => {
    const bytes = activityFile([
      { time: 1000, power: 100 },
      { time: 1001, power: 110 },
    ])
      .raw([0x05, 0, 0])
      .build();

    const track = decodeFitFile(bytes);

    expect(track.samples).toHaveLength(2);
    expect(track.metadata.warnings).toHaveLength(1);
    expect(track.metadata.warnings[0]).toMatch(/undefined local type 5/);
  });

  it('drops records whose timestamp runs backwards', () => {
    const track = decodeFitFile(
      activityFile([
        { time: 1000, power: 100 },
        { time: 990, power: 105 },
        { time: 1001, power: 110 },
      ]).build(),
    );

    expect(track.samples.map((sample) => sample.power)).toEqual([100, 110]);
    expect(track.metadata.warnings).toEqual(['Dropped 1 record(s) whose timestamp moved backwards']);
  });

  it('drops records without any timestamp', () => {
    const bytes = new FitFileBuilder()
      .definition(0, 20, [{ number: 7, size: 2, baseType: BaseTypes.uint16 }])
      .message(0, [150])
      .build();

    const track = decodeFitFile(bytes);

    expect(track.samples).toEqual([]);
    expect(track.metadata.warnings).toEqual(['Dropped 1 record(s) without a timestamp']);
  });

  it('drops records whose timestamp field holds the invalid value', () => {
    const track = decodeFitFile(
      activityFile([
        { time: 1000, power: 100 },
        { time: 0xffffffff, power: 105 },
        { time: 1001, power: 110 },
      ]).build(),
    );

    expect(track.samples.map((sample) => sample.power)).toEqual([100, 110]);
    expect(track.metadata.warnings).toEqual(['Dropped 1 record(s) without a timestamp']);
  });

  it('falls back to the compressed offset when the timestamp field is invalid', () => {
    const bytes = new FitFileBuilder()
      .definition(0, 20, [
        { number: 253, size: 4, baseType: BaseTypes.uint32 },
        { number: 7, size: 2, baseType: BaseTypes.uint16 },
      ])
      .message(0, [1000, 100])
      .compressed(0, 10, [0xffffffff, 110])
      .build();

    expect(decodeFitFile(bytes).samples.map((sample) => sample.timestamp)).toEqual([fitTime(1000), fitTime(1002)]);
  });

  it('reports file CRC problems and trailing bytes as warnings', () => {
    const records = [{ time: 1000, power: 100 }];

    expect(decodeFitFile(activityFile(records).build({ fileCrc: 'bad' })).metadata.warnings[0]).toMatch(
      /^File CRC mismatch/,
    );
    expect(decodeFitFile(activityFile(records).build({ fileCrc: 'omit' })).metadata.warnings).toEqual([
      'File CRC is missing',
    ]);
    expect(decodeFitFile(activityFile(records).build({ trailing: [1, 2, 3] })).metadata.warnings).toEqual([
      'Ignored 3 trailing byte(s) after the file CRC',
    ]);
  });

  it('returns frozen tracks', () => {
    const track = decodeFitFile(activityFile([{ time: 1000, power: 100 }]).build());

    expect(Object.isFrozen(track)).toBe(true);
    expect(Object.isFrozen(track.samples)).toBe(true);
    expect(Object.isFrozen(track.samples[0])).toBe(true);
    expect(Object.isFrozen(track.metadata.warnings)).toBe(true);
  });

  it('accepts an ArrayBuffer', () => {
    const bytes = activityFile([{ time: 1000, power: 100 }]).build();
    const buffer = new ArrayBuffer(bytes.length);
    new Uint8Array(buffer).set(bytes);

    expect(decodeFitFile(buffer).samples).toHaveLength(1);
  });

  it('writes fixtures the reference FIT SDK accepts', () => {
    const bytes = activityFile([
      { time: 1000, lat: 45, lon: 7, power: 100 },
      { time: 1001, lat: 45.0001, lon: 7.0001, power: 110 },
      { time: 1002, lat: 45.0002, lon: 7.0002, power: 120 },
    ]).build();

    const decoder = new Decoder(Stream.fromByteArray(bytes));
    expect(decoder.isFIT()).toBe(true);
    expect(decoder.checkIntegrity()).toBe(true);
    expect(decoder.read().messages.recordMesgs).toHaveLength(3);
  });
});

describe('readFileHeader', () => {
  const valid = () => activityFile([{ time: 1000, power: 100 }]);

  it('reads a 14-byte header', () => {
    const bytes = valid().build();

    expect(readFileHeader(bytes)).toEqual({
      headerSize: 14,
      protocolVersion: 0x20,
      profileVersion: 2132,
      dataSize: bytes.length - 14 - 2,
    });
  });

  it('accepts a 12-byte protocol 1.0 header and a zero header CRC', () => {
    expect(readFileHeader(valid().build({ headerSize: 12, protocolVersion: 0x10 })).headerSize).toBe(12);
    expect(readFileHeader(valid().build({ headerCrc: 'zero' })).headerSize).toBe(14);
  });

  it('rejects buffers too short for a header', () => {
    expect(() => readFileHeader(new Uint8Array(5))).toThrow(MalformedHeaderError);
  });

  it('rejects an invalid header size', () => {
    const bytes = valid().build();
    bytes[0] = 13;

    expect(() => readFileHeader(bytes)).toThrow(MalformedHeaderError);
  });

  it('rejects a missing .FIT marker', () => {
    const bytes = valid().build({ headerSize: 12 });
    bytes[9] = 0x58;

    expect(() => readFileHeader(bytes)).toThrow('Missing .FIT signature');
  });

  it('rejects a header CRC mismatch', () => {
    expect(() => readFileHeader(valid().build({ headerCrc: 'bad' }))).toThrow('Header CRC mismatch');
  });

  it('rejects a declared data size larger than the file', () => {
    expect(() => readFileHeader(valid().build({ dataSizeDelta: 10 }))).toThrow(MalformedHeaderError);
  });

  it('rejects unknown protocol versions', () => {
    expect(() => readFileHeader(valid().build({ protocolVersion: 0x30 }))).toThrow(UnsupportedVersionError);
  });
});
