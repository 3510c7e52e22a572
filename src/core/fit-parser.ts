// =============================================================================
// FIT FILE PARSING LOGIC
// =============================================================================

import { ActivityTrack, DecodeOptions, DeviceInfo, ExtraField, Sample, UnknownFieldPolicy } from '../types/app-types';
import {
  BaseType,
  COMPRESSED_LOCAL_MESG_MASK,
  COMPRESSED_TIME_MASK,
  FIELD_NUM_TIMESTAMP,
  FILE_ID_FIELDS,
  FIT_CRC_SIZE,
  FIT_HEADER_SIZE_LONG,
  FIT_HEADER_SIZE_SHORT,
  FIT_SIGNATURE,
  LOCAL_MESG_MASK,
  MESG_NUM_FILE_ID,
  MESG_NUM_RECORD,
  RECORD_FIELDS,
  RECORD_HEADER_COMPRESSED,
  RECORD_HEADER_DEFINITION,
  RECORD_HEADER_DEVELOPER,
  SUPPORTED_PROTOCOL_MAJORS,
  SampleField,
  fitCrc,
  readScalar,
  resolveBaseType,
} from './fit-protocol';
import { MalformedHeaderError, TruncatedStreamError, UnsupportedVersionError } from './errors';
import { fitTimestampToMs, resolveCompressedTimestamp } from './time-utils';
import { createTrack } from './track';
import { semicirclesToDegrees } from '../utils/gps-utils';
import { createLogger } from '../utils/logger';

const log = createLogger('fit-parser');

export interface FitFileHeader {
  headerSize: number;
  protocolVersion: number;
  profileVersion: number;
  dataSize: number;
}

interface FieldDefinition {
  number: number;
  size: number;
  baseType: BaseType;
}

interface DeveloperFieldDefinition {
  number: number;
  size: number;
  developerIndex: number;
}

interface MessageDefinition {
  globalMessageNumber: number;
  littleEndian: boolean;
  fields: FieldDefinition[];
  developerFields: DeveloperFieldDefinition[];
  dataSize: number;
}

/**
 * Signals that the decode loop must stop; the reason has already been recorded.
 */
class StopDecoding {}

function toUint8Array(input: Uint8Array | ArrayBuffer): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

/**
 * Validates and reads the FIT file header
 */
export function readFileHeader(bytes: Uint8Array): FitFileHeader {
  if (bytes.length < FIT_HEADER_SIZE_SHORT) {
    throw new MalformedHeaderError(`File is ${bytes.length} bytes, too short for a FIT header`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const headerSize = view.getUint8(0);

  if (headerSize !== FIT_HEADER_SIZE_SHORT && headerSize !== FIT_HEADER_SIZE_LONG) {
    throw new MalformedHeaderError(`Invalid header size ${headerSize}`);
  }
  if (bytes.length < headerSize) {
    throw new MalformedHeaderError(`File is ${bytes.length} bytes, shorter than its ${headerSize}-byte header`);
  }

  const signature = String.fromCharCode(bytes[8], bytes[9], bytes[10], bytes[11]);
  if (signature !== FIT_SIGNATURE) {
    throw new MalformedHeaderError('Missing .FIT signature');
  }

  const protocolVersion = view.getUint8(1);
  if (!SUPPORTED_PROTOCOL_MAJORS.includes(protocolVersion >> 4)) {
    throw new UnsupportedVersionError(protocolVersion);
  }

  if (headerSize === FIT_HEADER_SIZE_LONG) {
    const headerCrc = view.getUint16(12, true);
    if (headerCrc !== 0 && headerCrc !== fitCrc(bytes, 0, 12)) {
      throw new MalformedHeaderError('Header CRC mismatch');
    }
  }

  const dataSize = view.getUint32(4, true);
  if (headerSize + dataSize > bytes.length) {
    throw new MalformedHeaderError(
      `Header declares ${dataSize} data bytes but only ${bytes.length - headerSize} follow the header`,
    );
  }

  return {
    headerSize,
    protocolVersion,
    profileVersion: view.getUint16(2, true),
    dataSize,
  };
}

/**
 * State owned by a single decode call: the local message definition table,
 * the running timestamp for compressed headers and the collected output.
 */
class DecodeSession {
  private readonly view: DataView;
  private readonly definitions = new Map<number, MessageDefinition>();
  private readonly samples: Sample[] = [];
  private readonly warnings: string[] = [];
  private readonly skippedMessages = new Map<number, number>();
  private device: DeviceInfo | undefined;
  private lastFitTimestamp: number | undefined;
  private droppedWithoutTimestamp = 0;
  private droppedOutOfOrder = 0;
  private position: number;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly header: FitFileHeader,
    private readonly unknownFields: UnknownFieldPolicy,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.position = header.headerSize;
  }

  private get dataEnd(): number {
    return this.header.headerSize + this.header.dataSize;
  }

  run(): ActivityTrack {
    this.checkFileCrc();

    try {
      while (this.position < this.dataEnd) {
        this.readRecord();
      }
    } catch (error) {
      if (!(error instanceof StopDecoding)) throw error;
    }

    this.flushCounters();

    if (this.warnings.length > 0) {
      log.warn(`Decoded ${this.samples.length} samples with ${this.warnings.length} warning(s):`, this.warnings);
    } else {
      log.debug(`Decoded ${this.samples.length} samples`);
    }

    return createTrack(this.samples, {
      sourceFormat: 'fit',
      warnings: this.warnings,
      device: this.device,
      protocolVersion: this.header.protocolVersion,
      profileVersion: this.header.profileVersion,
    });
  }

  private checkFileCrc(): void {
    const available = this.bytes.length - this.dataEnd;

    if (available < FIT_CRC_SIZE) {
      this.warnings.push('File CRC is missing');
      return;
    }

    const expected = this.view.getUint16(this.dataEnd, true);
    const actual = fitCrc(this.bytes, 0, this.dataEnd);
    if (expected !== actual) {
      this.warnings.push(`File CRC mismatch (expected 0x${hex(expected)}, computed 0x${hex(actual)})`);
    }
    if (available > FIT_CRC_SIZE) {
      this.warnings.push(`Ignored ${available - FIT_CRC_SIZE} trailing byte(s) after the file CRC`);
    }
  }

  /**
   * Ensures `count` bytes remain in the data region. A cut-off message aborts
   * the whole decode only when nothing has been salvaged yet.
   */
  private require(count: number, what: string): void {
    if (this.position + count <= this.dataEnd) return;

    const message = `${what} at byte ${this.position} needs ${count} bytes but only ${this.dataEnd - this.position} remain`;
    if (this.samples.length === 0) {
      throw new TruncatedStreamError(message, this.position);
    }
    this.warnings.push(`${message}; kept ${this.samples.length} samples decoded before it`);
    throw new StopDecoding();
  }

  private stop(message: string): never {
    this.warnings.push(message);
    throw new StopDecoding();
  }

  private readRecord(): void {
    const recordHeader = this.bytes[this.position];
    const headerOffset = this.position;
    this.position += 1;

    if (recordHeader & RECORD_HEADER_COMPRESSED) {
      const localType = (recordHeader & COMPRESSED_LOCAL_MESG_MASK) >> 5;
      this.readDataMessage(localType, headerOffset, recordHeader & COMPRESSED_TIME_MASK);
      return;
    }

    const localType = recordHeader & LOCAL_MESG_MASK;
    if (recordHeader & RECORD_HEADER_DEFINITION) {
      this.readDefinitionMessage(localType, (recordHeader & RECORD_HEADER_DEVELOPER) !== 0);
    } else {
      this.readDataMessage(localType, headerOffset, undefined);
    }
  }

  private readDefinitionMessage(localType: number, hasDeveloperFields: boolean): void {
    this.require(5, 'Definition message');

    const architecture = this.bytes[this.position + 1];
    if (architecture > 1) {
      return this.stop(`Definition at byte ${this.position} has unknown architecture ${architecture}; stopped decoding`);
    }
    const littleEndian = architecture === 0;
    const globalMessageNumber = this.view.getUint16(this.position + 2, littleEndian);
    const fieldCount = this.bytes[this.position + 4];
    this.position += 5;

    this.require(fieldCount * 3, 'Field definitions');
    const fields: FieldDefinition[] = [];
    for (let i = 0; i < fieldCount; i++) {
      fields.push({
        number: this.bytes[this.position],
        size: this.bytes[this.position + 1],
        baseType: resolveBaseType(this.bytes[this.position + 2]),
      });
      this.position += 3;
    }

    const developerFields: DeveloperFieldDefinition[] = [];
    if (hasDeveloperFields) {
      this.require(1, 'Developer field count');
      const developerCount = this.bytes[this.position];
      this.position += 1;

      this.require(developerCount * 3, 'Developer field definitions');
      for (let i = 0; i < developerCount; i++) {
        developerFields.push({
          number: this.bytes[this.position],
          size: this.bytes[this.position + 1],
          developerIndex: this.bytes[this.position + 2],
        });
        this.position += 3;
      }
    }

    const dataSize =
      fields.reduce((total, field) => total + field.size, 0) +
      developerFields.reduce((total, field) => total + field.size, 0);

    this.definitions.set(localType, { globalMessageNumber, littleEndian, fields, developerFields, dataSize });
  }

  private readDataMessage(localType: number, headerOffset: number, compressedOffset: number | undefined): void {
    const definition = this.definitions.get(localType);
    if (!definition) {
      // Without a layout the message length is unknown, so nothing after it can be framed.
      return this.stop(`Data message at byte ${headerOffset} uses undefined local type ${localType}; stopped decoding`);
    }

    this.require(definition.dataSize, `Message ${definition.globalMessageNumber}`);
    const start = this.position;
    this.position += definition.dataSize;

    let fitTimestamp = this.readTimestampField(definition, start);
    if (fitTimestamp === undefined && compressedOffset !== undefined && this.lastFitTimestamp !== undefined) {
      fitTimestamp = resolveCompressedTimestamp(this.lastFitTimestamp, compressedOffset);
    }
    if (fitTimestamp !== undefined) {
      this.lastFitTimestamp = fitTimestamp;
    }

    switch (definition.globalMessageNumber) {
      case MESG_NUM_RECORD:
        this.addRecord(definition, start, fitTimestamp);
        break;
      case MESG_NUM_FILE_ID:
        this.device = this.readFileId(definition, start);
        break;
      default:
        this.skippedMessages.set(
          definition.globalMessageNumber,
          (this.skippedMessages.get(definition.globalMessageNumber) ?? 0) + 1,
        );
    }
  }

  private readTimestampField(definition: MessageDefinition, start: number): number | undefined {
    let offset = start;
    for (const field of definition.fields) {
      if (field.number === FIELD_NUM_TIMESTAMP && field.size === field.baseType.size) {
        return readScalar(this.view, offset, field.baseType, definition.littleEndian);
      }
      offset += field.size;
    }
    return undefined;
  }

  private addRecord(definition: MessageDefinition, start: number, fitTimestamp: number | undefined): void {
    if (fitTimestamp === undefined) {
      this.droppedWithoutTimestamp += 1;
      return;
    }

    const timestamp = fitTimestampToMs(fitTimestamp);
    const previous = this.samples[this.samples.length - 1];
    if (previous && timestamp < previous.timestamp) {
      this.droppedOutOfOrder += 1;
      return;
    }

    const sample: Sample = { timestamp };
    const priorities: Partial<Record<SampleField, number>> = {};
    const extraFields: ExtraField[] = [];
    let offset = start;

    for (const field of definition.fields) {
      const spec = RECORD_FIELDS.get(field.number);

      if (field.number === FIELD_NUM_TIMESTAMP) {
        offset += field.size;
        continue;
      }

      if (spec && field.size === field.baseType.size && field.baseType.kind !== 'string') {
        const raw = readScalar(this.view, offset, field.baseType, definition.littleEndian);
        const current = priorities[spec.target];
        if (raw !== undefined && (current === undefined || spec.priority > current)) {
          sample[spec.target] = spec.semicircles ? semicirclesToDegrees(raw) : raw / spec.scale - spec.offset;
          priorities[spec.target] = spec.priority;
        }
      } else if (this.unknownFields === 'retain') {
        extraFields.push({ field: field.number, bytes: this.bytes.slice(offset, offset + field.size) });
      }
      offset += field.size;
    }

    for (const field of definition.developerFields) {
      if (this.unknownFields === 'retain') {
        extraFields.push({
          field: field.number,
          developerIndex: field.developerIndex,
          bytes: this.bytes.slice(offset, offset + field.size),
        });
      }
      offset += field.size;
    }

    if (extraFields.length > 0) {
      sample.extraFields = extraFields;
    }
    this.samples.push(sample);
  }

  private readFileId(definition: MessageDefinition, start: number): DeviceInfo {
    const device: DeviceInfo = {};
    let offset = start;

    for (const field of definition.fields) {
      if (field.size === field.baseType.size) {
        const value = readScalar(this.view, offset, field.baseType, definition.littleEndian);
        if (value !== undefined) {
          switch (field.number) {
            case FILE_ID_FIELDS.manufacturer:
              device.manufacturer = value;
              break;
            case FILE_ID_FIELDS.product:
              device.product = value;
              break;
            case FILE_ID_FIELDS.serialNumber:
              device.serialNumber = value;
              break;
            case FILE_ID_FIELDS.timeCreated:
              device.timeCreated = fitTimestampToMs(value);
              break;
          }
        }
      }
      offset += field.size;
    }

    return device;
  }

  private flushCounters(): void {
    if (this.droppedWithoutTimestamp > 0) {
      this.warnings.push(`Dropped ${this.droppedWithoutTimestamp} record(s) without a timestamp`);
    }
    if (this.droppedOutOfOrder > 0) {
      this.warnings.push(`Dropped ${this.droppedOutOfOrder} record(s) whose timestamp moved backwards`);
    }
    for (const [messageNumber, count] of this.skippedMessages) {
      this.warnings.push(`Skipped ${count} message(s) of unsupported type ${messageNumber}`);
    }
  }
}

function hex(value: number): string {
  return value.toString(16).padStart(4, '0');
}

/**
 * Decodes a FIT recording into an immutable activity track.
 * Header problems throw; per-record anomalies become warnings on the track.
 */
export function decodeFitFile(input: Uint8Array | ArrayBuffer, options: DecodeOptions = {}): ActivityTrack {
  const bytes = toUint8Array(input);
  const header = readFileHeader(bytes);
  return new DecodeSession(bytes, header, options.unknownFields ?? 'drop').run();
}
