// =============================================================================
// FIT PROTOCOL TABLES
// =============================================================================
//
// Fixed decode tables for the FIT binary format: base types with their invalid
// sentinels, the record message field map and the CRC-16 used by file headers
// and trailers. All values are little-endian unless a definition message
// declares big-endian architecture.

export const FIT_SIGNATURE = '.FIT';
export const FIT_HEADER_SIZE_SHORT = 12;
export const FIT_HEADER_SIZE_LONG = 14;
export const FIT_CRC_SIZE = 2;
export const SUPPORTED_PROTOCOL_MAJORS: readonly number[] = [1, 2];

export const MESG_NUM_FILE_ID = 0;
export const MESG_NUM_RECORD = 20;
export const FIELD_NUM_TIMESTAMP = 253;

export const RECORD_HEADER_COMPRESSED = 0x80;
export const RECORD_HEADER_DEFINITION = 0x40;
export const RECORD_HEADER_DEVELOPER = 0x20;
export const LOCAL_MESG_MASK = 0x0f;
export const COMPRESSED_LOCAL_MESG_MASK = 0x60;
export const COMPRESSED_TIME_MASK = 0x1f;

export type BaseTypeKind =
  | 'enum'
  | 'sint8'
  | 'uint8'
  | 'sint16'
  | 'uint16'
  | 'sint32'
  | 'uint32'
  | 'string'
  | 'float32'
  | 'float64'
  | 'uint8z'
  | 'uint16z'
  | 'uint32z'
  | 'byte'
  | 'sint64'
  | 'uint64'
  | 'uint64z';

export interface BaseType {
  kind: BaseTypeKind;
  size: number;
}

const BASE_TYPES: readonly BaseType[] = [
  { kind: 'enum', size: 1 },
  { kind: 'sint8', size: 1 },
  { kind: 'uint8', size: 1 },
  { kind: 'sint16', size: 2 },
  { kind: 'uint16', size: 2 },
  { kind: 'sint32', size: 4 },
  { kind: 'uint32', size: 4 },
  { kind: 'string', size: 1 },
  { kind: 'float32', size: 4 },
  { kind: 'float64', size: 8 },
  { kind: 'uint8z', size: 1 },
  { kind: 'uint16z', size: 2 },
  { kind: 'uint32z', size: 4 },
  { kind: 'byte', size: 1 },
  { kind: 'sint64', size: 8 },
  { kind: 'uint64', size: 8 },
  { kind: 'uint64z', size: 8 },
];

const BYTE_TYPE: BaseType = { kind: 'byte', size: 1 };

/**
 * Resolves a definition's base type byte. Bit 7 is the endian-ability flag and
 * is ignored; unknown type numbers fall back to raw bytes.
 */
export function resolveBaseType(baseTypeByte: number): BaseType {
  return BASE_TYPES[baseTypeByte & 0x1f] ?? BYTE_TYPE;
}

/**
 * Reads one value of the given base type. Returns undefined when the bytes hold
 * the type's invalid sentinel, so "absent" never turns into zero.
 */
export function readScalar(view: DataView, offset: number, type: BaseType, littleEndian: boolean): number | undefined {
  switch (type.kind) {
    case 'enum':
    case 'uint8':
    case 'byte': {
      const value = view.getUint8(offset);
      return value === 0xff ? undefined : value;
    }
    case 'uint8z': {
      const value = view.getUint8(offset);
      return value === 0 ? undefined : value;
    }
    case 'sint8': {
      const value = view.getInt8(offset);
      return value === 0x7f ? undefined : value;
    }
    case 'sint16': {
      const value = view.getInt16(offset, littleEndian);
      return value === 0x7fff ? undefined : value;
    }
    case 'uint16': {
      const value = view.getUint16(offset, littleEndian);
      return value === 0xffff ? undefined : value;
    }
    case 'uint16z': {
      const value = view.getUint16(offset, littleEndian);
      return value === 0 ? undefined : value;
    }
    case 'sint32': {
      const value = view.getInt32(offset, littleEndian);
      return value === 0x7fffffff ? undefined : value;
    }
    case 'uint32': {
      const value = view.getUint32(offset, littleEndian);
      return value === 0xffffffff ? undefined : value;
    }
    case 'uint32z': {
      const value = view.getUint32(offset, littleEndian);
      return value === 0 ? undefined : value;
    }
    case 'float32': {
      const value = view.getFloat32(offset, littleEndian);
      return Number.isNaN(value) ? undefined : value;
    }
    case 'float64': {
      const value = view.getFloat64(offset, littleEndian);
      return Number.isNaN(value) ? undefined : value;
    }
    case 'sint64': {
      const value = view.getBigInt64(offset, littleEndian);
      return value === 0x7fffffffffffffffn ? undefined : Number(value);
    }
    case 'uint64': {
      const value = view.getBigUint64(offset, littleEndian);
      return value === 0xffffffffffffffffn ? undefined : Number(value);
    }
    case 'uint64z': {
      const value = view.getBigUint64(offset, littleEndian);
      return value === 0n ? undefined : Number(value);
    }
    case 'string':
      // Strings are never mapped onto numeric sample fields.
      return undefined;
  }
}

// =============================================================================
// RECORD MESSAGE FIELD MAP
// =============================================================================

export type SampleField = 'latitude' | 'longitude' | 'altitude' | 'distance' | 'speed' | 'power' | 'cadence' | 'heartRate';

export interface RecordFieldSpec {
  target: SampleField;
  scale: number;
  offset: number;
  semicircles: boolean;
  // Enhanced fields win over their 16-bit counterparts in the same message.
  priority: number;
}

function recordField(target: SampleField, options: Partial<Omit<RecordFieldSpec, 'target'>> = {}): RecordFieldSpec {
  return {
    target,
    scale: options.scale ?? 1,
    offset: options.offset ?? 0,
    semicircles: options.semicircles ?? false,
    priority: options.priority ?? 0,
  };
}

export const RECORD_FIELDS: ReadonlyMap<number, RecordFieldSpec> = new Map([
  [0, recordField('latitude', { semicircles: true })],
  [1, recordField('longitude', { semicircles: true })],
  [2, recordField('altitude', { scale: 5, offset: 500 })],
  [3, recordField('heartRate')],
  [4, recordField('cadence')],
  [5, recordField('distance', { scale: 100 })],
  [6, recordField('speed', { scale: 1000 })],
  [7, recordField('power')],
  [73, recordField('speed', { scale: 1000, priority: 1 })],
  [78, recordField('altitude', { scale: 5, offset: 500, priority: 1 })],
]);

export const FILE_ID_FIELDS = {
  manufacturer: 1,
  product: 2,
  serialNumber: 3,
  timeCreated: 4,
} as const;

// =============================================================================
// CRC
// =============================================================================

const CRC_TABLE: readonly number[] = [
  0x0000, 0xcc01, 0xd801, 0x1400, 0xf001, 0x3c00, 0x2800, 0xe401,
  0xa001, 0x6c00, 0x7800, 0xb401, 0x5000, 0x9c01, 0x8801, 0x4400,
];

function crcNibble(crc: number, nibble: number): number {
  const tmp = CRC_TABLE[crc & 0x0f];
  const shifted = (crc >> 4) & 0x0fff;
  return shifted ^ tmp ^ CRC_TABLE[nibble & 0x0f];
}

/**
 * FIT CRC-16 over bytes[start, end).
 */
export function fitCrc(bytes: Uint8Array, start = 0, end = bytes.length, seed = 0): number {
  let crc = seed;
  for (let i = start; i < end; i++) {
    const byte = bytes[i];
    crc = crcNibble(crc, byte);
    crc = crcNibble(crc, byte >> 4);
  }
  return crc;
}
