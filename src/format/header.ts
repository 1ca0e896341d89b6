/**
 * Compressed container format.
 *
 * The header carries the frequency table the encoder built its tree from;
 * the decoder rebuilds the same tree with the same builder.
 *
 * Format:
 * [Magic: 4 bytes "HUFF"]
 * [Version: 1 byte]
 * [Padding bits: 1 byte] (0-7, zero bits at the end of the last payload byte)
 * [Symbol count: 2 bytes] (0-256)
 * [Original length: 4 bytes]
 * [Payload length: 4 bytes]
 * [Entries: 5 bytes × symbol count] (symbol: 1 byte, frequency: 4 bytes)
 * [Payload: variable]
 *
 * All multi-byte fields are little-endian. Entries are in ascending symbol order.
 */

import { MalformedHeaderError } from '../errors.js';
import { SYMBOL_COUNT, type FrequencyTable } from '../core/frequency.js';

/**
 * Magic bytes identifying a huffpack container.
 * "HUFF" in ASCII.
 */
export const MAGIC_BYTES = new Uint8Array([0x48, 0x55, 0x46, 0x46]);

/**
 * Current format version.
 */
export const FORMAT_VERSION = 1;

/**
 * Fixed header size (before the symbol entries).
 */
export const HEADER_BASE_SIZE = 16;

/**
 * Size of one symbol entry in bytes.
 */
export const ENTRY_SIZE = 5;

export interface SymbolEntry {
  symbol: number;
  frequency: number;
}

/**
 * Container header structure.
 */
export interface ContainerHeader {
  /** Magic bytes: "HUFF" */
  magic: Uint8Array;

  /** Format version */
  version: number;

  /** Zero bits padding the last payload byte (0-7) */
  paddingBits: number;

  /** Original input length in bytes */
  originalLength: number;

  /** Packed payload length in bytes */
  payloadLength: number;

  /** Symbols with non-zero frequency, ascending */
  entries: SymbolEntry[];
}

/**
 * Calculate total header size for a given number of symbol entries.
 */
export function calculateHeaderSize(symbolCount: number): number {
  return HEADER_BASE_SIZE + symbolCount * ENTRY_SIZE;
}

/**
 * Create a header for a compressed payload.
 */
export function createHeader(
  frequencies: FrequencyTable,
  paddingBits: number,
  payloadLength: number
): ContainerHeader {
  const entries: SymbolEntry[] = [];
  let originalLength = 0;

  for (let symbol = 0; symbol < SYMBOL_COUNT; symbol++) {
    const frequency = frequencies[symbol];
    if (frequency > 0) {
      entries.push({ symbol, frequency });
      originalLength += frequency;
    }
  }

  return {
    magic: new Uint8Array(MAGIC_BYTES),
    version: FORMAT_VERSION,
    paddingBits,
    originalLength,
    payloadLength,
    entries,
  };
}

/**
 * Serialize a header to bytes.
 */
export function serializeHeader(header: ContainerHeader): Uint8Array {
  const headerSize = calculateHeaderSize(header.entries.length);
  const buffer = new ArrayBuffer(headerSize);
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);

  let offset = 0;

  // Magic (4 bytes)
  bytes.set(header.magic, offset);
  offset += 4;

  // Version (1 byte)
  view.setUint8(offset, header.version);
  offset += 1;

  // Padding bits (1 byte)
  view.setUint8(offset, header.paddingBits);
  offset += 1;

  // Symbol count (2 bytes, little-endian)
  view.setUint16(offset, header.entries.length, true);
  offset += 2;

  // Original length (4 bytes, little-endian)
  view.setUint32(offset, header.originalLength, true);
  offset += 4;

  // Payload length (4 bytes, little-endian)
  view.setUint32(offset, header.payloadLength, true);
  offset += 4;

  for (const entry of header.entries) {
    view.setUint8(offset, entry.symbol);
    view.setUint32(offset + 1, entry.frequency, true);
    offset += ENTRY_SIZE;
  }

  return bytes;
}

/**
 * Deserialize and validate a header from the start of `data`.
 *
 * @throws MalformedHeaderError if the header is truncated or inconsistent
 */
export function deserializeHeader(data: Uint8Array): ContainerHeader {
  if (data.length < HEADER_BASE_SIZE) {
    throw new MalformedHeaderError(
      `Invalid header: expected at least ${HEADER_BASE_SIZE} bytes, got ${data.length}`
    );
  }

  if (!isHuffmanContainer(data)) {
    throw new MalformedHeaderError('Invalid file format: magic bytes mismatch');
  }

  const view = new DataView(data.buffer, data.byteOffset, data.length);

  const version = view.getUint8(4);
  if (version === 0 || version > FORMAT_VERSION) {
    throw new MalformedHeaderError(
      `Unsupported format version: ${version} (max supported: ${FORMAT_VERSION})`
    );
  }

  const paddingBits = view.getUint8(5);
  if (paddingBits > 7) {
    throw new MalformedHeaderError(`Invalid padding bit count: ${paddingBits}`);
  }

  const symbolCount = view.getUint16(6, true);
  if (symbolCount > SYMBOL_COUNT) {
    throw new MalformedHeaderError(
      `Invalid symbol count: ${symbolCount} (max ${SYMBOL_COUNT})`
    );
  }

  const originalLength = view.getUint32(8, true);
  const payloadLength = view.getUint32(12, true);

  const headerSize = calculateHeaderSize(symbolCount);
  if (data.length < headerSize) {
    throw new MalformedHeaderError(
      `Truncated symbol table: ${symbolCount} entries need ${headerSize} bytes, got ${data.length}`
    );
  }

  const entries: SymbolEntry[] = [];
  let total = 0;
  let offset = HEADER_BASE_SIZE;
  for (let i = 0; i < symbolCount; i++) {
    const symbol = view.getUint8(offset);
    const frequency = view.getUint32(offset + 1, true);
    offset += ENTRY_SIZE;

    const previous = entries[entries.length - 1];
    if (previous !== undefined && symbol <= previous.symbol) {
      throw new MalformedHeaderError(
        `Symbol table out of order at entry ${i}: ${symbol} after ${previous.symbol}`
      );
    }
    if (frequency === 0) {
      throw new MalformedHeaderError(`Symbol ${symbol} has zero frequency`);
    }

    entries.push({ symbol, frequency });
    total += frequency;
  }

  if (total !== originalLength) {
    throw new MalformedHeaderError(
      `Frequencies sum to ${total} but original length is ${originalLength}`
    );
  }

  if (data.length - headerSize < payloadLength) {
    throw new MalformedHeaderError(
      `Truncated payload: expected ${payloadLength} bytes, got ${data.length - headerSize}`
    );
  }

  if (payloadLength === 0 && paddingBits !== 0) {
    throw new MalformedHeaderError(
      `Empty payload cannot carry ${paddingBits} padding bits`
    );
  }

  return {
    magic: data.slice(0, 4),
    version,
    paddingBits,
    originalLength,
    payloadLength,
    entries,
  };
}

/**
 * Combine header and payload into a single buffer.
 */
export function combineHeaderAndPayload(
  header: Uint8Array,
  payload: Uint8Array
): Uint8Array {
  const result = new Uint8Array(header.length + payload.length);
  result.set(header, 0);
  result.set(payload, header.length);
  return result;
}

/**
 * Split data into header and payload.
 * Bytes after the declared payload are dropped with a warning.
 */
export function splitHeaderAndPayload(
  data: Uint8Array
): { header: ContainerHeader; payload: Uint8Array } {
  const header = deserializeHeader(data);
  const start = calculateHeaderSize(header.entries.length);
  const end = start + header.payloadLength;

  if (data.length > end) {
    console.warn(
      `Ignoring ${data.length - end} trailing byte(s) after compressed payload.`
    );
  }

  return { header, payload: data.slice(start, end) };
}

/**
 * Rebuild the frequency table stored in a header.
 */
export function headerFrequencyTable(header: ContainerHeader): FrequencyTable {
  const table = new Uint32Array(SYMBOL_COUNT);
  for (const entry of header.entries) {
    table[entry.symbol] = entry.frequency;
  }
  return table;
}

/**
 * Check if data starts with the container magic bytes.
 */
export function isHuffmanContainer(data: Uint8Array): boolean {
  if (data.length < MAGIC_BYTES.length) {
    return false;
  }

  return (
    data[0] === MAGIC_BYTES[0] &&
    data[1] === MAGIC_BYTES[1] &&
    data[2] === MAGIC_BYTES[2] &&
    data[3] === MAGIC_BYTES[3]
  );
}
