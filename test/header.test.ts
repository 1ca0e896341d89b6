import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
  headerFrequencyTable,
  calculateHeaderSize,
  isHuffmanContainer,
  HEADER_BASE_SIZE,
  MAGIC_BYTES,
  FORMAT_VERSION,
} from '../src/format/header.js';
import { countFrequencies } from '../src/core/frequency.js';
import { MalformedHeaderError } from '../src/errors.js';

const encoder = new TextEncoder();

describe('Header', () => {
  it('should create header with correct values', () => {
    const header = createHeader(countFrequencies(encoder.encode('aaaabbbcc')), 2, 2);

    expect(header.magic).toEqual(MAGIC_BYTES);
    expect(header.version).toBe(FORMAT_VERSION);
    expect(header.paddingBits).toBe(2);
    expect(header.originalLength).toBe(9);
    expect(header.payloadLength).toBe(2);
    expect(header.entries).toEqual([
      { symbol: 0x61, frequency: 4 },
      { symbol: 0x62, frequency: 3 },
      { symbol: 0x63, frequency: 2 },
    ]);
  });

  it('should serialize to the documented layout', () => {
    const header = createHeader(countFrequencies(encoder.encode('aaaabbbcc')), 2, 2);
    const bytes = serializeHeader(header);

    expect(bytes.length).toBe(calculateHeaderSize(3));
    expect(Array.from(bytes)).toEqual([
      0x48, 0x55, 0x46, 0x46, // magic
      1, // version
      2, // padding bits
      3, 0, // symbol count
      9, 0, 0, 0, // original length
      2, 0, 0, 0, // payload length
      0x61, 4, 0, 0, 0,
      0x62, 3, 0, 0, 0,
      0x63, 2, 0, 0, 0,
    ]);
  });

  it('should roundtrip through serialize/deserialize', () => {
    const original = createHeader(countFrequencies(encoder.encode('hello, world')), 5, 4);
    const bytes = serializeHeader(original);
    const restored = deserializeHeader(combineHeaderAndPayload(bytes, new Uint8Array(4)));

    expect(restored.magic).toEqual(original.magic);
    expect(restored.version).toBe(original.version);
    expect(restored.paddingBits).toBe(original.paddingBits);
    expect(restored.originalLength).toBe(original.originalLength);
    expect(restored.payloadLength).toBe(original.payloadLength);
    expect(restored.entries).toEqual(original.entries);
  });

  it('should handle maximum frequency values', () => {
    const frequencies = new Uint32Array(256);
    frequencies[7] = 0xffffffff;
    const original = createHeader(frequencies, 0, 0);
    const restored = deserializeHeader(serializeHeader(original));

    expect(restored.originalLength).toBe(0xffffffff);
    expect(restored.entries).toEqual([{ symbol: 7, frequency: 0xffffffff }]);
  });

  it('should handle an empty table', () => {
    const bytes = serializeHeader(createHeader(new Uint32Array(256), 0, 0));
    const restored = deserializeHeader(bytes);

    expect(bytes.length).toBe(HEADER_BASE_SIZE);
    expect(restored.originalLength).toBe(0);
    expect(restored.entries).toEqual([]);
  });

  it('should rebuild the frequency table', () => {
    const frequencies = countFrequencies(encoder.encode('abracadabra'));
    const header = createHeader(frequencies, 0, 0);

    expect(headerFrequencyTable(header)).toEqual(frequencies);
  });
});

describe('Header validation', () => {
  function validBytes(): Uint8Array {
    const header = createHeader(countFrequencies(encoder.encode('aaaabbbcc')), 2, 2);
    return combineHeaderAndPayload(serializeHeader(header), new Uint8Array([0x0f, 0xe8]));
  }

  it('should accept a valid container', () => {
    expect(() => deserializeHeader(validBytes())).not.toThrow();
  });

  it('should throw on invalid magic bytes', () => {
    const bytes = validBytes();
    bytes[0] = 0x00; // Invalid magic

    expect(() => deserializeHeader(bytes)).toThrow(MalformedHeaderError);
    expect(() => deserializeHeader(bytes)).toThrow('Invalid file format');
  });

  it('should throw on truncated header', () => {
    const bytes = validBytes().slice(0, 3);

    expect(() => deserializeHeader(bytes)).toThrow(MalformedHeaderError);
    expect(() => deserializeHeader(bytes)).toThrow('Invalid header');
  });

  it('should throw on unsupported version', () => {
    const bytes = validBytes();
    bytes[4] = 255; // Set invalid version

    expect(() => deserializeHeader(bytes)).toThrow('Unsupported format version');
  });

  it('should throw on padding outside 0-7', () => {
    const bytes = validBytes();
    bytes[5] = 8;

    expect(() => deserializeHeader(bytes)).toThrow('Invalid padding bit count: 8');
  });

  it('should throw when the entry count exceeds the remaining bytes', () => {
    const bytes = validBytes();
    bytes[6] = 200;

    expect(() => deserializeHeader(bytes)).toThrow('Truncated symbol table');
  });

  it('should throw on a symbol count above 256', () => {
    const bytes = validBytes();
    bytes[6] = 0x01;
    bytes[7] = 0x01; // 257

    expect(() => deserializeHeader(bytes)).toThrow('Invalid symbol count: 257');
  });

  it('should throw on duplicate symbols', () => {
    const bytes = validBytes();
    bytes[21] = 0x61; // second entry repeats 'a'

    expect(() => deserializeHeader(bytes)).toThrow('out of order');
  });

  it('should throw on a zero frequency', () => {
    const bytes = validBytes();
    bytes[27] = 0; // 'c' frequency low byte

    expect(() => deserializeHeader(bytes)).toThrow('Symbol 99 has zero frequency');
  });

  it('should throw when frequencies disagree with the original length', () => {
    const bytes = validBytes();
    bytes[8] = 10;

    expect(() => deserializeHeader(bytes)).toThrow(
      'Frequencies sum to 9 but original length is 10'
    );
  });

  it('should throw on a truncated payload', () => {
    const bytes = validBytes().slice(0, -1);

    expect(() => deserializeHeader(bytes)).toThrow(
      'Truncated payload: expected 2 bytes, got 1'
    );
  });

  it('should throw on padding without a payload', () => {
    const bytes = serializeHeader(createHeader(new Uint32Array(256), 0, 0));
    bytes[5] = 3;

    expect(() => deserializeHeader(bytes)).toThrow('Empty payload cannot carry');
  });
});

describe('Header + Payload', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should combine header and payload', () => {
    const header = serializeHeader(createHeader(countFrequencies(encoder.encode('ab')), 6, 1));
    const payload = new Uint8Array([0b01000000]);

    const combined = combineHeaderAndPayload(header, payload);

    expect(combined.length).toBe(header.length + payload.length);
    expect(combined.slice(0, header.length)).toEqual(header);
    expect(combined.slice(header.length)).toEqual(payload);
  });

  it('should split header and payload', () => {
    const headerBytes = serializeHeader(
      createHeader(countFrequencies(encoder.encode('ab')), 6, 1)
    );
    const payload = new Uint8Array([0b01000000]);
    const combined = combineHeaderAndPayload(headerBytes, payload);

    const { header, payload: extractedPayload } = splitHeaderAndPayload(combined);

    expect(header.originalLength).toBe(2);
    expect(header.paddingBits).toBe(6);
    expect(extractedPayload).toEqual(payload);
  });

  it('should drop trailing bytes with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const headerBytes = serializeHeader(
      createHeader(countFrequencies(encoder.encode('ab')), 6, 1)
    );
    const combined = combineHeaderAndPayload(headerBytes, new Uint8Array([0x40, 0xaa, 0xbb]));

    const { payload } = splitHeaderAndPayload(combined);

    expect(Array.from(payload)).toEqual([0x40]);
    expect(warn).toHaveBeenCalledWith(
      'Ignoring 2 trailing byte(s) after compressed payload.'
    );
  });

  it('should handle empty payload', () => {
    const headerBytes = serializeHeader(createHeader(new Uint32Array(256), 0, 0));
    const { header, payload } = splitHeaderAndPayload(headerBytes);

    expect(header.originalLength).toBe(0);
    expect(payload.length).toBe(0);
  });

  it('should detect the container magic', () => {
    expect(isHuffmanContainer(new Uint8Array([0x48, 0x55, 0x46, 0x46, 1]))).toBe(true);
    expect(isHuffmanContainer(new Uint8Array([0x48, 0x55, 0x46]))).toBe(false);
    expect(isHuffmanContainer(encoder.encode('PK\u0003\u0004'))).toBe(false);
  });
});
