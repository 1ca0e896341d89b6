import { BitOutputStream, BitInputStream } from './core/bit-stream.js';
import { countFrequencies, distinctSymbols } from './core/frequency.js';
import { buildHuffmanTree, isPhantomLeaf } from './core/huffman-tree.js';
import {
  type CodeTable,
  generateCodeTable,
  encodedBitLength,
} from './core/code-table.js';
import {
  createHeader,
  serializeHeader,
  splitHeaderAndPayload,
  combineHeaderAndPayload,
  headerFrequencyTable,
  deserializeHeader,
} from './format/header.js';
import {
  CorruptPayloadError,
  MalformedHeaderError,
  TruncatedStreamError,
} from './errors.js';

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'counting' | 'building' | 'encoding' | 'decoding';
  current: number;
  total: number;
}

/**
 * Options for HuffmanCompressor.
 */
export interface CompressorOptions {
  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;

  /** Bytes processed between 'encoding'/'decoding' progress reports (default: 65536) */
  progressInterval?: number;
}

/**
 * Default compressor options.
 */
export const DEFAULT_COMPRESSOR_OPTIONS = {
  progressInterval: 65536,
} satisfies CompressorOptions;

/**
 * Result of compression operation.
 */
export interface CompressionResult {
  /** Compressed data (header + payload) */
  data: Uint8Array;

  /** Original size in bytes */
  originalSize: number;

  /** Compressed size in bytes */
  compressedSize: number;

  /** Compression ratio (originalSize / compressedSize) */
  compressionRatio: number;

  /** Number of distinct byte values in the input */
  symbolCount: number;

  /** Zero bits padding the last payload byte */
  paddingBits: number;
}

/**
 * Header fields and code table of a container, without the decoded payload.
 */
export interface ContainerInfo {
  version: number;
  originalLength: number;
  payloadLength: number;
  paddingBits: number;
  symbolCount: number;
  codeTable: CodeTable;
}

/**
 * Static Huffman compressor.
 *
 * Usage:
 * ```typescript
 * const compressor = new HuffmanCompressor();
 *
 * const result = compressor.compress(new TextEncoder().encode('aaaabbbcc'));
 * const bytes = compressor.decompress(result.data);
 * ```
 */
export class HuffmanCompressor {
  private onProgress?: (progress: ProgressInfo) => void;
  private progressInterval: number;

  constructor(options: CompressorOptions = {}) {
    const interval =
      options.progressInterval ?? DEFAULT_COMPRESSOR_OPTIONS.progressInterval;
    if (!Number.isInteger(interval) || interval <= 0) {
      throw new RangeError(`Invalid progress interval: ${interval}`);
    }

    this.onProgress = options.onProgress;
    this.progressInterval = interval;
  }

  /**
   * Compress bytes into a container.
   *
   * @param data - The bytes to compress
   * @returns Compression result with data and statistics
   */
  compress(data: Uint8Array): CompressionResult {
    const originalSize = data.length;

    // Step 1: Count symbols
    this.reportProgress('counting', 0, originalSize);
    const frequencies = countFrequencies(data);
    this.reportProgress('counting', originalSize, originalSize);

    if (originalSize === 0) {
      // Empty input - header-only container
      const headerBytes = serializeHeader(createHeader(frequencies, 0, 0));
      return {
        data: headerBytes,
        originalSize: 0,
        compressedSize: headerBytes.length,
        compressionRatio: 0,
        symbolCount: 0,
        paddingBits: 0,
      };
    }

    // Step 2: Build tree and code table
    this.reportProgress('building', 0, 1);
    const codes = generateCodeTable(buildHuffmanTree(frequencies));
    this.reportProgress('building', 1, 1);

    // Step 3: Pack every byte's code in input order
    const bitStream = new BitOutputStream();
    for (let i = 0; i < originalSize; i++) {
      if (i % this.progressInterval === 0) {
        this.reportProgress('encoding', i, originalSize);
      }

      const code = codes.get(data[i]);
      if (code === undefined) {
        throw new RangeError(`Symbol ${data[i]} has no code`);
      }
      bitStream.writeCode(code.bits);
    }
    const paddingBits = bitStream.flush();
    this.reportProgress('encoding', originalSize, originalSize);

    // Step 4: Create header and combine with payload
    const payload = bitStream.toUint8Array();
    const header = createHeader(frequencies, paddingBits, payload.length);
    const combined = combineHeaderAndPayload(serializeHeader(header), payload);

    return {
      data: combined,
      originalSize,
      compressedSize: combined.length,
      compressionRatio: originalSize / combined.length,
      symbolCount: distinctSymbols(frequencies),
      paddingBits,
    };
  }

  /**
   * Decompress a container back to the original bytes.
   *
   * @param data - The compressed data (from compress())
   * @returns The original bytes
   * @throws MalformedHeaderError if the header is invalid or disagrees with the payload
   * @throws TruncatedStreamError if the payload ends inside a code
   * @throws CorruptPayloadError if the payload selects no stored symbol
   */
  decompress(data: Uint8Array): Uint8Array {
    // Step 1: Parse header
    const { header, payload } = splitHeaderAndPayload(data);

    // Handle empty input
    if (header.originalLength === 0) {
      if (header.payloadLength !== 0) {
        throw new MalformedHeaderError(
          `Empty input cannot have a ${header.payloadLength} byte payload`
        );
      }
      return new Uint8Array(0);
    }

    // Step 2: Rebuild the encoder's tree
    this.reportProgress('building', 0, 1);
    const frequencies = headerFrequencyTable(header);
    const root = buildHuffmanTree(frequencies);
    const validBits = payload.length * 8 - header.paddingBits;
    const expectedBits = encodedBitLength(generateCodeTable(root), frequencies);
    if (validBits !== expectedBits) {
      throw new MalformedHeaderError(
        `Payload holds ${validBits} bits but the symbol table implies ${expectedBits}`
      );
    }
    this.reportProgress('building', 1, 1);

    // Step 3: Walk the tree bit by bit
    const bitStream = new BitInputStream(payload, validBits);
    const output = new Uint8Array(header.originalLength);
    let written = 0;

    while (!bitStream.isAtEnd) {
      if (written % this.progressInterval === 0) {
        this.reportProgress('decoding', written, header.originalLength);
      }

      let node = root;
      while (node.kind === 'internal') {
        if (bitStream.isAtEnd) {
          throw new TruncatedStreamError(
            `Bit stream ended inside a code after ${written} symbol(s)`
          );
        }
        node = bitStream.readBit() === 0 ? node.left : node.right;
      }

      if (isPhantomLeaf(node)) {
        throw new CorruptPayloadError(
          `Invalid code at bit ${bitStream.position - 1}`
        );
      }
      if (written >= output.length) {
        throw new MalformedHeaderError(
          `Payload decodes to more than ${header.originalLength} byte(s)`
        );
      }
      output[written++] = node.symbol;
    }

    if (written !== header.originalLength) {
      throw new MalformedHeaderError(
        `Decoded ${written} byte(s) but header declares ${header.originalLength}`
      );
    }
    this.reportProgress('decoding', written, header.originalLength);

    return output;
  }

  /**
   * Read a container's header and code table without decoding its payload.
   */
  inspect(data: Uint8Array): ContainerInfo {
    const header = deserializeHeader(data);
    const codeTable: CodeTable =
      header.entries.length === 0
        ? new Map()
        : generateCodeTable(buildHuffmanTree(headerFrequencyTable(header)));

    return {
      version: header.version,
      originalLength: header.originalLength,
      payloadLength: header.payloadLength,
      paddingBits: header.paddingBits,
      symbolCount: header.entries.length,
      codeTable,
    };
  }

  /**
   * Report progress to the callback if provided.
   */
  private reportProgress(
    stage: ProgressInfo['stage'],
    current: number,
    total: number
  ): void {
    this.onProgress?.({ stage, current, total });
  }
}
