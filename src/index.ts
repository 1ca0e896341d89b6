/**
 * huffpack
 *
 * Lossless byte-stream compression with static Huffman coding.
 *
 * @example
 * ```typescript
 * import { HuffmanCompressor } from 'huffpack';
 *
 * const compressor = new HuffmanCompressor();
 *
 * // Compress
 * const result = compressor.compress(new TextEncoder().encode('aaaabbbcc'));
 * console.log(`Compression ratio: ${result.compressionRatio.toFixed(2)}x`);
 *
 * // Decompress
 * const bytes = compressor.decompress(result.data);
 * console.log(new TextDecoder().decode(bytes)); // 'aaaabbbcc'
 * ```
 */

// Main compressor
export {
  HuffmanCompressor,
  DEFAULT_COMPRESSOR_OPTIONS,
  type CompressorOptions,
  type CompressionResult,
  type ContainerInfo,
  type ProgressInfo,
} from './compressor.js';

// Core Huffman coding (for advanced usage)
export {
  BitOutputStream,
  BitInputStream,
  MinPriorityQueue,
  countFrequencies,
  distinctSymbols,
  totalFrequency,
  buildHuffmanTree,
  isPhantomLeaf,
  generateCodeTable,
  isPrefixFree,
  encodedBitLength,
  SYMBOL_COUNT,
  MAX_FREQUENCY,
  type FrequencyTable,
  type HuffmanNode,
  type HuffmanLeaf,
  type HuffmanInternal,
  type HuffmanCode,
  type CodeTable,
} from './core/index.js';

// File format (for advanced usage)
export {
  type ContainerHeader,
  type SymbolEntry,
  MAGIC_BYTES,
  FORMAT_VERSION,
  HEADER_BASE_SIZE,
  ENTRY_SIZE,
  calculateHeaderSize,
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
  headerFrequencyTable,
  isHuffmanContainer,
} from './format/index.js';

// Errors
export {
  HuffpackError,
  IOError,
  EmptyInputError,
  MalformedHeaderError,
  TruncatedStreamError,
  CorruptPayloadError,
} from './errors.js';
