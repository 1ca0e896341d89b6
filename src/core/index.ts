export { BitOutputStream, BitInputStream } from './bit-stream.js';
export {
  type FrequencyTable,
  SYMBOL_COUNT,
  MAX_FREQUENCY,
  countFrequencies,
  distinctSymbols,
  totalFrequency,
} from './frequency.js';
export { MinPriorityQueue } from './priority-queue.js';
export {
  type HuffmanNode,
  type HuffmanLeaf,
  type HuffmanInternal,
  buildHuffmanTree,
  isPhantomLeaf,
} from './huffman-tree.js';
export {
  type HuffmanCode,
  type CodeTable,
  generateCodeTable,
  isPrefixFree,
  encodedBitLength,
} from './code-table.js';
