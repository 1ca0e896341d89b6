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
} from './header.js';
