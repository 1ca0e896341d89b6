/**
 * Error kinds raised by huffpack.
 *
 * Every failure the compressor or the CLI can report extends
 * {@link HuffpackError}, so callers can tell codec failures apart from
 * programming errors (which surface as plain `RangeError`/`TypeError`).
 */

export class HuffpackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HuffpackError';
  }
}

/**
 * A file could not be opened, read or written.
 */
export class IOError extends HuffpackError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${path}: ${reason}`, { cause });
    this.name = 'IOError';
    this.path = path;
  }
}

/**
 * A Huffman tree was requested for a table with no symbols.
 */
export class EmptyInputError extends HuffpackError {
  constructor(message = 'Cannot build a Huffman tree from an empty frequency table') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

/**
 * The container header is missing, truncated or inconsistent.
 */
export class MalformedHeaderError extends HuffpackError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedHeaderError';
  }
}

/**
 * The payload ran out of valid bits in the middle of a code.
 */
export class TruncatedStreamError extends HuffpackError {
  constructor(message: string) {
    super(message);
    this.name = 'TruncatedStreamError';
  }
}

/**
 * The payload contains a bit path that leads to no stored symbol.
 */
export class CorruptPayloadError extends HuffpackError {
  constructor(message: string) {
    super(message);
    this.name = 'CorruptPayloadError';
  }
}
