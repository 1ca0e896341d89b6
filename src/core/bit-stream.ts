import { TruncatedStreamError } from '../errors.js';

/**
 * Bit-level output stream for the packed payload.
 * Accumulates bits MSB-first and outputs bytes when full.
 */
export class BitOutputStream {
  private buffer: number[] = [];
  private currentByte: number = 0;
  private bitPosition: number = 0;

  /**
   * Write a single bit to the stream.
   * @param bit - 0 or 1
   */
  writeBit(bit: number): void {
    if (bit !== 0 && bit !== 1) {
      throw new RangeError(`Invalid bit value: ${bit}`);
    }

    this.currentByte = (this.currentByte << 1) | bit;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Append a code given as a string of '0'/'1' characters.
   */
  writeCode(bits: string): void {
    for (let i = 0; i < bits.length; i++) {
      const ch = bits.charCodeAt(i);
      if (ch === 0x30) {
        this.writeBit(0);
      } else if (ch === 0x31) {
        this.writeBit(1);
      } else {
        throw new RangeError(`Invalid bit string: "${bits}"`);
      }
    }
  }

  /**
   * Flush any remaining bits, padding the low end of the last byte with zeros.
   * Must be called after all data is written.
   *
   * @returns Number of padding bits added (0-7)
   */
  flush(): number {
    if (this.bitPosition === 0) return 0;

    const padding = 8 - this.bitPosition;
    this.currentByte <<= padding;
    this.buffer.push(this.currentByte);
    this.currentByte = 0;
    this.bitPosition = 0;
    return padding;
  }

  /**
   * Get the current byte count (before flush).
   */
  get byteCount(): number {
    return this.buffer.length;
  }

  /**
   * Get the total bit count written.
   */
  get bitCount(): number {
    return this.buffer.length * 8 + this.bitPosition;
  }

  /**
   * Convert the stream to a Uint8Array.
   * Call flush() first if you want to include partial bytes.
   */
  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buffer);
  }
}

/**
 * Bit-level input stream over a packed payload.
 * Only the first `validBits` bits are readable; anything after them is padding.
 */
export class BitInputStream {
  private data: Uint8Array;
  private validBits: number;
  private bitOffset: number = 0;

  constructor(data: Uint8Array, validBits: number = data.length * 8) {
    if (!Number.isInteger(validBits) || validBits < 0 || validBits > data.length * 8) {
      throw new RangeError(
        `Invalid bit count ${validBits} for ${data.length} byte buffer`
      );
    }
    this.data = data;
    this.validBits = validBits;
  }

  /**
   * Read a single bit from the stream.
   * @throws TruncatedStreamError when all valid bits have been read
   */
  readBit(): number {
    if (this.bitOffset >= this.validBits) {
      throw new TruncatedStreamError(
        `Read past end of bit stream (${this.validBits} valid bits)`
      );
    }

    const byte = this.data[this.bitOffset >>> 3];
    const bit = (byte >>> (7 - (this.bitOffset & 7))) & 1;
    this.bitOffset++;
    return bit;
  }

  /**
   * Check if every valid bit has been read.
   */
  get isAtEnd(): boolean {
    return this.bitOffset >= this.validBits;
  }

  /**
   * Get current position in bits.
   */
  get position(): number {
    return this.bitOffset;
  }

  /**
   * Get number of readable bits.
   */
  get size(): number {
    return this.validBits;
  }

  /**
   * Get number of bits not yet read.
   */
  get remaining(): number {
    return this.validBits - this.bitOffset;
  }
}
