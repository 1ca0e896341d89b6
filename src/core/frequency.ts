/**
 * Byte frequency analysis.
 */

/** Number of distinct byte values. */
export const SYMBOL_COUNT = 256;

/** Largest count a frequency entry (and the container header) can hold. */
export const MAX_FREQUENCY = 0xffffffff;

/**
 * Occurrence count per byte value, indexed by symbol (length 256).
 */
export type FrequencyTable = Uint32Array;

/**
 * Count how often each byte value occurs in `data`.
 */
export function countFrequencies(data: Uint8Array): FrequencyTable {
  if (data.length > MAX_FREQUENCY) {
    throw new RangeError(
      `Input too large: ${data.length} bytes (max ${MAX_FREQUENCY})`
    );
  }

  const table = new Uint32Array(SYMBOL_COUNT);
  for (let i = 0; i < data.length; i++) {
    table[data[i]]++;
  }
  return table;
}

/**
 * Number of symbols with a non-zero count.
 */
export function distinctSymbols(table: FrequencyTable): number {
  let count = 0;
  for (let symbol = 0; symbol < SYMBOL_COUNT; symbol++) {
    if (table[symbol] > 0) count++;
  }
  return count;
}

/**
 * Sum of all counts, i.e. the length of the input the table was built from.
 */
export function totalFrequency(table: FrequencyTable): number {
  let total = 0;
  for (let symbol = 0; symbol < SYMBOL_COUNT; symbol++) {
    total += table[symbol];
  }
  return total;
}
