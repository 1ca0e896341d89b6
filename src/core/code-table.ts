/**
 * Code assignment from a Huffman tree.
 *
 * Left edges contribute a `0`, right edges a `1`; the decoder walks the tree
 * with the same convention.
 */

import { SYMBOL_COUNT, type FrequencyTable } from './frequency.js';
import { isPhantomLeaf, type HuffmanNode } from './huffman-tree.js';

export interface HuffmanCode {
  /** Code as a string of '0'/'1' characters, root first */
  bits: string;

  /** Number of bits in the code (always >= 1) */
  length: number;
}

export type CodeTable = Map<number, HuffmanCode>;

/**
 * Assign every symbol in the tree its root-to-leaf path.
 */
export function generateCodeTable(root: HuffmanNode): CodeTable {
  const table: CodeTable = new Map();

  // Bare leaf roots only come from hand-built trees.
  if (root.kind === 'leaf') {
    table.set(root.symbol, { bits: '0', length: 1 });
    return table;
  }

  const stack: Array<{ node: HuffmanNode; prefix: string }> = [
    { node: root, prefix: '' },
  ];

  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;
    const { node, prefix } = item;

    if (node.kind === 'leaf') {
      if (!isPhantomLeaf(node)) {
        table.set(node.symbol, { bits: prefix, length: prefix.length });
      }
      continue;
    }

    // Right first so the left subtree is visited first.
    stack.push({ node: node.right, prefix: prefix + '1' });
    stack.push({ node: node.left, prefix: prefix + '0' });
  }

  return table;
}

/**
 * Check that no code in the table is a prefix of another.
 */
export function isPrefixFree(table: CodeTable): boolean {
  const codes = [...table.values()].map((code) => code.bits).sort();

  // After sorting, a prefix always sorts directly before some code it prefixes.
  for (let i = 1; i < codes.length; i++) {
    if (codes[i].startsWith(codes[i - 1])) return false;
  }
  return true;
}

/**
 * Exact number of payload bits needed to encode input with these counts.
 */
export function encodedBitLength(
  table: CodeTable,
  frequencies: FrequencyTable
): number {
  let bits = 0;
  for (let symbol = 0; symbol < SYMBOL_COUNT; symbol++) {
    const count = frequencies[symbol];
    if (count === 0) continue;

    const code = table.get(symbol);
    if (code === undefined) {
      throw new RangeError(`Symbol ${symbol} has no code`);
    }
    bits += count * code.length;
  }
  return bits;
}
