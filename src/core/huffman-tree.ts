/**
 * Huffman tree construction.
 *
 * Leaves enter the queue in ascending symbol order and internal nodes are
 * pushed as they are created; the queue breaks weight ties by push order.
 * Rebuilding a tree from a stored frequency table therefore reproduces the
 * encoder's tree exactly.
 */

import { EmptyInputError } from '../errors.js';
import { SYMBOL_COUNT, type FrequencyTable } from './frequency.js';
import { MinPriorityQueue } from './priority-queue.js';

export interface HuffmanLeaf {
  readonly kind: 'leaf';
  readonly symbol: number;
  readonly weight: number;
}

export interface HuffmanInternal {
  readonly kind: 'internal';
  readonly weight: number;
  readonly left: HuffmanNode;
  readonly right: HuffmanNode;
}

export type HuffmanNode = HuffmanLeaf | HuffmanInternal;

/**
 * Build a Huffman tree from a frequency table.
 *
 * With a single distinct symbol the root is an internal node whose left
 * child is that symbol and whose right child is a zero-weight phantom leaf,
 * so the symbol still gets the 1-bit code `0`.
 *
 * @throws EmptyInputError if every count is zero
 */
export function buildHuffmanTree(table: FrequencyTable): HuffmanNode {
  const queue = new MinPriorityQueue<HuffmanNode>();

  for (let symbol = 0; symbol < SYMBOL_COUNT; symbol++) {
    const weight = table[symbol];
    if (weight > 0) {
      queue.push({ kind: 'leaf', symbol, weight }, weight);
    }
  }

  if (queue.size === 0) {
    throw new EmptyInputError();
  }

  if (queue.size === 1) {
    const only = queue.pop();
    if (only === undefined || only.kind !== 'leaf') {
      throw new EmptyInputError();
    }
    return {
      kind: 'internal',
      weight: only.weight,
      left: only,
      right: { kind: 'leaf', symbol: (only.symbol + 1) & 0xff, weight: 0 },
    };
  }

  while (queue.size > 1) {
    const left = queue.pop();
    const right = queue.pop();
    if (left === undefined || right === undefined) break;

    const weight = left.weight + right.weight;
    queue.push({ kind: 'internal', weight, left, right }, weight);
  }

  const root = queue.pop();
  if (root === undefined) {
    throw new EmptyInputError();
  }
  return root;
}

/**
 * True for the filler leaf added beside a lone symbol.
 */
export function isPhantomLeaf(node: HuffmanNode): boolean {
  return node.kind === 'leaf' && node.weight === 0;
}
