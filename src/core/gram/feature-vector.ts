/**
 * Hashed-histogram embedding of gram multisets.
 *
 * Grams are hashed into `dimension` buckets, so unrelated grams can collide.
 * The vectors are a lossy, approximate fingerprint and are only ever used to
 * rank candidates.
 */
import type { IndexedTree } from '../term/indexed-tree.js';
import { ContractError, ErrorCodes } from '../../utils/errors.js';
import { stringHash } from '../../utils/hash.js';
import { gramKey } from './pq-grams.js';
import type { Gram } from './types.js';

export function assertDimension(dimension: number): void {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new ContractError(
      ErrorCodes.INVALID_DIMENSION,
      `Feature vector dimension must be a positive integer, got ${dimension}`,
      { dimension }
    );
  }
}

/**
 * Bucket index in [0, dimension) for a gram.
 */
export function gramBucket<Label>(gram: Gram<Label>, dimension: number): number {
  assertDimension(dimension);
  return stringHash(gramKey(gram)) % dimension;
}

/**
 * Count each gram occurrence into its bucket.
 * The result always has exactly `dimension` entries.
 */
export function featureVector<Label>(grams: Iterable<Gram<Label>>, dimension: number): number[] {
  assertDimension(dimension);
  const vector = new Array<number>(dimension).fill(0);
  for (const gram of grams) {
    vector[gramBucket(gram, dimension)] += 1;
  }
  return vector;
}

/**
 * Feature vector of every node's subtree, indexed by node id.
 * Equivalent to `featureVector(subtreeGrams(tree, grams, id), dimension)` for
 * each id, but computed in one bottom-up sweep.
 */
export function subtreeVectors<L, Label>(
  tree: IndexedTree<L>,
  grams: readonly Gram<Label>[],
  dimension: number
): number[][] {
  assertDimension(dimension);
  if (grams.length !== tree.size) {
    throw new ContractError(
      ErrorCodes.GRAM_COUNT_MISMATCH,
      `Expected one gram per node (${tree.size}), got ${grams.length}`,
      { nodes: tree.size, grams: grams.length }
    );
  }

  const vectors = grams.map((gram) => featureVector([gram], dimension));

  for (let id = tree.size - 1; id > 0; id--) {
    const parent = tree.node(id).parent;
    if (parent === null) continue;
    const target = vectors[parent];
    const source = vectors[id];
    for (let i = 0; i < dimension; i++) {
      target[i] += source[i];
    }
  }

  return vectors;
}
