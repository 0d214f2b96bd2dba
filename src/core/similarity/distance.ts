/**
 * Distance between feature vectors, and the pre-filter that decides which
 * node pairs are worth measuring at all.
 *
 * Distances rank candidates; they are not an equality test. Different
 * subtrees can sit at distance 0 through hash collisions.
 */
import { ContractError, ErrorCodes } from '../../utils/errors.js';
import type { Comparable, DistanceMetric } from './types.js';

function norm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) sum += value * value;
  return Math.sqrt(sum);
}

function euclidean(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const delta = a[i] - b[i];
    sum += delta * delta;
  }
  const scale = norm(a) + norm(b);
  return scale === 0 ? 0 : Math.sqrt(sum) / scale;
}

function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let squaresA = 0;
  let squaresB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    squaresA += a[i] * a[i];
    squaresB += b[i] * b[i];
  }
  if (squaresA === 0 && squaresB === 0) return 0;
  if (squaresA === 0 || squaresB === 0) return 1;

  return Math.min(1, Math.max(0, 1 - dot / Math.sqrt(squaresA * squaresB)));
}

/**
 * Distance between two vectors of the same dimension. Lower is more similar.
 */
export function vectorDistance(
  a: readonly number[],
  b: readonly number[],
  metric: DistanceMetric = 'euclidean'
): number {
  if (a.length !== b.length) {
    throw new ContractError(
      ErrorCodes.DIMENSION_MISMATCH,
      `Cannot compare feature vectors of dimension ${a.length} and ${b.length}`,
      { left: a.length, right: b.length }
    );
  }
  return metric === 'cosine' ? cosine(a, b) : euclidean(a, b);
}

/**
 * Pre-filter: only nodes of the same category and syntax kind are compared.
 */
export function canCompare(a: Comparable, b: Comparable): boolean {
  return a.category === b.category && a.kind === b.kind;
}

/**
 * Bucket key for the pre-filter; nodes can only match within one bucket.
 */
export function compareKey(node: Comparable): string {
  return `${node.category}\u0000${node.kind}`;
}
