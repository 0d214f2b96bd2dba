/**
 * Types for structural similarity between subtrees.
 */

/**
 * - `euclidean`: |a - b| / (|a| + |b|), in [0, 1]
 * - `cosine`: 1 - cos(a, b), in [0, 1] for non-negative vectors
 */
export type DistanceMetric = 'euclidean' | 'cosine';

/**
 * The minimal node shape the pre-filter looks at.
 */
export interface Comparable {
  readonly category: string;
  readonly kind: string;
}
