/**
 * Gram fingerprint exports.
 */
export { pqGrams, gramsOfTerm, subtreeGrams, gramKey, gramEquals } from './pq-grams.js';
export { featureVector, gramBucket, subtreeVectors, assertDimension } from './feature-vector.js';
export type { Gram, GramOptions } from './types.js';
