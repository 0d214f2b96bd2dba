/**
 * Similarity oracle exports.
 */
export { vectorDistance, canCompare, compareKey } from './distance.js';
export type { Comparable, DistanceMetric } from './types.js';
