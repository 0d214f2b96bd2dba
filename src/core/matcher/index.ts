/**
 * Tree matcher exports.
 */
export { Mapping } from './mapping.js';
export type { MappingPair } from './mapping.js';
export { TreeMatcher, matchTrees } from './matcher.js';
export type { MatchInput, MatchOptions, MatchResult, MatchStats } from './types.js';
