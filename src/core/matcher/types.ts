/**
 * Types for the tree matcher.
 */
import type { IndexedTree } from '../term/indexed-tree.js';
import type { LeafKey } from '../term/types.js';
import type { DistanceMetric } from '../similarity/types.js';
import type { Mapping } from './mapping.js';

/**
 * Both trees together with the feature vector of every node, indexed by id.
 */
export interface MatchInput<L> {
  oldTree: IndexedTree<L>;
  newTree: IndexedTree<L>;
  oldVectors: readonly (readonly number[])[];
  newVectors: readonly (readonly number[])[];
}

export interface MatchOptions<L> {
  /** Largest distance at which two nodes may still be matched */
  threshold: number;
  metric: DistanceMetric;
  /** Ranked candidates inspected per old node in the top-down pass */
  maxCandidates: number;
  /** Largest subtree the exact-content recovery pass will match; 0 disables it */
  maxRecoverySize: number;
  leafKey?: LeafKey<L>;
  signal?: AbortSignal;
}

/** How many pairs each phase contributed. */
export interface MatchStats {
  /** Pairs accepted directly by the top-down search */
  topDown: number;
  /** Pairs proposed through the children of accepted pairs */
  propagated: number;
  /** Pairs found by exact content in the bottom-up pass */
  recovered: number;
}

export interface MatchResult {
  mapping: Mapping;
  stats: MatchStats;
}
