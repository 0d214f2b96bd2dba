/**
 * Types for edit scripts and whole-tree comparisons.
 */
import type { DiffConfigInput } from '../config/schema.js';
import type { MappingPair } from '../matcher/mapping.js';
import type { MatchStats } from '../matcher/types.js';
import type { IndexedNode, IndexedTree } from '../term/indexed-tree.js';
import type { LeafKey } from '../term/types.js';

/**
 * One step of an edit script.
 *
 * Insert and delete cover a maximal unmapped region: the root node named in
 * `after`/`before` plus every unmapped descendant reachable without crossing
 * a mapped node. `nodes` lists the ids covered, root first.
 */
export type EditOperation<L = string> =
  | { readonly type: 'insert'; readonly after: IndexedNode<L>; readonly nodes: readonly number[] }
  | { readonly type: 'delete'; readonly before: IndexedNode<L>; readonly nodes: readonly number[] }
  | { readonly type: 'replace'; readonly before: IndexedNode<L>; readonly after: IndexedNode<L> }
  | {
      readonly type: 'copy';
      readonly before: IndexedNode<L>;
      readonly after: IndexedNode<L>;
      /** The pair's parents do not correspond to each other */
      readonly moved: boolean;
    };

export type EditOperationType = EditOperation['type'];

/** Operation counts for an edit script. */
export interface EditSummary {
  insert: number;
  delete: number;
  replace: number;
  copy: number;
  /** Copies flagged as moved */
  moved: number;
}

export interface DiffOptions<L> {
  config?: DiffConfigInput;
  leafKey?: LeafKey<L>;
  /** Also return the raw node mapping, for diagnostics */
  includeMapping?: boolean;
  /** Abandons the comparison; nothing partial is returned */
  signal?: AbortSignal;
}

export interface DiffResult<L> {
  oldTree: IndexedTree<L>;
  newTree: IndexedTree<L>;
  editScript: EditOperation<L>[];
  summary: EditSummary;
  stats: MatchStats;
  mapping?: MappingPair[];
}
