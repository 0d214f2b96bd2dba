/**
 * Types for pq-gram fingerprints.
 */

/**
 * The local neighbourhood of one node. `null` is the absent label used to
 * pad contexts near the edges of the tree, so every gram of a run has the
 * same length.
 */
export interface Gram<Label = string> {
  /** Labels of the nearest `p` ancestors, nearest first. */
  readonly stem: readonly (Label | null)[];
  /** The node's own label followed by its following siblings, `q` in total. */
  readonly base: readonly (Label | null)[];
}

/** Context sizes shared by every gram of one comparison. */
export interface GramOptions {
  p: number;
  q: number;
}
