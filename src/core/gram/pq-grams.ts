/**
 * pq-gram extraction over an indexed tree.
 */
import type { Category, Term } from '../term/types.js';
import { IndexedTree } from '../term/indexed-tree.js';
import { ContractError, ErrorCodes } from '../../utils/errors.js';
import type { Gram, GramOptions } from './types.js';

function assertContextSize(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ContractError(
      ErrorCodes.INVALID_CONTEXT_SIZE,
      `Gram context size ${name} must be a positive integer, got ${value}`,
      { [name]: value }
    );
  }
}

function pad<T>(labels: T[], size: number): (T | null)[] {
  const padded: (T | null)[] = labels.slice(0, size);
  while (padded.length < size) padded.push(null);
  return padded;
}

/**
 * Compute one gram per node, indexed by node id.
 */
export function pqGrams<L>(tree: IndexedTree<L>, options: GramOptions): Gram<Category>[] {
  const { p, q } = options;
  assertContextSize('p', p);
  assertContextSize('q', q);

  return tree.nodes.map((node) => {
    const stem: Category[] = [];
    let ancestor = node.parent;
    while (ancestor !== null && stem.length < p) {
      const current = tree.node(ancestor);
      stem.push(current.category);
      ancestor = current.parent;
    }

    const base: Category[] = [node.category];
    if (node.parent !== null) {
      const siblings = tree.node(node.parent).children;
      for (let i = node.siblingIndex + 1; i < siblings.length && base.length < q; i++) {
        base.push(tree.node(siblings[i]).category);
      }
    }

    return { stem: pad(stem, p), base: pad(base, q) };
  });
}

/**
 * Grams of a term, in pre-order.
 */
export function gramsOfTerm<L>(term: Term<L>, options: GramOptions): Gram<Category>[] {
  return pqGrams(new IndexedTree(term), options);
}

/**
 * The gram multiset of a node's whole subtree. Relies on pre-order ids:
 * a subtree is a contiguous id range.
 */
export function subtreeGrams<L, Label>(
  tree: IndexedTree<L>,
  grams: readonly Gram<Label>[],
  id: number
): Gram<Label>[] {
  return grams.slice(id, id + tree.node(id).size);
}

/** Canonical string for a gram; equal grams have equal keys. */
export function gramKey<Label>(gram: Gram<Label>): string {
  return JSON.stringify([gram.stem, gram.base]);
}

export function gramEquals<Label>(a: Gram<Label>, b: Gram<Label>): boolean {
  return gramKey(a) === gramKey(b);
}
