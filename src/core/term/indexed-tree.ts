/**
 * Flat, read-only view over a term, giving every node a stable identity.
 */
import type { Category, SyntaxKind, Term } from './types.js';
import { childGroups } from './syntax.js';

/** A child group resolved to node ids. */
export interface IndexedGroup {
  readonly key: string;
  readonly arity: 'fixed' | 'variable';
  readonly children: readonly number[];
}

/**
 * One node occurrence. `id` is its pre-order index, so a node's descendants
 * occupy ids `id + 1 .. id + size - 1`.
 */
export interface IndexedNode<L = string> {
  readonly id: number;
  readonly parent: number | null;
  readonly depth: number;
  /** Subtree size, the node itself included. */
  readonly size: number;
  readonly category: Category;
  readonly kind: SyntaxKind;
  /** All children in declared order. */
  readonly children: readonly number[];
  readonly groups: readonly IndexedGroup[];
  /** Position among the parent's children, 0 for the root. */
  readonly siblingIndex: number;
  readonly term: Term<L>;
}

interface MutableNode<L> {
  id: number;
  parent: number | null;
  depth: number;
  size: number;
  category: Category;
  kind: SyntaxKind;
  children: number[];
  groups: IndexedGroup[];
  siblingIndex: number;
  term: Term<L>;
}

/**
 * Pre-order indexed view of a term. Built without recursion, so arbitrarily
 * deep trees are fine.
 */
export class IndexedTree<L = string> {
  readonly nodes: readonly IndexedNode<L>[];

  constructor(readonly root: Term<L>) {
    this.nodes = IndexedTree.flatten(root);
  }

  get size(): number {
    return this.nodes.length;
  }

  node(id: number): IndexedNode<L> {
    const node = this.nodes[id];
    if (!node) {
      throw new RangeError(`No node with id ${id} (tree size ${this.nodes.length})`);
    }
    return node;
  }

  /**
   * Position of a node in pre-order, scaled to [0, 1].
   */
  relativePosition(id: number): number {
    return this.nodes.length <= 1 ? 0 : id / (this.nodes.length - 1);
  }

  /** Ids of the node and all its descendants. */
  subtreeIds(id: number): number[] {
    const { size } = this.node(id);
    return Array.from({ length: size }, (_, offset) => id + offset);
  }

  private static flatten<L>(root: Term<L>): MutableNode<L>[] {
    const nodes: MutableNode<L>[] = [];
    const stack: Array<{ term: Term<L>; parent: number | null; depth: number; siblingIndex: number }> = [
      { term: root, parent: null, depth: 0, siblingIndex: 0 },
    ];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const { term, parent, depth, siblingIndex } = entry;
      const id = nodes.length;

      nodes.push({
        id,
        parent,
        depth,
        size: 1,
        category: term.annotation.category,
        kind: term.syntax.kind,
        children: [],
        groups: [],
        siblingIndex,
        term,
      });
      if (parent !== null) {
        nodes[parent].children.push(id);
      }

      const children = childGroups(term.syntax).flatMap((group) => group.children);
      // Reverse push so the first child is popped (and numbered) first.
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ term: children[i], parent: id, depth: depth + 1, siblingIndex: i });
      }
    }

    // Children carry higher ids than their parent, so a reverse sweep
    // accumulates subtree sizes.
    for (let id = nodes.length - 1; id > 0; id--) {
      const parent = nodes[id].parent;
      if (parent !== null) nodes[parent].size += nodes[id].size;
    }

    for (const node of nodes) {
      let offset = 0;
      node.groups = childGroups(node.term.syntax).map((group) => {
        const ids = node.children.slice(offset, offset + group.children.length);
        offset += group.children.length;
        return { key: group.key, arity: group.arity, children: ids };
      });
    }

    return nodes;
  }
}
