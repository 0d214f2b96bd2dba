/**
 * Small integer ids for subtree content, shared across trees.
 */
import type { IndexedTree } from './indexed-tree.js';
import type { LeafKey } from './types.js';
import { leafPayload } from './syntax.js';
import { defaultLeafKey } from './term.js';

/**
 * Interns subtree content. Two nodes, from the same tree or from different
 * trees interned by one instance, get the same id exactly when termEquals
 * holds for their terms.
 *
 * Each node is keyed by its own content plus its children's ids, so the whole
 * tree is interned in one bottom-up sweep whatever its depth.
 */
export class ContentInterner<L> {
  private readonly ids = new Map<string, number>();

  constructor(private readonly leafKey: LeafKey<L> = defaultLeafKey) {}

  /** Number of distinct contents seen so far. */
  get size(): number {
    return this.ids.size;
  }

  /**
   * Content id of every node, indexed by node id.
   */
  intern(tree: IndexedTree<L>): number[] {
    const result = new Array<number>(tree.size).fill(0);

    // Children carry higher ids than their parent.
    for (let id = tree.size - 1; id >= 0; id--) {
      const node = tree.node(id);
      const payload = leafPayload(node.term.syntax);
      const key = JSON.stringify([
        node.category,
        node.kind,
        payload === null ? null : this.leafKey(payload.value),
        node.groups.map((group) => [group.key, group.children.map((child) => result[child])]),
      ]);

      let contentId = this.ids.get(key);
      if (contentId === undefined) {
        contentId = this.ids.size;
        this.ids.set(key, contentId);
      }
      result[id] = contentId;
    }

    return result;
  }
}
