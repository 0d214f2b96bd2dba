/**
 * Turns a node mapping into an ordered edit script.
 */
import type { IndexedNode, IndexedTree } from '../term/indexed-tree.js';
import type { LeafKey } from '../term/types.js';
import { defaultLeafKey, ownContentEquals } from '../term/term.js';
import type { Mapping } from '../matcher/mapping.js';
import type { EditOperation, EditSummary } from './types.js';

/**
 * Ids of the maximal unmapped region rooted at `id`, root first.
 * Mapped descendants and everything below them are left out.
 */
function unmappedRegion<L>(
  tree: IndexedTree<L>,
  id: number,
  isMapped: (id: number) => boolean
): number[] {
  const region: number[] = [];
  const stack = [id];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    region.push(current);
    const children = tree.node(current).children;
    for (let i = children.length - 1; i >= 0; i--) {
      if (!isMapped(children[i])) stack.push(children[i]);
    }
  }
  return region;
}

function parentsCorrespond<L>(
  before: IndexedNode<L>,
  after: IndexedNode<L>,
  mapping: Mapping
): boolean {
  if (before.parent === null || after.parent === null) {
    return before.parent === after.parent;
  }
  return mapping.newFor(before.parent) === after.parent;
}

/**
 * Build the edit script for a finished mapping.
 *
 * Follows the new tree in pre-order. Old-only regions are emitted right after
 * the pair that contains them, or first of all when the old root itself is
 * unmapped. Every old node is covered by exactly one delete, replace or copy,
 * every new node by exactly one insert, replace or copy.
 */
export function buildEditScript<L>(
  oldTree: IndexedTree<L>,
  newTree: IndexedTree<L>,
  mapping: Mapping,
  leafKey: LeafKey<L> = defaultLeafKey
): EditOperation<L>[] {
  const script: EditOperation<L>[] = [];
  const oldMapped = (id: number) => mapping.hasOld(id);
  const newMapped = (id: number) => mapping.hasNew(id);

  const deleteRegion = (id: number) => {
    script.push({ type: 'delete', before: oldTree.node(id), nodes: unmappedRegion(oldTree, id, oldMapped) });
  };

  if (!mapping.hasOld(0)) {
    deleteRegion(0);
  }

  for (const after of newTree.nodes) {
    const oldId = mapping.oldFor(after.id);

    if (oldId === undefined) {
      if (after.parent === null || newMapped(after.parent)) {
        script.push({ type: 'insert', after, nodes: unmappedRegion(newTree, after.id, newMapped) });
      }
      continue;
    }

    const before = oldTree.node(oldId);
    if (ownContentEquals(before.term, after.term, leafKey)) {
      script.push({ type: 'copy', before, after, moved: !parentsCorrespond(before, after, mapping) });
    } else {
      script.push({ type: 'replace', before, after });
    }

    for (const child of before.children) {
      if (!oldMapped(child)) deleteRegion(child);
    }
  }

  return script;
}

/**
 * Count the operations of an edit script.
 */
export function summarizeEditScript<L>(script: readonly EditOperation<L>[]): EditSummary {
  const summary: EditSummary = { insert: 0, delete: 0, replace: 0, copy: 0, moved: 0 };
  for (const operation of script) {
    summary[operation.type]++;
    if (operation.type === 'copy' && operation.moved) summary.moved++;
  }
  return summary;
}
