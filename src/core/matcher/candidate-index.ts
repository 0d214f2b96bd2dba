/**
 * Per-tree lookup structures for the matcher.
 *
 * Nodes with identical feature vectors (within one pre-filter bucket) form a
 * vector class. Distances only depend on vectors, so they are computed per
 * pair of classes. Within a class, and among nodes of equal content, members
 * are kept in id order, which is also pre-order position order.
 */
import type { IndexedTree } from '../term/indexed-tree.js';
import { compareKey } from '../similarity/distance.js';

export interface VectorClass {
  /** Pre-filter bucket of every member */
  readonly bucket: string;
  /** Representative vector */
  readonly vector: readonly number[];
  /** Member ids, ascending */
  readonly members: number[];
  /** Members not yet mapped */
  unmapped: number;
}

function pushTo<K>(map: Map<K, number[]>, key: K, value: number): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

const classContentKey = (cls: number, content: number): string => `${cls}:${content}`;

export class CandidateIndex<L> {
  readonly classes: VectorClass[] = [];
  /** Vector class of every node, indexed by node id */
  readonly classOf: number[];
  /** Class indices per pre-filter bucket */
  readonly bucketClasses = new Map<string, number[]>();
  /** Node ids per content id, ascending */
  readonly byContent = new Map<number, number[]>();
  private readonly unmappedByClassContent = new Map<string, number>();

  constructor(
    tree: IndexedTree<L>,
    vectors: readonly (readonly number[])[],
    /** Content id of every node, indexed by node id */
    readonly content: readonly number[]
  ) {
    const classIds = new Map<string, number>();
    this.classOf = tree.nodes.map((node) => {
      const bucket = compareKey(node);
      const key = `${bucket}\u0000${vectors[node.id].join(',')}`;
      let cls = classIds.get(key);
      if (cls === undefined) {
        cls = this.classes.length;
        classIds.set(key, cls);
        this.classes.push({ bucket, vector: vectors[node.id], members: [], unmapped: 0 });
        pushTo(this.bucketClasses, bucket, cls);
      }
      const vectorClass = this.classes[cls];
      vectorClass.members.push(node.id);
      vectorClass.unmapped++;

      pushTo(this.byContent, content[node.id], node.id);
      const countKey = classContentKey(cls, content[node.id]);
      this.unmappedByClassContent.set(countKey, (this.unmappedByClassContent.get(countKey) ?? 0) + 1);
      return cls;
    });
  }

  /** Unmapped members of a class whose content id is `content`. */
  unmappedWithContent(cls: number, content: number): number {
    return this.unmappedByClassContent.get(classContentKey(cls, content)) ?? 0;
  }

  /** Record that a node has just been mapped. */
  markMapped(id: number): void {
    const cls = this.classOf[id];
    this.classes[cls].unmapped--;
    const countKey = classContentKey(cls, this.content[id]);
    this.unmappedByClassContent.set(countKey, (this.unmappedByClassContent.get(countKey) ?? 1) - 1);
  }
}

/**
 * Ids from an ascending list in order of increasing distance between their
 * position and `target`, lower id first on ties. `position` must not decrease
 * along the list. Rejected ids are skipped; the list is walked outwards from
 * the target, so the nearest accepted ids are found without a full scan.
 */
export function* nearestFirst(
  ids: readonly number[],
  position: (id: number) => number,
  target: number,
  accept: (id: number) => boolean
): Generator<number, void, undefined> {
  let low = 0;
  let high = ids.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (position(ids[mid]) < target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  let left = low - 1;
  let right = low;
  while (left >= 0 || right < ids.length) {
    const leftGap = left >= 0 ? target - position(ids[left]) : Infinity;
    const rightGap = right < ids.length ? position(ids[right]) - target : Infinity;
    const id = leftGap <= rightGap ? ids[left--] : ids[right++];
    if (accept(id)) yield id;
  }
}

/**
 * Merge several nearest-first sequences into one, ordered by gap then id.
 */
export function* mergeNearest(
  sources: Array<Generator<number, void, undefined>>,
  gap: (id: number) => number
): Generator<number, void, undefined> {
  const heads = sources.map((source) => source.next());

  for (;;) {
    let best = -1;
    let bestId = 0;
    let bestGap = Infinity;
    for (let i = 0; i < heads.length; i++) {
      const head = heads[i];
      if (head.done) continue;
      const headGap = gap(head.value);
      if (best < 0 || headGap < bestGap || (headGap === bestGap && head.value < bestId)) {
        best = i;
        bestId = head.value;
        bestGap = headGap;
      }
    }
    if (best < 0) return;
    yield bestId;
    heads[best] = sources[best].next();
  }
}
