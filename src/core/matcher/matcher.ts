/**
 * Approximate tree matching over pq-gram feature vectors.
 *
 * 1. Top-down: the two roots are paired whenever the pre-filter allows it.
 *    Then old nodes, largest subtree first, take the best-ranked unmapped new
 *    node that passes the pre-filter and the threshold and is not claimed
 *    more strongly by another old node. Every accepted pair proposes
 *    pairings for its children.
 * 2. Bottom-up: small old nodes still unmapped are matched to new nodes with
 *    exactly the same content, recovering moved tokens.
 *
 * Candidates rank by distance, then identical content first, then position
 * gap, then id. Distances are computed once per pair of vector classes, and
 * candidates are visited nearest position first, so repeated shapes do not
 * make a node compare against its whole bucket.
 *
 * The top-down pass is sequential: each acceptance changes what later nodes
 * may match.
 */
import { ContentInterner } from '../term/content-ids.js';
import { canCompare, vectorDistance } from '../similarity/distance.js';
import { DiffAbortedError } from '../../utils/errors.js';
import { CandidateIndex, mergeNearest, nearestFirst } from './candidate-index.js';
import { Mapping } from './mapping.js';
import type { MatchInput, MatchOptions, MatchResult, MatchStats } from './types.js';

interface RankedClass {
  cls: number;
  distance: number;
}

interface Candidate {
  id: number;
  distance: number;
  /** Same content as the old node */
  same: boolean;
  /** Difference in sibling index */
  gap: number;
}

function byRank(a: Candidate, b: Candidate): number {
  return a.distance - b.distance || Number(b.same) - Number(a.same) || a.gap - b.gap || a.id - b.id;
}

const DISTANCE_CACHE_LIMIT = 1 << 20;

/**
 * Matches the nodes of two trees. One instance serves one comparison.
 */
export class TreeMatcher<L> {
  private readonly mapping = new Mapping();
  private readonly stats: MatchStats = { topDown: 0, propagated: 0, recovered: 0 };
  private readonly oldIndex: CandidateIndex<L>;
  private readonly newIndex: CandidateIndex<L>;
  private readonly distances = new Map<number, number>();
  private readonly rankedClasses = new Map<number, RankedClass[]>();

  constructor(
    private readonly input: MatchInput<L>,
    private readonly options: MatchOptions<L>
  ) {
    const interner = new ContentInterner<L>(options.leafKey);
    this.oldIndex = new CandidateIndex(input.oldTree, input.oldVectors, interner.intern(input.oldTree));
    this.newIndex = new CandidateIndex(input.newTree, input.newVectors, interner.intern(input.newTree));
  }

  match(): MatchResult {
    this.topDown();
    this.bottomUp();
    return { mapping: this.mapping, stats: { ...this.stats } };
  }

  private checkAborted(phase: string): void {
    if (this.options.signal?.aborted) {
      throw new DiffAbortedError(`Comparison aborted during ${phase}`, { phase });
    }
  }

  private link(oldId: number, newId: number, phase: keyof MatchStats): void {
    this.mapping.link(oldId, newId);
    this.oldIndex.markMapped(oldId);
    this.newIndex.markMapped(newId);
    this.stats[phase]++;
  }

  private classDistance(oldClass: number, newClass: number): number {
    const key = oldClass * this.newIndex.classes.length + newClass;
    const cached = this.distances.get(key);
    if (cached !== undefined) return cached;

    const distance = vectorDistance(
      this.oldIndex.classes[oldClass].vector,
      this.newIndex.classes[newClass].vector,
      this.options.metric
    );
    if (this.distances.size >= DISTANCE_CACHE_LIMIT) this.distances.clear();
    this.distances.set(key, distance);
    return distance;
  }

  private distance(oldId: number, newId: number): number {
    return this.classDistance(this.oldIndex.classOf[oldId], this.newIndex.classOf[newId]);
  }

  /**
   * New classes of the old class's bucket within the threshold, closest first.
   */
  private rankNewClasses(oldClass: number): RankedClass[] {
    const cached = this.rankedClasses.get(oldClass);
    if (cached) return cached;

    const { bucket, members } = this.oldIndex.classes[oldClass];
    const ranked = (this.newIndex.bucketClasses.get(bucket) ?? [])
      .map((cls) => ({ cls, distance: this.classDistance(oldClass, cls) }))
      .filter((entry) => entry.distance <= this.options.threshold)
      .sort((a, b) => a.distance - b.distance || a.cls - b.cls);
    // Only worth keeping when another member will ask again.
    if (members.length > 1) this.rankedClasses.set(oldClass, ranked);
    return ranked;
  }

  private topDown(): void {
    const { oldTree, newTree } = this.input;
    this.checkAborted('top-down matching');

    if (canCompare(oldTree.node(0), newTree.node(0))) {
      this.link(0, 0, 'topDown');
      this.propagate(0, 0);
    }

    const order = oldTree.nodes
      .map((node) => node.id)
      .sort((a, b) => oldTree.node(b).size - oldTree.node(a).size || a - b);

    for (const oldId of order) {
      this.checkAborted('top-down matching');
      if (this.mapping.hasOld(oldId)) continue;

      const newId = this.findCandidate(oldId);
      if (newId === undefined) continue;
      this.link(oldId, newId, 'topDown');
      this.propagate(oldId, newId);
    }
  }

  /**
   * Walk the ranked candidates of an old node, at most `maxCandidates` of
   * them, and return the first one no other old node claims more strongly.
   */
  private findCandidate(oldId: number): number | undefined {
    const { oldTree, newTree } = this.input;
    const content = this.oldIndex.content[oldId];
    const target = oldTree.relativePosition(oldId);
    const position = (id: number): number => newTree.relativePosition(id);
    const gap = (id: number): number => Math.abs(position(id) - target);

    let budget = this.options.maxCandidates;
    const pick = (candidates: Iterable<number>, distance: number, same: boolean): number | undefined => {
      for (const newId of candidates) {
        if (budget <= 0) return undefined;
        budget--;
        if (!this.isClaimedElsewhere(newId, distance, same)) return newId;
      }
      return undefined;
    };

    const ranked = this.rankNewClasses(this.oldIndex.classOf[oldId]);
    for (let start = 0; start < ranked.length && budget > 0; ) {
      const { distance } = ranked[start];
      let end = start;
      while (end < ranked.length && ranked[end].distance === distance) end++;
      const tier = ranked
        .slice(start, end)
        .filter((entry) => this.newIndex.classes[entry.cls].unmapped > 0)
        .map((entry) => entry.cls);
      start = end;
      if (tier.length === 0) continue;

      const inTier = new Set(tier);
      const open = (id: number): boolean =>
        !this.mapping.hasNew(id) && inTier.has(this.newIndex.classOf[id]);

      const sameContent = nearestFirst(this.newIndex.byContent.get(content) ?? [], position, target, open);
      const found = pick(sameContent, distance, true);
      if (found !== undefined) return found;

      const others = mergeNearest(
        tier.map((cls) =>
          nearestFirst(
            this.newIndex.classes[cls].members,
            position,
            target,
            (id) => open(id) && this.newIndex.content[id] !== content
          )
        ),
        gap
      );
      const next = pick(others, distance, false);
      if (next !== undefined) return next;
    }
    return undefined;
  }

  /**
   * Whether another unmapped old node ranks the candidate strictly higher
   * than the old node asking, which sits at `distance` from it.
   */
  private isClaimedElsewhere(newId: number, distance: number, sameContent: boolean): boolean {
    const newClass = this.newIndex.classOf[newId];
    const content = this.newIndex.content[newId];

    for (const oldClass of this.oldIndex.bucketClasses.get(this.newIndex.classes[newClass].bucket) ?? []) {
      if (this.oldIndex.classes[oldClass].unmapped === 0) continue;
      const other = this.classDistance(oldClass, newClass);
      if (other < distance) return true;
      if (other === distance && !sameContent && this.oldIndex.unmappedWithContent(oldClass, content) > 0) {
        return true;
      }
    }
    return false;
  }

  /**
   * Propose pairings for the children of an accepted pair, transitively.
   * Fixed groups pair by position, variable groups by best match.
   */
  private propagate(oldId: number, newId: number): void {
    const { oldTree, newTree } = this.input;
    const work: Array<[number, number]> = [[oldId, newId]];

    const tryLink = (o: number, n: number): void => {
      if (this.mapping.hasOld(o) || this.mapping.hasNew(n)) return;
      if (!canCompare(oldTree.node(o), newTree.node(n))) return;
      if (this.distance(o, n) > this.options.threshold) return;
      this.link(o, n, 'propagated');
      work.push([o, n]);
    };

    while (work.length > 0) {
      const pair = work.pop();
      if (!pair) break;
      const [o, n] = pair;
      const newGroups = new Map(newTree.node(n).groups.map((group) => [group.key, group]));

      for (const oldGroup of oldTree.node(o).groups) {
        const newGroup = newGroups.get(oldGroup.key);
        if (!newGroup || newGroup.arity !== oldGroup.arity) continue;

        if (oldGroup.arity === 'fixed') {
          const shared = Math.min(oldGroup.children.length, newGroup.children.length);
          for (let i = 0; i < shared; i++) {
            tryLink(oldGroup.children[i], newGroup.children[i]);
          }
          continue;
        }

        const byContent = new Map<number, number[]>();
        for (const child of newGroup.children) {
          const key = this.newIndex.content[child];
          const ids = byContent.get(key);
          if (ids) {
            ids.push(child);
          } else {
            byContent.set(key, [child]);
          }
        }

        for (const oldChild of oldGroup.children) {
          if (this.mapping.hasOld(oldChild)) continue;
          const best = this.bestSibling(oldChild, newGroup.children, byContent);
          if (best !== undefined) tryLink(oldChild, best);
        }
      }
    }
  }

  /**
   * Best unmapped match for an old child among the new siblings.
   */
  private bestSibling(
    oldChild: number,
    siblings: readonly number[],
    siblingsByContent: Map<number, number[]>
  ): number | undefined {
    const { oldTree, newTree } = this.input;
    const oldNode = oldTree.node(oldChild);
    const content = this.oldIndex.content[oldChild];
    const siblingIndex = (id: number): number => newTree.node(id).siblingIndex;

    // Nothing outranks an identical sibling at distance 0.
    for (const newId of nearestFirst(
      siblingsByContent.get(content) ?? [],
      siblingIndex,
      oldNode.siblingIndex,
      (id) => !this.mapping.hasNew(id)
    )) {
      if (this.distance(oldChild, newId) === 0) return newId;
    }

    let best: Candidate | undefined;
    for (const newId of siblings) {
      if (this.mapping.hasNew(newId) || !canCompare(oldNode, newTree.node(newId))) continue;
      const candidate: Candidate = {
        id: newId,
        distance: this.distance(oldChild, newId),
        same: this.newIndex.content[newId] === content,
        gap: Math.abs(oldNode.siblingIndex - siblingIndex(newId)),
      };
      if (candidate.distance > this.options.threshold) continue;
      if (!best || byRank(candidate, best) < 0) best = candidate;
    }
    return best?.id;
  }

  /**
   * Exact-content recovery for small nodes the similarity search missed.
   */
  private bottomUp(): void {
    const { oldTree, newTree } = this.input;
    const limit = this.options.maxRecoverySize;
    if (limit <= 0) return;
    const position = (id: number): number => newTree.relativePosition(id);

    for (const oldNode of oldTree.nodes) {
      this.checkAborted('bottom-up recovery');
      if (oldNode.size > limit || this.mapping.hasOld(oldNode.id)) continue;

      const match = nearestFirst(
        this.newIndex.byContent.get(this.oldIndex.content[oldNode.id]) ?? [],
        position,
        oldTree.relativePosition(oldNode.id),
        (id) => !this.mapping.hasNew(id)
      ).next();
      if (match.done) continue;

      // Equal content means equal shape, so descendants line up by pre-order offset.
      for (let offset = 0; offset < oldNode.size; offset++) {
        const o = oldNode.id + offset;
        const n = match.value + offset;
        if (this.mapping.hasOld(o) || this.mapping.hasNew(n)) continue;
        this.link(o, n, 'recovered');
      }
    }
  }
}

/**
 * Match two indexed trees. See TreeMatcher.
 */
export function matchTrees<L>(input: MatchInput<L>, options: MatchOptions<L>): MatchResult {
  return new TreeMatcher(input, options).match();
}
