/**
 * Construction, folding and equality for whole terms.
 */
import type { Annotation, Category, LeafKey, Range, Span, Syntax, Term } from './types.js';
import { childGroups, leafPayload, mapSyntax, syntaxChildren } from './syntax.js';

const EMPTY_RANGE: Range = { start: 0, end: 0 };
const EMPTY_SPAN: Span = { start: { line: 1, column: 1 }, end: { line: 1, column: 1 } };

/** Leaf keys for primitive payloads. */
export function defaultLeafKey<L>(value: L): string {
  return String(value);
}

/**
 * Build a term. Position defaults to an empty range at 1:1, for callers that
 * construct trees without source text.
 */
export function createTerm<L>(
  category: Category,
  syntax: Syntax<L, Term<L>>,
  location: { range?: Range; span?: Span } = {}
): Term<L> {
  const annotation: Annotation = Object.freeze({
    range: Object.freeze({ ...(location.range ?? EMPTY_RANGE) }),
    span: Object.freeze({
      start: Object.freeze({ ...(location.span ?? EMPTY_SPAN).start }),
      end: Object.freeze({ ...(location.span ?? EMPTY_SPAN).end }),
    }),
    category,
  });
  return { annotation, syntax };
}

/**
 * Bottom-up fold. The algebra sees each layer with its children already
 * folded. Runs on an explicit stack, so depth is only bounded by memory.
 */
export function foldTerm<L, R>(
  term: Term<L>,
  algebra: (annotation: Annotation, syntax: Syntax<L, R>) => R
): R {
  // Parents precede their children here, so a reverse sweep folds children first.
  const order: Term<L>[] = [];
  const stack: Term<L>[] = [term];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    order.push(current);
    for (const child of syntaxChildren(current.syntax)) stack.push(child);
  }

  // Boxed so that an R which itself admits undefined stays distinguishable.
  const results = new Map<Term<L>, { value: R }>();
  const folded = (child: Term<L>): R => {
    const result = results.get(child);
    if (!result) {
      throw new Error('foldTerm visited a parent before its child');
    }
    return result.value;
  };

  for (let i = order.length - 1; i >= 0; i--) {
    const current = order[i];
    results.set(current, { value: algebra(current.annotation, mapSyntax(current.syntax, folded)) });
  }
  return folded(term);
}

/**
 * Number of nodes in the term, itself included.
 */
export function termSize<L>(term: Term<L>): number {
  let size = 0;
  const stack: Term<L>[] = [term];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    size++;
    for (const child of syntaxChildren(current.syntax)) stack.push(child);
  }
  return size;
}

/**
 * Whether two nodes carry the same local content: category, kind and leaf
 * payload. Children are not compared.
 */
export function ownContentEquals<L>(
  a: Term<L>,
  b: Term<L>,
  leafKey: LeafKey<L> = defaultLeafKey
): boolean {
  if (a.annotation.category !== b.annotation.category) return false;
  if (a.syntax.kind !== b.syntax.kind) return false;

  const payloadA = leafPayload(a.syntax);
  const payloadB = leafPayload(b.syntax);
  if (payloadA === null || payloadB === null) {
    return payloadA === payloadB;
  }
  return leafKey(payloadA.value) === leafKey(payloadB.value);
}

/**
 * Structural equality, ignoring byte ranges and spans.
 */
export function termEquals<L>(
  a: Term<L>,
  b: Term<L>,
  leafKey: LeafKey<L> = defaultLeafKey
): boolean {
  const stack: Array<[Term<L>, Term<L>]> = [[a, b]];

  while (stack.length > 0) {
    const pair = stack.pop();
    if (!pair) break;
    const [left, right] = pair;

    if (!ownContentEquals(left, right, leafKey)) return false;

    const groupsLeft = childGroups(left.syntax);
    const groupsRight = childGroups(right.syntax);
    if (groupsLeft.length !== groupsRight.length) return false;

    for (let g = 0; g < groupsLeft.length; g++) {
      const gl = groupsLeft[g];
      const gr = groupsRight[g];
      if (gl.key !== gr.key || gl.children.length !== gr.children.length) return false;
      for (let i = 0; i < gl.children.length; i++) {
        stack.push([gl.children[i], gr.children[i]]);
      }
    }
  }

  return true;
}

/**
 * Canonical string for a term's content. Two terms have the same key exactly
 * when termEquals holds for them (given the same leafKey).
 *
 * The key is a flat pre-order token list: per node its category, kind, leaf
 * key and group count, then each group's key and length. Its size is linear
 * in the number of nodes.
 */
export function contentKey<L>(term: Term<L>, leafKey: LeafKey<L> = defaultLeafKey): string {
  const tokens: Array<string | number | null> = [];
  const stack: Term<L>[] = [term];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;

    const payload = leafPayload(current.syntax);
    const groups = childGroups(current.syntax);
    tokens.push(
      current.annotation.category,
      current.syntax.kind,
      payload === null ? null : leafKey(payload.value),
      groups.length
    );
    for (const group of groups) tokens.push(group.key, group.children.length);

    const children = groups.flatMap((group) => group.children);
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }

  return JSON.stringify(tokens);
}
