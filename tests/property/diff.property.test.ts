/**
 * Property tests for gram extraction, matching and edit scripts over
 * randomly generated terms.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { diffTerms } from '../../src/core/diff/differ.js';
import { IndexedTree } from '../../src/core/term/indexed-tree.js';
import { pqGrams } from '../../src/core/gram/pq-grams.js';
import { subtreeVectors } from '../../src/core/gram/feature-vector.js';
import type { Term } from '../../src/core/term/types.js';
import { call, coverage, fixed, ident, indexed, leaf } from '../helpers/terms.js';

// Few labels and values, so random pairs share plenty of structure.
const leafArb: fc.Arbitrary<Term> = fc.oneof(
  fc.constantFrom('a', 'b', 'c').map((value) => ident(value)),
  fc.constantFrom('s', 't').map((value) => leaf('StringLiteral', value))
);

const termArb: fc.Memo<Term> = fc.memo((depth: number): fc.Arbitrary<Term> => {
  if (depth <= 1) return leafArb;
  const child = termArb(depth - 1);
  return fc.oneof(
    leafArb,
    fc
      .tuple(fc.constantFrom('Program' as const, 'ExpressionStatements' as const), fc.array(child, { maxLength: 3 }))
      .map(([category, children]) => indexed(category, children)),
    fc.array(child, { minLength: 1, maxLength: 3 }).map((children) => fixed('BinaryOperator', children)),
    fc
      .tuple(fc.constantFrom('f', 'g'), fc.array(child, { maxLength: 2 }))
      .map(([callee, args]) => call(callee, args))
  );
});

const treeArb = termArb(4);

describe('gram properties', () => {
  it('should give every node one gram of the configured shape', () => {
    fc.assert(
      fc.property(treeArb, fc.integer({ min: 1, max: 3 }), fc.integer({ min: 1, max: 4 }), (term, p, q) => {
        const tree = new IndexedTree(term);
        const grams = pqGrams(tree, { p, q });

        expect(grams).toHaveLength(tree.size);
        for (const gram of grams) {
          expect(gram.stem).toHaveLength(p);
          expect(gram.base).toHaveLength(q);
        }
      })
    );
  });

  it('should count every gram of a subtree into its vector', () => {
    fc.assert(
      fc.property(treeArb, fc.integer({ min: 1, max: 32 }), (term, dimension) => {
        const tree = new IndexedTree(term);
        const vectors = subtreeVectors(tree, pqGrams(tree, { p: 2, q: 3 }), dimension);

        for (const node of tree.nodes) {
          const total = vectors[node.id].reduce((sum, count) => sum + count, 0);
          expect(total).toBe(node.size);
        }
      })
    );
  });
});

describe('diff properties', () => {
  it('should copy every node of a term compared with itself', () => {
    fc.assert(
      fc.property(treeArb, (term) => {
        const { summary, newTree } = diffTerms(term, term);

        expect(summary).toEqual({ insert: 0, delete: 0, replace: 0, copy: newTree.size, moved: 0 });
      })
    );
  });

  it('should cover every old and new node exactly once', () => {
    fc.assert(
      fc.property(treeArb, treeArb, fc.double({ min: 0, max: 1, noNaN: true }), (oldTerm, newTerm, threshold) => {
        const { editScript, oldTree, newTree } = diffTerms(oldTerm, newTerm, { config: { threshold } });
        const counts = coverage(editScript);

        expect(counts.old.size).toBe(oldTree.size);
        expect(counts.new.size).toBe(newTree.size);
        for (const count of [...counts.old.values(), ...counts.new.values()]) {
          expect(count).toBe(1);
        }
      })
    );
  });

  it('should only pair nodes of the same category and kind', () => {
    fc.assert(
      fc.property(treeArb, treeArb, (oldTerm, newTerm) => {
        const { mapping = [], oldTree, newTree } = diffTerms(oldTerm, newTerm, {
          config: { threshold: 1 },
          includeMapping: true,
        });

        for (const { oldId, newId } of mapping) {
          expect(oldTree.node(oldId).category).toBe(newTree.node(newId).category);
          expect(oldTree.node(oldId).kind).toBe(newTree.node(newId).kind);
        }
      })
    );
  });

  it('should start every inserted region at the root or under a kept node', () => {
    fc.assert(
      fc.property(treeArb, treeArb, (oldTerm, newTerm) => {
        const { editScript, mapping = [] } = diffTerms(oldTerm, newTerm, { includeMapping: true });
        const keptNew = new Set(mapping.map((pair) => pair.newId));

        for (const op of editScript) {
          if (op.type !== 'insert') continue;
          expect(op.after.parent === null || keptNew.has(op.after.parent)).toBe(true);
          expect(op.nodes[0]).toBe(op.after.id);
        }
      })
    );
  });
});
