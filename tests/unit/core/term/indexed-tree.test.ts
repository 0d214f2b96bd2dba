/**
 * Tests for the pre-order indexed tree view.
 */
import { describe, it, expect } from 'vitest';
import { IndexedTree } from '../../../../src/core/term/indexed-tree.js';
import { createTerm } from '../../../../src/core/term/term.js';
import { ident, plus, program, call, deepChain } from '../../../helpers/terms.js';

describe('IndexedTree', () => {
  // 0 Program
  //   1 BinaryOperator
  //     2 a  3 +  4 b
  //   5 FunctionCall
  //     6 f  7 x
  const tree = new IndexedTree(program([plus('a', 'b'), call('f', [ident('x')])]));

  it('should number nodes in pre-order', () => {
    expect(tree.size).toBe(8);
    expect(tree.nodes.map((n) => n.category)).toEqual([
      'Program',
      'BinaryOperator',
      'Identifier',
      'MathOperator',
      'Identifier',
      'FunctionCall',
      'Identifier',
      'Identifier',
    ]);
  });

  it('should record parents, children and depth', () => {
    expect(tree.node(0).parent).toBeNull();
    expect(tree.node(0).children).toEqual([1, 5]);
    expect(tree.node(1).children).toEqual([2, 3, 4]);
    expect(tree.node(7).parent).toBe(5);
    expect(tree.node(7).depth).toBe(2);
  });

  it('should compute subtree sizes', () => {
    expect(tree.nodes.map((n) => n.size)).toEqual([8, 4, 1, 1, 1, 3, 1, 1]);
  });

  it('should record sibling indexes', () => {
    expect(tree.node(4).siblingIndex).toBe(2);
    expect(tree.node(5).siblingIndex).toBe(1);
  });

  it('should resolve child groups to ids', () => {
    expect(tree.node(5).groups).toEqual([
      { key: 'callee', arity: 'fixed', children: [6] },
      { key: 'args', arity: 'variable', children: [7] },
    ]);
  });

  it('should list subtree ids as a contiguous range', () => {
    expect(tree.subtreeIds(1)).toEqual([1, 2, 3, 4]);
    expect(tree.subtreeIds(7)).toEqual([7]);
  });

  it('should scale positions to [0, 1]', () => {
    expect(tree.relativePosition(0)).toBe(0);
    expect(tree.relativePosition(7)).toBe(1);
    expect(new IndexedTree(ident('solo')).relativePosition(0)).toBe(0);
  });

  it('should reject unknown ids', () => {
    expect(() => tree.node(8)).toThrow(RangeError);
  });

  it('should index parse errors like any other node', () => {
    const broken = new IndexedTree(
      createTerm('ParseError', { kind: 'ParseError', children: [ident('x'), ident('y')] })
    );

    expect(broken.node(0).kind).toBe('ParseError');
    expect(broken.node(0).children).toEqual([1, 2]);
  });

  it('should index very deep trees', () => {
    const deep = new IndexedTree(deepChain(50_000, 'x'));

    expect(deep.size).toBe(50_001);
    expect(deep.node(0).size).toBe(50_001);
    expect(deep.node(50_000).depth).toBe(50_000);
  });
});
