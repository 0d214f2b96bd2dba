/**
 * Tests for subtree content interning.
 */
import { describe, it, expect } from 'vitest';
import { ContentInterner } from '../../../../src/core/term/content-ids.js';
import { IndexedTree } from '../../../../src/core/term/indexed-tree.js';
import { deepChain, ident, plus, program } from '../../../helpers/terms.js';

describe('ContentInterner', () => {
  it('should give equal subtrees of two trees the same id', () => {
    const interner = new ContentInterner<string>();
    const before = interner.intern(new IndexedTree(plus('a', 'b')));
    const after = interner.intern(new IndexedTree(plus('a', 'c')));

    // 0 BinaryOperator, 1 a, 2 +, 3 b or c
    expect(after[1]).toBe(before[1]);
    expect(after[2]).toBe(before[2]);
    expect(after[3]).not.toBe(before[3]);
    expect(after[0]).not.toBe(before[0]);
  });

  it('should give repeated subtrees within one tree the same id', () => {
    const ids = new ContentInterner<string>().intern(new IndexedTree(program([plus('a', 'b'), plus('a', 'b')])));

    // 0 Program, 1..4 first sum, 5..8 second sum
    expect(ids.slice(1, 5)).toEqual(ids.slice(5, 9));
    expect(ids[0]).not.toBe(ids[1]);
  });

  it('should not confuse a leaf value with a nested structure', () => {
    const interner = new ContentInterner<string>();
    const [flat] = interner.intern(new IndexedTree(ident('["x"]')));
    const [nested] = interner.intern(new IndexedTree(program([ident('x')])));

    expect(flat).not.toBe(nested);
  });

  it('should honour a custom leaf key', () => {
    const interner = new ContentInterner<string>((value) => value.toLowerCase());
    const [upper] = interner.intern(new IndexedTree(ident('Foo')));
    const [lower] = interner.intern(new IndexedTree(ident('foo')));

    expect(upper).toBe(lower);
  });

  it('should intern very deep trees', () => {
    const interner = new ContentInterner<string>();
    const ids = interner.intern(new IndexedTree(deepChain(10_000, 'x')));

    expect(ids).toHaveLength(10_001);
    expect(interner.size).toBe(10_001);
  });
});
