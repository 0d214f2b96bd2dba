/**
 * Tests for end-to-end term comparison.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { diffTerms } from '../../../../src/core/diff/differ.js';
import { ConfigError, DiffAbortedError, ErrorCodes } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';
import {
  assign,
  call,
  coverage,
  deepChain,
  describeScript,
  ident,
  indexed,
  leaf,
  parseError,
  plus,
  program,
} from '../../../helpers/terms.js';

describe('diffTerms', () => {
  afterEach(() => {
    logger.setLevel('info');
    vi.restoreAllMocks();
  });

  it('should produce only unmoved copies for identical terms', () => {
    const term = program([assign('x', plus('a', 'b')), call('f', [ident('x')])]);
    const { editScript, summary, newTree } = diffTerms(term, term);

    expect(summary).toEqual({ insert: 0, delete: 0, replace: 0, copy: newTree.size, moved: 0 });
    expect(editScript.every((op) => op.type === 'copy' && op.before.id === op.after.id)).toBe(true);
  });

  it('should replace a changed leaf', () => {
    const { editScript } = diffTerms(plus('a', 'b'), plus('a', 'c'));

    expect(describeScript(editScript)).toEqual([
      { type: 'copy', before: 0, after: 0, moved: false },
      { type: 'copy', before: 1, after: 1, moved: false },
      { type: 'copy', before: 2, after: 2, moved: false },
      { type: 'replace', before: 3, after: 3 },
    ]);
  });

  it('should delete and insert everything when nothing is comparable', () => {
    const { editScript } = diffTerms(
      indexed('Program', [ident('x')]),
      indexed('Class', [leaf('StringLiteral', 'x')])
    );

    expect(describeScript(editScript)).toEqual([
      { type: 'delete', before: 0, nodes: [0, 1] },
      { type: 'insert', after: 0, nodes: [0, 1] },
    ]);
  });

  it('should insert a new statement between unchanged ones', () => {
    const oldTerm = program([assign('x', ident('1')), call('f', [])]);
    const newTerm = program([assign('x', ident('1')), call('g', [ident('y')]), call('f', [])]);

    const { editScript } = diffTerms(oldTerm, newTerm, { config: { threshold: 1 } });

    expect(describeScript(editScript)).toEqual([
      { type: 'copy', before: 0, after: 0, moved: false },
      { type: 'copy', before: 1, after: 1, moved: false },
      { type: 'copy', before: 2, after: 2, moved: false },
      { type: 'copy', before: 3, after: 3, moved: false },
      { type: 'insert', after: 4, nodes: [4, 5, 6] },
      { type: 'copy', before: 4, after: 7, moved: false },
      { type: 'copy', before: 5, after: 8, moved: false },
    ]);
  });

  it('should insert a single statement at the top', () => {
    const statements = ['a', 'b', 'c', 'd', 'e', 'f'].map((name) => assign(name, ident('1')));

    const { editScript, summary } = diffTerms(program(statements), program([assign('z', ident('1')), ...statements]));

    expect(describeScript(editScript).slice(0, 3)).toEqual([
      { type: 'copy', before: 0, after: 0, moved: false },
      { type: 'insert', after: 1, nodes: [1, 2, 3] },
      { type: 'copy', before: 1, after: 4, moved: false },
    ]);
    expect(summary).toEqual({ insert: 1, delete: 0, replace: 0, copy: 19, moved: 0 });
  });

  it('should keep long statement lists aligned after an insertion', () => {
    const statements = Array.from({ length: 500 }, (_, i) => assign(`v${i}`, ident('1')));

    const { summary } = diffTerms(program(statements), program([assign('z', ident('1')), ...statements]));

    expect(summary).toEqual({ insert: 1, delete: 0, replace: 0, copy: 1501, moved: 0 });
  });

  it('should replace only the edited value next to an insertion', () => {
    const oldTerm = program(['a', 'b', 'c', 'd'].map((name) => assign(name, ident('1'))));
    const newTerm = program([
      assign('z', ident('1')),
      assign('a', ident('1')),
      assign('b', ident('1')),
      assign('c', ident('2')),
      assign('d', ident('1')),
    ]);

    const { editScript, summary } = diffTerms(oldTerm, newTerm);

    expect(describeScript(editScript).filter((step) => step.type === 'replace')).toEqual([
      { type: 'replace', before: 9, after: 12 },
    ]);
    expect(summary).toEqual({ insert: 1, delete: 0, replace: 1, copy: 12, moved: 0 });
  });

  it('should recover deep subtrees under a changed root', () => {
    const oldTerm = program([deepChain(40, 'x')]);
    const newTerm = indexed('Class', [deepChain(40, 'x')]);

    const { editScript, summary } = diffTerms(oldTerm, newTerm, {
      config: { threshold: 0, maxRecoverySize: 100 },
    });

    expect(describeScript(editScript).slice(0, 3)).toEqual([
      { type: 'delete', before: 0, nodes: [0] },
      { type: 'insert', after: 0, nodes: [0] },
      { type: 'copy', before: 1, after: 1, moved: true },
    ]);
    expect(summary).toEqual({ insert: 1, delete: 1, replace: 0, copy: 41, moved: 1 });
  });

  it('should report a moved leaf', () => {
    const oldTerm = program([indexed('ExpressionStatements', [ident('x')]), leaf('StringLiteral', 's')]);
    const newTerm = program([leaf('StringLiteral', 's'), indexed('Class', [ident('x')])]);

    const { editScript, summary } = diffTerms(oldTerm, newTerm);

    expect(describeScript(editScript)).toEqual([
      { type: 'copy', before: 0, after: 0, moved: false },
      { type: 'delete', before: 1, nodes: [1] },
      { type: 'copy', before: 3, after: 1, moved: false },
      { type: 'insert', after: 2, nodes: [2] },
      { type: 'copy', before: 2, after: 3, moved: true },
    ]);
    expect(summary).toEqual({ insert: 1, delete: 1, replace: 0, copy: 3, moved: 1 });
  });

  it('should unwrap a parse error', () => {
    const { editScript } = diffTerms(program([parseError([ident('x')])]), program([ident('x')]), {
      config: { threshold: 1 },
    });

    expect(describeScript(editScript)).toEqual([
      { type: 'copy', before: 0, after: 0, moved: false },
      { type: 'delete', before: 1, nodes: [1] },
      { type: 'copy', before: 2, after: 1, moved: true },
    ]);
  });

  it('should cover every node exactly once', () => {
    const oldTerm = program([assign('x', plus('a', 'b')), call('f', [ident('x')])]);
    const newTerm = program([call('f', [ident('y'), ident('x')]), assign('z', ident('a'))]);

    const { editScript, oldTree, newTree } = diffTerms(oldTerm, newTerm);
    const counts = coverage(editScript);

    expect(counts.old.size).toBe(oldTree.size);
    expect(counts.new.size).toBe(newTree.size);
    expect([...counts.old.values(), ...counts.new.values()].every((count) => count === 1)).toBe(true);
  });

  it('should return the mapping only when asked', () => {
    const term = program([ident('x')]);

    expect(diffTerms(term, term).mapping).toBeUndefined();
    expect(diffTerms(term, term, { includeMapping: true }).mapping).toEqual([
      { oldId: 0, newId: 0 },
      { oldId: 1, newId: 1 },
    ]);
  });

  it('should accept the cosine metric', () => {
    const term = program([call('f', [ident('a'), ident('b')])]);

    const { summary } = diffTerms(term, term, { config: { metric: 'cosine' } });

    expect(summary).toEqual({ insert: 0, delete: 0, replace: 0, copy: 5, moved: 0 });
  });

  it('should handle very deep terms', () => {
    const term = deepChain(10_000, 'x');

    const { summary } = diffTerms(term, term);

    expect(summary.copy).toBe(10_001);
  });

  it('should reject invalid configuration', () => {
    const term = program([]);

    expect(() => diffTerms(term, term, { config: { dimension: 0 } })).toThrow(ConfigError);
    try {
      diffTerms(term, term, { config: { p: 1.5 } });
      expect.fail('expected a ConfigError');
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCodes.INVALID_CONFIG });
    }
  });

  it('should throw when aborted', () => {
    const controller = new AbortController();
    controller.abort();
    const term = program([ident('x')]);

    expect(() => diffTerms(term, term, { signal: controller.signal })).toThrow(DiffAbortedError);
  });

  it('should log comparison statistics at debug level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.setLevel('debug');
    const term = program([ident('x')]);

    diffTerms(term, term);

    expect(log).toHaveBeenCalledWith(expect.stringContaining('[diff] Compared trees'));
  });

  it('should stay quiet at the default level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const term = program([ident('x')]);

    diffTerms(term, term);

    expect(log).not.toHaveBeenCalled();
  });
});
