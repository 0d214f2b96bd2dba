/**
 * Tests for the bidirectional node mapping.
 */
import { describe, it, expect } from 'vitest';
import { Mapping } from '../../../../src/core/matcher/mapping.js';
import { ContractError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('Mapping', () => {
  it('should look up both directions', () => {
    const mapping = new Mapping();
    mapping.link(2, 5);

    expect(mapping.newFor(2)).toBe(5);
    expect(mapping.oldFor(5)).toBe(2);
    expect(mapping.hasOld(2)).toBe(true);
    expect(mapping.hasNew(5)).toBe(true);
    expect(mapping.hasOld(5)).toBe(false);
    expect(mapping.size).toBe(1);
  });

  it('should return undefined for unmapped ids', () => {
    const mapping = new Mapping();

    expect(mapping.newFor(0)).toBeUndefined();
    expect(mapping.oldFor(0)).toBeUndefined();
  });

  it('should refuse to map an old node twice', () => {
    const mapping = new Mapping();
    mapping.link(1, 1);

    expect(() => mapping.link(1, 2)).toThrow(ContractError);
    expect(mapping.size).toBe(1);
  });

  it('should refuse to map a new node twice', () => {
    const mapping = new Mapping();
    mapping.link(1, 1);

    try {
      mapping.link(3, 1);
      expect.fail('expected a ContractError');
    } catch (error) {
      expect(error).toMatchObject({
        code: ErrorCodes.MAPPING_CONFLICT,
        details: { oldId: 3, newId: 1, existingOld: 1 },
      });
    }
    expect(mapping.hasOld(3)).toBe(false);
  });

  it('should list pairs ordered by old id', () => {
    const mapping = new Mapping();
    mapping.link(4, 0);
    mapping.link(1, 3);
    mapping.link(2, 2);

    expect(mapping.pairs()).toEqual([
      { oldId: 1, newId: 3 },
      { oldId: 2, newId: 2 },
      { oldId: 4, newId: 0 },
    ]);
  });
});
