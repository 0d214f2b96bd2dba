/**
 * Injective partial correspondence between old and new node ids.
 */
import { ContractError, ErrorCodes } from '../../utils/errors.js';

export interface MappingPair {
  readonly oldId: number;
  readonly newId: number;
}

/**
 * Bidirectional map. Linking a node that is already linked is a contract
 * violation, so the mapping stays injective both ways.
 */
export class Mapping {
  private readonly oldToNew = new Map<number, number>();
  private readonly newToOld = new Map<number, number>();

  link(oldId: number, newId: number): void {
    const existingNew = this.oldToNew.get(oldId);
    const existingOld = this.newToOld.get(newId);
    if (existingNew !== undefined || existingOld !== undefined) {
      throw new ContractError(
        ErrorCodes.MAPPING_CONFLICT,
        `Cannot map old node ${oldId} to new node ${newId}: already mapped`,
        { oldId, newId, existingNew, existingOld }
      );
    }
    this.oldToNew.set(oldId, newId);
    this.newToOld.set(newId, oldId);
  }

  hasOld(oldId: number): boolean {
    return this.oldToNew.has(oldId);
  }

  hasNew(newId: number): boolean {
    return this.newToOld.has(newId);
  }

  newFor(oldId: number): number | undefined {
    return this.oldToNew.get(oldId);
  }

  oldFor(newId: number): number | undefined {
    return this.newToOld.get(newId);
  }

  get size(): number {
    return this.oldToNew.size;
  }

  /** Pairs ordered by old id. */
  pairs(): MappingPair[] {
    return [...this.oldToNew.entries()]
      .sort((a, b) => a[0] - b[0])
      .map(([oldId, newId]) => ({ oldId, newId }));
  }
}
