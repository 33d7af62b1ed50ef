import type { FoldState } from './types.js';

/**
 * Fold state for one listing session: the default applied to threads nobody
 * touched, and the threads the user folded or unfolded individually.
 */
export class FoldSession {
  private readonly overrideTable = new Map<string, FoldState>();

  constructor(public globalDefault = false) {}

  saveState(rootId: string, state: FoldState): void {
    this.overrideTable.set(rootId, state);
  }

  lookupState(rootId: string): FoldState | null {
    return this.overrideTable.get(rootId) ?? null;
  }

  resetOverrides(): void {
    this.overrideTable.clear();
  }

  overrides(): ReadonlyMap<string, FoldState> {
    return this.overrideTable;
  }
}
