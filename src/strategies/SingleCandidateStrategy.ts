import type { Board } from '../Board.ts';
import type {
  Deduction,
  PlacementDeduction,
  Strategy
} from './Strategy.ts';

import { getCellRef } from '../coordinates.ts';
import { ensureNonNullable } from '../typeGuards.ts';

/**
 * Naked single: an empty cell with one candidate left must take it. An empty
 * cell with none left means the board is a dead end.
 */
export class SingleCandidateStrategy implements Strategy {
  public tryApply(board: Board): Deduction | null {
    let single: null | PlacementDeduction = null;
    for (const { col, row } of board.emptyCells()) {
      const cands = board.candidates(row, col);
      if (cands.length === 0) {
        return { note: `No candidates left for ${getCellRef(row, col)}`, type: 'contradiction' };
      }
      if (cands.length === 1 && !single) {
        const value = ensureNonNullable(cands[0]);
        single = { col, note: `Single candidate: ${getCellRef(row, col)}=${String(value)}`, row, type: 'placement', value };
      }
    }
    return single;
  }
}
