import type {
  Board,
  CellPosition,
  House
} from '../Board.ts';
import type {
  Deduction,
  Strategy
} from './Strategy.ts';

import {
  getCellIndex,
  getCellRef
} from '../coordinates.ts';
import { ensureNonNullable } from '../typeGuards.ts';

const PAIR_SIZE = 2;

/**
 * Naked twins: two empty cells of a house left with the same two candidates
 * take those two digits between them, so no other cell of the house can.
 * Those digits are struck from a working copy of the candidates, house by
 * house. A cell struck down to one candidate is placed; a cell struck down
 * to none is a contradiction.
 */
export class NakedTwinsStrategy implements Strategy {
  public tryApply(board: Board): Deduction | null {
    const candidates = new Map<number, number[]>();
    for (const { col, row } of board.emptyCells()) {
      candidates.set(getCellIndex(row, col), board.candidates(row, col));
    }

    const struckBy = new Map<number, string>();
    for (const house of board.houses) {
      strikeTwins(house, candidates, struckBy);
    }

    let single: Deduction | null = null;
    for (const { col, row } of board.emptyCells()) {
      const index = getCellIndex(row, col);
      const twins = struckBy.get(index);
      if (twins === undefined) {
        continue;
      }
      const left = ensureNonNullable(candidates.get(index));
      if (left.length === 0) {
        return { note: `Naked twins ${twins} leave no candidates for ${getCellRef(row, col)}`, type: 'contradiction' };
      }
      if (left.length === 1 && !single) {
        const value = ensureNonNullable(left[0]);
        single = { col, note: `Naked twins ${twins}: ${getCellRef(row, col)}=${String(value)}`, row, type: 'placement', value };
      }
    }
    return single;
  }
}

function describeTwins(first: CellPosition, second: CellPosition, house: House): string {
  return `${getCellRef(first.row, first.col)} ${getCellRef(second.row, second.col)} (${house.type} ${String(house.id)})`;
}

function sameCandidates(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

function strikeTwins(house: House, candidates: Map<number, number[]>, struckBy: Map<number, string>): void {
  const open = house.cells.filter((cell) => candidates.has(getCellIndex(cell.row, cell.col)));
  for (let i = 0; i < open.length; i++) {
    const first = ensureNonNullable(open[i]);
    for (let j = i + 1; j < open.length; j++) {
      const second = ensureNonNullable(open[j]);
      const pair = ensureNonNullable(candidates.get(getCellIndex(first.row, first.col)));
      if (pair.length !== PAIR_SIZE || !sameCandidates(pair, ensureNonNullable(candidates.get(getCellIndex(second.row, second.col))))) {
        continue;
      }
      for (const cell of open) {
        if (cell === first || cell === second) {
          continue;
        }
        const index = getCellIndex(cell.row, cell.col);
        const current = ensureNonNullable(candidates.get(index));
        const kept = current.filter((value) => !pair.includes(value));
        if (kept.length < current.length) {
          candidates.set(index, kept);
          if (!struckBy.has(index)) {
            struckBy.set(index, describeTwins(first, second, house));
          }
        }
      }
    }
  }
}
