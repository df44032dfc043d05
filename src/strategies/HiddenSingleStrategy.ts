import type {
  Board,
  House
} from '../Board.ts';
import type {
  Deduction,
  Strategy
} from './Strategy.ts';

import {
  DIGITS,
  getCellRef
} from '../coordinates.ts';
import { ensureNonNullable } from '../typeGuards.ts';

export class HiddenSingleStrategy implements Strategy {
  public tryApply(board: Board): Deduction | null {
    for (const house of board.houses) {
      const deduction = this.scanHouse(board, house);
      if (deduction) {
        return deduction;
      }
    }
    return null;
  }

  private scanHouse(board: Board, house: House): Deduction | null {
    for (const digit of DIGITS) {
      if (house.cells.some((cell) => board.get(cell.row, cell.col) === digit)) {
        continue;
      }
      const spots = house.cells.filter((cell) => board.isCandidate(cell.row, cell.col, digit));
      if (spots.length === 0) {
        return { note: `No place left for ${String(digit)} in ${house.type} ${String(house.id)}`, type: 'contradiction' };
      }
      if (spots.length === 1) {
        const { col, row } = ensureNonNullable(spots[0]);
        return {
          col,
          note: `Hidden single: ${getCellRef(row, col)}=${String(digit)} (${house.type} ${String(house.id)})`,
          row,
          type: 'placement',
          value: digit
        };
      }
    }
    return null;
  }
}
