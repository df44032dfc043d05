import {
  describe,
  expect,
  it
} from 'vitest';

import { Board } from '../../src/Board.ts';
import { SingleCandidateStrategy } from '../../src/strategies/SingleCandidateStrategy.ts';
import {
  boardFromRows,
  DEAD_END_ROWS,
  diagonalBlanksGrid,
  HIDDEN_ONE_ROWS,
  SOLVED_ROWS
} from '../boardTestHelper.ts';

describe('SingleCandidateStrategy', () => {
  const strategy = new SingleCandidateStrategy();

  it('returns null for a complete board', () => {
    expect(strategy.tryApply(boardFromRows(SOLVED_ROWS))).toBeNull();
  });

  it('returns null when every blank has several candidates', () => {
    expect(strategy.tryApply(Board.empty())).toBeNull();
    expect(strategy.tryApply(boardFromRows(HIDDEN_ONE_ROWS))).toBeNull();
  });

  it('places the first cell with a single candidate', () => {
    expect(strategy.tryApply(Board.fromGrid(diagonalBlanksGrid()))).toEqual({
      col: 0,
      note: 'Single candidate: A1=1',
      row: 0,
      type: 'placement',
      value: 1
    });
  });

  it('reports a blank with no candidates', () => {
    const board = boardFromRows(DEAD_END_ROWS);
    board.set(0, 7, 8);
    expect(strategy.tryApply(board)).toEqual({ note: 'No candidates left for I1', type: 'contradiction' });
  });

  it('prefers a contradiction found after a single', () => {
    // I1 can only take 9; F6 is blocked by box 5, row 6 and column F together
    const board = boardFromRows([
      '12345678.',
      '.........',
      '.........',
      '...12....',
      '...34....',
      '578......',
      '.........',
      '.....9...',
      '.........'
    ]);
    expect(board.candidates(0, 8)).toEqual([9]);
    expect(strategy.tryApply(board)).toEqual({ note: 'No candidates left for F6', type: 'contradiction' });
  });
});
