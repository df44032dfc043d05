import type { HouseType } from './Board.ts';

import { getCellRef } from './coordinates.ts';

export class SudokuError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A digit was written into a cell whose row, column or box already holds it.
 * Raised by {@link Board.set}; the solver only writes candidates, so this
 * signals a broken invariant and is never caught inside the solver.
 */
export class ConstraintViolationError extends SudokuError {
  public constructor(
    public readonly row: number,
    public readonly col: number,
    public readonly value: number,
    public readonly house: HouseType
  ) {
    super(`Cannot place ${String(value)} at ${getCellRef(row, col)}: already present in its ${house}`);
  }
}

export class GridShapeError extends SudokuError {}

export class PuzzleParseError extends SudokuError {}

export class TraceFormatError extends SudokuError {}
