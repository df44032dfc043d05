import {
  assertCoordinate,
  BOX_SIZE,
  CELL_COUNT,
  DIGITS,
  EMPTY,
  getBoxIndex,
  getCellIndex,
  GRID_SIZE,
  MAX_DIGIT
} from './coordinates.ts';
import {
  ConstraintViolationError,
  GridShapeError
} from './errors.ts';
import {
  assertCellValue,
  ensureNonNullable,
  isCellValue,
  isDigit
} from './typeGuards.ts';

export interface CellPosition {
  readonly col: number;
  readonly row: number;
}

export interface Conflict {
  readonly cells: readonly CellPosition[];
  readonly house: House;
  readonly value: number;
}

export type Grid = readonly (readonly number[])[];

export interface House {
  readonly cells: readonly CellPosition[];
  readonly id: number;
  readonly type: HouseType;
}

export type HouseType = 'box' | 'column' | 'row';

// One slot per digit 0-9 so a digit indexes its own count.
const COUNT_STRIDE = MAX_DIGIT + 1;

const HOUSES: readonly House[] = buildHouses();

/**
 * A 9x9 Sudoku grid. Besides the cell values it keeps, per row, column and
 * box, how many times each digit occurs, so candidate queries never rescan
 * the grid.
 */
export class Board {
  public get filledCount(): number {
    return this._filledCount;
  }

  /** Rows 1-9, then columns 1-9, then boxes 1-9 (left to right, top to bottom). */
  public get houses(): readonly House[] {
    return HOUSES;
  }

  private _filledCount = 0;
  private readonly boxCounts: number[] = new Array<number>(GRID_SIZE * COUNT_STRIDE).fill(0);
  private readonly colCounts: number[] = new Array<number>(GRID_SIZE * COUNT_STRIDE).fill(0);
  private readonly rowCounts: number[] = new Array<number>(GRID_SIZE * COUNT_STRIDE).fill(0);
  private readonly values: number[] = new Array<number>(CELL_COUNT).fill(EMPTY);

  private constructor(values?: readonly number[]) {
    if (!values) {
      return;
    }
    for (let index = 0; index < CELL_COUNT; index++) {
      const value = ensureNonNullable(values[index]);
      if (value !== EMPTY) {
        this.occupy(Math.floor(index / GRID_SIZE), index % GRID_SIZE, value);
      }
    }
  }

  public static empty(): Board {
    return new Board();
  }

  /**
   * Loads a 9x9 array of 0-9 values. Duplicates are accepted here so that
   * {@link Board.isValid} can report them.
   */
  public static fromGrid(grid: Grid): Board {
    if (grid.length !== GRID_SIZE) {
      throw new GridShapeError(`Expected ${String(GRID_SIZE)} rows, got ${String(grid.length)}`);
    }
    const values: number[] = [];
    grid.forEach((row, rowIndex) => {
      if (row.length !== GRID_SIZE) {
        throw new GridShapeError(`Row ${String(rowIndex + 1)} has ${String(row.length)} cells, expected ${String(GRID_SIZE)}`);
      }
      for (const value of row) {
        if (!isCellValue(value)) {
          throw new GridShapeError(`Row ${String(rowIndex + 1)} holds ${String(value)}, expected an integer 0-9`);
        }
        values.push(value);
      }
    });
    return new Board(values);
  }

  public candidateCount(row: number, col: number): number {
    return this.candidates(row, col).length;
  }

  /** Digits 1-9 still legal for an empty cell, ascending; empty for a filled cell. */
  public candidates(row: number, col: number): number[] {
    assertCoordinate(row, col);
    if (this.get(row, col) !== EMPTY) {
      return [];
    }
    return DIGITS.filter((digit) => this.isFree(row, col, digit));
  }

  public clear(row: number, col: number): void {
    assertCoordinate(row, col);
    const current = this.get(row, col);
    if (current === EMPTY) {
      return;
    }
    this.release(row, col, current);
  }

  public clone(): Board {
    return new Board(this.values);
  }

  public emptyCells(): CellPosition[] {
    const result: CellPosition[] = [];
    for (let row = 0; row < GRID_SIZE; row++) {
      for (let col = 0; col < GRID_SIZE; col++) {
        if (this.get(row, col) === EMPTY) {
          result.push({ col, row });
        }
      }
    }
    return result;
  }

  public findConflicts(): Conflict[] {
    const conflicts: Conflict[] = [];
    for (const house of HOUSES) {
      for (const digit of DIGITS) {
        const cells = house.cells.filter((cell) => this.get(cell.row, cell.col) === digit);
        if (cells.length > 1) {
          conflicts.push({ cells, house, value: digit });
        }
      }
    }
    return conflicts;
  }

  public get(row: number, col: number): number {
    assertCoordinate(row, col);
    return ensureNonNullable(this.values[getCellIndex(row, col)]);
  }

  /** Whether the digit `value` may be written into the empty cell at (row, col). */
  public isCandidate(row: number, col: number, value: number): boolean {
    return isDigit(value) && this.get(row, col) === EMPTY && this.isFree(row, col, value);
  }

  public isComplete(): boolean {
    return this._filledCount === CELL_COUNT;
  }

  public isValid(): boolean {
    for (const counts of [this.rowCounts, this.colCounts, this.boxCounts]) {
      if (counts.some((count) => count > 1)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Writes a digit, or clears the cell when given 0.
   * @throws ConstraintViolationError when the digit already occurs in the
   * cell's row, column or box; the board is left unchanged.
   */
  public set(row: number, col: number, value: number): void {
    assertCoordinate(row, col);
    assertCellValue(value);
    if (value === EMPTY) {
      this.clear(row, col);
      return;
    }
    const current = this.get(row, col);
    if (current === value) {
      return;
    }
    if (readCount(this.rowCounts, row, value) > 0) {
      throw new ConstraintViolationError(row, col, value, 'row');
    }
    if (readCount(this.colCounts, col, value) > 0) {
      throw new ConstraintViolationError(row, col, value, 'column');
    }
    if (readCount(this.boxCounts, getBoxIndex(row, col), value) > 0) {
      throw new ConstraintViolationError(row, col, value, 'box');
    }
    if (current !== EMPTY) {
      this.release(row, col, current);
    }
    this.occupy(row, col, value);
  }

  public toGrid(): number[][] {
    return Array.from({ length: GRID_SIZE }, (_, row) => this.values.slice(row * GRID_SIZE, (row + 1) * GRID_SIZE));
  }

  /** Row-major, `.` for a blank. */
  public toString(): string {
    return this.values.map((value) => value === EMPTY ? '.' : String(value)).join('');
  }

  private isFree(row: number, col: number, digit: number): boolean {
    return readCount(this.rowCounts, row, digit) === 0
      && readCount(this.colCounts, col, digit) === 0
      && readCount(this.boxCounts, getBoxIndex(row, col), digit) === 0;
  }

  private occupy(row: number, col: number, value: number): void {
    this.values[getCellIndex(row, col)] = value;
    adjustCount(this.rowCounts, row, value, 1);
    adjustCount(this.colCounts, col, value, 1);
    adjustCount(this.boxCounts, getBoxIndex(row, col), value, 1);
    this._filledCount++;
  }

  private release(row: number, col: number, value: number): void {
    this.values[getCellIndex(row, col)] = EMPTY;
    adjustCount(this.rowCounts, row, value, -1);
    adjustCount(this.colCounts, col, value, -1);
    adjustCount(this.boxCounts, getBoxIndex(row, col), value, -1);
    this._filledCount--;
  }
}

function adjustCount(counts: number[], house: number, digit: number, delta: number): void {
  const index = house * COUNT_STRIDE + digit;
  counts[index] = ensureNonNullable(counts[index]) + delta;
}

function buildHouses(): House[] {
  const rows: House[] = [];
  const columns: House[] = [];
  const boxes: House[] = [];
  for (let i = 0; i < GRID_SIZE; i++) {
    const boxRow = Math.floor(i / BOX_SIZE) * BOX_SIZE;
    const boxCol = (i % BOX_SIZE) * BOX_SIZE;
    const rowCells: CellPosition[] = [];
    const colCells: CellPosition[] = [];
    const boxCells: CellPosition[] = [];
    for (let j = 0; j < GRID_SIZE; j++) {
      rowCells.push({ col: j, row: i });
      colCells.push({ col: i, row: j });
      boxCells.push({ col: boxCol + (j % BOX_SIZE), row: boxRow + Math.floor(j / BOX_SIZE) });
    }
    rows.push({ cells: rowCells, id: i + 1, type: 'row' });
    columns.push({ cells: colCells, id: i + 1, type: 'column' });
    boxes.push({ cells: boxCells, id: i + 1, type: 'box' });
  }
  return [...rows, ...columns, ...boxes];
}

function readCount(counts: readonly number[], house: number, digit: number): number {
  return ensureNonNullable(counts[house * COUNT_STRIDE + digit]);
}
