export const BOX_SIZE = 3;
export const GRID_SIZE = 9;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
export const EMPTY = 0;
export const MAX_DIGIT = 9;
export const MIN_DIGIT = 1;

export const DIGITS: readonly number[] = Array.from({ length: MAX_DIGIT }, (_, i) => i + MIN_DIGIT);

export const CHAR_CODE_A = 65;

export function assertCoordinate(row: number, col: number): void {
  if (!isIndex(row) || !isIndex(col)) {
    throw new RangeError(`Cell (${String(row)}, ${String(col)}) is outside the ${String(GRID_SIZE)}x${String(GRID_SIZE)} grid`);
  }
}

export function getBoxIndex(row: number, col: number): number {
  return Math.floor(row / BOX_SIZE) * BOX_SIZE + Math.floor(col / BOX_SIZE);
}

/**
 * Formats zero-based coordinates in A1 notation: column letter, then
 * one-based row number.
 */
export function getCellRef(row: number, col: number): string {
  return String.fromCharCode(CHAR_CODE_A + col) + String(row + 1);
}

export function getCellIndex(row: number, col: number): number {
  return row * GRID_SIZE + col;
}

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < GRID_SIZE;
}
