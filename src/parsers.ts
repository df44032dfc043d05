import type { Grid } from './Board.ts';

import yaml from 'js-yaml';

import {
  CELL_COUNT,
  CHAR_CODE_A,
  EMPTY,
  GRID_SIZE
} from './coordinates.ts';
import { PuzzleParseError } from './errors.ts';
import {
  ensureNonNullable,
  isCellValue
} from './typeGuards.ts';

export interface CellRef {
  readonly col: number;
  readonly row: number;
}

export interface PuzzleFile {
  readonly grid: Grid;
  readonly title: string | undefined;
}

const DIGIT_PATTERN = /^[1-9]$/;
const IGNORED_PATTERN = /^[\s|+-]$/;

/** Parses `A1` notation into zero-based coordinates. */
export function parseCellRef(token: string): CellRef {
  const m = /^(?<col>[A-I])(?<row>[1-9])$/.exec(token.trim().toUpperCase());
  if (!m) {
    throw new PuzzleParseError(`Bad cell ref: ${token}`);
  }
  const groups = ensureNonNullable(m.groups);
  return {
    col: ensureNonNullable(groups['col']).charCodeAt(0) - CHAR_CODE_A,
    row: parseInt(ensureNonNullable(groups['row']), 10) - 1
  };
}

/**
 * Reads 81 cells in row-major order. `1`-`9` are digits, `.` and `0` are
 * blanks; whitespace and the `|`, `-`, `+` grid rules are skipped.
 */
export function parseGridString(text: string): number[][] {
  const cells = parseCells(text, 'Puzzle');
  if (cells.length !== CELL_COUNT) {
    throw new PuzzleParseError(`Puzzle has ${String(cells.length)} cells, expected ${String(CELL_COUNT)}`);
  }
  return Array.from({ length: GRID_SIZE }, (_, row) => cells.slice(row * GRID_SIZE, (row + 1) * GRID_SIZE));
}

/**
 * Parses a YAML puzzle document:
 *
 * ```yaml
 * title: Warm-up
 * grid:
 *   - '..3|.2.|6..'
 *   - [9, 0, 0, 3, 0, 5, 0, 0, 1]
 *   # ...nine rows in all
 * ```
 *
 * `grid` may also be one 81-cell string.
 */
export function parsePuzzleYaml(text: string): PuzzleFile {
  const doc = loadYaml(text);
  if (typeof doc !== 'object' || doc === null || !('grid' in doc)) {
    throw new PuzzleParseError('Puzzle file must be a mapping with a grid');
  }
  let title: string | undefined;
  if ('title' in doc && doc.title !== undefined && doc.title !== null) {
    if (typeof doc.title !== 'string') {
      throw new PuzzleParseError('Puzzle title must be a string');
    }
    title = doc.title;
  }
  return { grid: parseGridValue(doc.grid), title };
}

function loadYaml(text: string): unknown {
  try {
    return yaml.load(text);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new PuzzleParseError(`Puzzle file is not valid YAML: ${error.reason}`);
    }
    throw error;
  }
}

function parseCells(text: string, context: string): number[] {
  const cells: number[] = [];
  Array.from(text).forEach((ch, index) => {
    if (IGNORED_PATTERN.test(ch)) {
      return;
    }
    if (ch === '.' || ch === '0') {
      cells.push(EMPTY);
    } else if (DIGIT_PATTERN.test(ch)) {
      cells.push(parseInt(ch, 10));
    } else {
      throw new PuzzleParseError(`${context} has unexpected character '${ch}' at position ${String(index + 1)}`);
    }
  });
  return cells;
}

function parseGridValue(value: unknown): number[][] {
  if (typeof value === 'string') {
    return parseGridString(value);
  }
  if (!Array.isArray(value)) {
    throw new PuzzleParseError('Puzzle grid must be a string or a list of rows');
  }
  if (value.length !== GRID_SIZE) {
    throw new PuzzleParseError(`Puzzle grid has ${String(value.length)} rows, expected ${String(GRID_SIZE)}`);
  }
  return value.map((row: unknown, index) => parseRow(row, index + 1));
}

function parseRow(row: unknown, rowId: number): number[] {
  const context = `Row ${String(rowId)}`;
  let cells: number[];
  if (typeof row === 'string') {
    cells = parseCells(row, context);
  } else if (Array.isArray(row)) {
    cells = row.map((value: unknown) => {
      if (!isCellValue(value)) {
        throw new PuzzleParseError(`${context} holds ${String(value)}, expected 0-9`);
      }
      return value;
    });
  } else {
    throw new PuzzleParseError(`${context} must be a quoted string or a list of digits`);
  }
  if (cells.length !== GRID_SIZE) {
    throw new PuzzleParseError(`${context} has ${String(cells.length)} cells, expected ${String(GRID_SIZE)}`);
  }
  return cells;
}
