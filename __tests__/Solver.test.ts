import type { SolveResult } from '../src/Solver.ts';
import type { SolveStep } from '../src/steps/SolveStep.ts';
import type { Strategy } from '../src/strategies/Strategy.ts';

import {
  describe,
  expect,
  it,
  vi
} from 'vitest';

import { Board } from '../src/Board.ts';
import { ConstraintViolationError } from '../src/errors.ts';
import { Solver } from '../src/Solver.ts';
import { createDefaultStrategies } from '../src/strategies/createDefaultStrategies.ts';
import { HiddenSingleStrategy } from '../src/strategies/HiddenSingleStrategy.ts';
import {
  boardFromRows,
  DEAD_END_ROWS,
  diagonalBlanksGrid,
  gridFromRows,
  isSolvedGrid,
  SOLVED_ROWS,
  TWIN_CLASH_ROWS
} from './boardTestHelper.ts';

const DIAGONAL_VALUES = [1, 5, 9, 5, 9, 4, 9, 4, 8];

/** Marks the givens kept from the solved grid; leaves many completions open. */
const SPARSE_MASK = [
  'x..x..x..',
  '..x..x..x',
  '.x..x..x.',
  'x..x..x..',
  '..x..x..x',
  '.x..x..x.',
  'x..x..x..',
  '..x..x..x',
  '.x..x..x.'
];

const SPARSE_ROWS = SPARSE_MASK.map((mask, row) => Array.from(
  mask,
  (ch, col) => (ch === 'x' ? (SOLVED_ROWS[row] ?? '').charAt(col) : '.')
).join(''));

function describeSteps(steps: Iterable<SolveStep>): string[] {
  return Array.from(steps, (step) => step.toString());
}

/** Board strings seen by `onStep`, one per step, next to the solve result. */
function solveRecordingStates(initial: Board, strategies: readonly Strategy[]): { result: SolveResult; states: string[] } {
  const board = initial.clone();
  const states: string[] = [];
  const result = new Solver({
    onStep: () => {
      states.push(board.toString());
    },
    strategies
  }).solve(board);
  return { result, states };
}

describe('Solver', () => {
  describe('solve', () => {
    it('returns solved with an empty trace for a complete board', () => {
      const board = boardFromRows(SOLVED_ROWS);
      const result = new Solver().solve(board);
      expect(result.status).toBe('solved');
      expect(result.trace.length).toBe(0);
      expect(result.stats).toEqual({ maxDepth: 0, placements: 0, retractions: 0 });
    });

    it('fills forced cells in row order, one level deeper each time', () => {
      const board = Board.fromGrid(diagonalBlanksGrid());
      const result = new Solver().solve(board);
      expect(result.status).toBe('solved');
      expect(result.trace.toJSON()).toEqual(DIAGONAL_VALUES.map((value, i) => ({
        col: i,
        depth: i,
        kind: 'place',
        row: i,
        value
      })));
      if (result.status === 'solved') {
        expect(result.grid).toEqual(gridFromRows(SOLVED_ROWS));
      }
    });

    it('rejects a board with a repeated digit without touching it', () => {
      const rows = Array.from({ length: 9 }, () => '.........');
      rows[0] = '5..5.....';
      const board = boardFromRows(rows);
      const before = board.toString();
      const result = new Solver().solve(board);
      expect(result.status).toBe('invalid-puzzle');
      expect(result.trace.length).toBe(0);
      expect(board.toString()).toBe(before);
      if (result.status === 'invalid-puzzle') {
        expect(result.conflicts.map((c) => `${c.house.type} ${String(c.house.id)}`)).toEqual(['row 1']);
      }
    });

    it('reports unsolvable and restores the board after backtracking', () => {
      const board = boardFromRows(TWIN_CLASH_ROWS);
      const before = board.toString();
      const result = new Solver().solve(board);
      expect(result.status).toBe('unsolvable');
      expect(board.toString()).toBe(before);
      expect(describeSteps(result.trace)).toEqual([
        'place 8 at H1 (depth 0)',
        'place 9 at I1 (depth 1)',
        'retract 9 at I1 (depth 1)',
        'retract 8 at H1 (depth 0)',
        'place 9 at H1 (depth 0)',
        'place 8 at I1 (depth 1)',
        'retract 8 at I1 (depth 1)',
        'retract 9 at H1 (depth 0)'
      ]);
      expect(result.stats).toEqual({ maxDepth: 1, placements: 4, retractions: 4 });
    });

    it('records a dead end right below the root', () => {
      const board = boardFromRows(DEAD_END_ROWS);
      const result = new Solver().solve(board);
      expect(result.status).toBe('unsolvable');
      expect(result.trace.toJSON()).toEqual([
        { col: 7, depth: 0, kind: 'place', row: 0, value: 8 },
        { col: 7, depth: 0, kind: 'retract', row: 0, value: 8 }
      ]);
    });

    it('solves an empty board', () => {
      const board = Board.empty();
      const result = new Solver().solve(board);
      expect(result.status).toBe('solved');
      expect(isSolvedGrid(board.toGrid())).toBe(true);
    });

    it('keeps the givens of a sparse puzzle', () => {
      const board = boardFromRows(SPARSE_ROWS);
      const initial = board.clone();
      const result = new Solver().solve(board);
      expect(result.status).toBe('solved');
      if (result.status !== 'solved') {
        return;
      }
      expect(isSolvedGrid(result.grid)).toBe(true);
      for (let row = 0; row < 9; row++) {
        for (let col = 0; col < 9; col++) {
          const given = initial.get(row, col);
          if (given !== 0) {
            expect(result.grid[row]?.[col]).toBe(given);
          }
        }
      }
    });

    it('produces a trace whose replay ends on the solved board', () => {
      const initial = boardFromRows(SPARSE_ROWS);
      const board = initial.clone();
      const result = new Solver().solve(board);
      expect(result.trace.replay(initial).toString()).toBe(board.toString());
    });

    it('retracts only what was placed at the same depth', () => {
      const board = boardFromRows(SPARSE_ROWS);
      const result = new Solver().solve(board);
      const open: SolveStep[] = [];
      for (const step of result.trace) {
        if (step.kind === 'place') {
          open.push(step);
        } else {
          const placed = open.pop();
          expect(placed?.toJSON()).toEqual({ ...step.toJSON(), kind: 'place' });
        }
      }
    });

    it('is deterministic', () => {
      const first = new Solver().solve(boardFromRows(SPARSE_ROWS));
      const second = new Solver().solve(boardFromRows(SPARSE_ROWS));
      expect(JSON.stringify(second.trace)).toBe(JSON.stringify(first.trace));
      expect(second.status).toBe(first.status);
      if (first.status === 'solved' && second.status === 'solved') {
        expect(second.grid).toEqual(first.grid);
      }
    });

    it('calls onStep with every step in order', () => {
      const seen: SolveStep[] = [];
      const onStep = vi.fn((step: SolveStep) => {
        seen.push(step);
      });
      const result = new Solver({ onStep }).solve(boardFromRows(TWIN_CLASH_ROWS));
      expect(onStep).toHaveBeenCalledTimes(8);
      expect(seen).toEqual([...result.trace]);
    });

    it('lets a constraint violation escape', () => {
      const rogue: Strategy = {
        tryApply: () => ({ col: 7, note: 'rogue', row: 0, type: 'placement', value: 1 })
      };
      const board = boardFromRows(DEAD_END_ROWS);
      expect(() => new Solver({ strategies: [rogue] }).solve(board)).toThrow(ConstraintViolationError);
    });
  });

  describe('solve with propagation', () => {
    it('places forced cells at the root depth', () => {
      const board = Board.fromGrid(diagonalBlanksGrid());
      const result = new Solver({ strategies: createDefaultStrategies() }).solve(board);
      expect(result.status).toBe('solved');
      expect(result.trace.toJSON().map((r) => r.depth)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
      expect(result.trace.toJSON().map((r) => r.value)).toEqual(DIAGONAL_VALUES);
    });

    it('retracts forced placements when propagation hits a contradiction', () => {
      const board = boardFromRows(DEAD_END_ROWS);
      const before = board.toString();
      const result = new Solver({ strategies: createDefaultStrategies() }).solve(board);
      expect(result.status).toBe('unsolvable');
      expect(describeSteps(result.trace)).toEqual([
        'place 8 at H1 (depth 0)',
        'retract 8 at H1 (depth 0)'
      ]);
      expect(board.toString()).toBe(before);
    });

    it('gives up on a naked twin clash before guessing', () => {
      const board = boardFromRows(TWIN_CLASH_ROWS);
      const result = new Solver({ strategies: createDefaultStrategies() }).solve(board);
      expect(result.status).toBe('unsolvable');
      expect(result.trace.length).toBe(0);
    });

    it('works with hidden singles alone', () => {
      const board = Board.fromGrid(diagonalBlanksGrid());
      const result = new Solver({ strategies: [new HiddenSingleStrategy()] }).solve(board);
      expect(result.status).toBe('solved');
      expect(result.stats).toEqual({ maxDepth: 0, placements: 9, retractions: 0 });
    });

    it('solves a sparse puzzle with a replayable trace', () => {
      const initial = boardFromRows(SPARSE_ROWS);
      const board = initial.clone();
      const result = new Solver({ strategies: createDefaultStrategies() }).solve(board);
      expect(result.status).toBe('solved');
      expect(isSolvedGrid(board.toGrid())).toBe(true);
      expect(result.trace.replay(initial).toString()).toBe(board.toString());
    });
  });

  describe('replayed trace', () => {
    it('walks through every state of a backtracking search', () => {
      const initial = boardFromRows(SPARSE_ROWS);
      const { result, states } = solveRecordingStates(initial, []);
      expect(result.status).toBe('solved');
      expect(result.stats.retractions).toBeGreaterThan(0);
      expect(states).toHaveLength(result.trace.length);
      expect([...result.trace.replayStates(initial)]).toEqual(states);
    });

    it('walks through every state of a search with propagation', () => {
      const initial = boardFromRows(SPARSE_ROWS);
      const { result, states } = solveRecordingStates(initial, createDefaultStrategies());
      expect(result.status).toBe('solved');
      expect(states).toHaveLength(result.trace.length);
      expect([...result.trace.replayStates(initial)]).toEqual(states);
    });

    it('walks through every state of an unsolvable search', () => {
      const initial = boardFromRows(TWIN_CLASH_ROWS);
      const { result, states } = solveRecordingStates(initial, []);
      expect(result.status).toBe('unsolvable');
      expect([...result.trace.replayStates(initial)]).toEqual(states);
      expect(states.at(-1)).toBe(initial.toString());
    });
  });

  describe('steps', () => {
    it('yields steps already applied to the board', () => {
      const board = boardFromRows(TWIN_CLASH_ROWS);
      const steps = new Solver().steps(board);
      const first = steps.next();
      expect(first.done).toBe(false);
      expect(board.get(0, 7)).toBe(8);
      steps.next();
      expect(board.get(0, 8)).toBe(9);
    });

    it('stops the search when the consumer returns early', () => {
      const board = boardFromRows(TWIN_CLASH_ROWS);
      const onStep = vi.fn();
      const steps = new Solver({ onStep }).steps(board);
      steps.next();
      steps.next();
      steps.return('unsolvable');
      expect(steps.next().done).toBe(true);
      expect(onStep).toHaveBeenCalledTimes(2);
      expect(board.get(0, 7)).toBe(8);
      expect(board.get(0, 8)).toBe(9);
    });

    it('returns the status as the final value', () => {
      const steps = new Solver().steps(boardFromRows(DEAD_END_ROWS));
      let next = steps.next();
      let count = 0;
      while (!next.done) {
        count++;
        next = steps.next();
      }
      expect(count).toBe(2);
      expect(next.value).toBe('unsolvable');
    });

    it('finishes at once for an invalid board', () => {
      const rows = [...DEAD_END_ROWS];
      rows[1] = '1........';
      const first = new Solver().steps(boardFromRows(rows)).next();
      expect(first).toEqual({ done: true, value: 'invalid-puzzle' });
    });
  });
});
