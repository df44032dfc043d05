import type {
  Board,
  Conflict
} from './Board.ts';
import type { SolveStep } from './steps/SolveStep.ts';
import type {
  Deduction,
  Strategy
} from './strategies/Strategy.ts';

import {
  EMPTY,
  GRID_SIZE
} from './coordinates.ts';
import { Placement } from './steps/Placement.ts';
import { Retraction } from './steps/Retraction.ts';
import { StepTrace } from './StepTrace.ts';

export interface InvalidPuzzleResult {
  readonly conflicts: readonly Conflict[];
  readonly stats: SolveStats;
  readonly status: 'invalid-puzzle';
  readonly trace: StepTrace;
}

export type SolveResult = InvalidPuzzleResult | SolvedResult | UnsolvableResult;

export interface SolvedResult {
  readonly grid: number[][];
  readonly stats: SolveStats;
  readonly status: 'solved';
  readonly trace: StepTrace;
}

export interface SolverOptions {
  /** Called with every step the moment it is made. */
  readonly onStep?: (step: SolveStep) => void;
  /**
   * Propagation applied at every search node before branching. Empty by
   * default: plain most-constrained-cell backtracking.
   */
  readonly strategies?: readonly Strategy[];
}

export interface SolveStats {
  readonly maxDepth: number;
  readonly placements: number;
  readonly retractions: number;
}

export type SolveStatus = SolveResult['status'];

export interface UnsolvableResult {
  readonly stats: SolveStats;
  readonly status: 'unsolvable';
  readonly trace: StepTrace;
}

interface BranchCell {
  readonly candidates: readonly number[];
  readonly col: number;
  readonly row: number;
}

/**
 * Depth-first backtracking search. It branches on the empty cell with the
 * fewest candidates (ties go to the lowest row, then the lowest column) and
 * tries digits in ascending order, so a given board always produces the
 * same steps.
 */
export class Solver {
  private readonly onStep: ((step: SolveStep) => void) | undefined;
  private readonly strategies: readonly Strategy[];

  public constructor(options: SolverOptions = {}) {
    this.onStep = options.onStep;
    this.strategies = options.strategies ?? [];
  }

  /**
   * Solves `board` in place and returns the full trace. On `unsolvable` the
   * board is back in its starting state; on `invalid-puzzle` it is untouched.
   */
  public solve(board: Board): SolveResult {
    const trace = new StepTrace();
    const steps = this.steps(board);
    let next = steps.next();
    while (!next.done) {
      trace.append(next.value);
      next = steps.next();
    }
    const stats: SolveStats = {
      maxDepth: trace.maxDepth,
      placements: trace.placements,
      retractions: trace.retractions
    };

    const status = next.value;
    switch (status) {
      case 'invalid-puzzle':
        return { conflicts: board.findConflicts(), stats, status: 'invalid-puzzle', trace };
      case 'solved':
        return { grid: board.toGrid(), stats, status: 'solved', trace };
      case 'unsolvable':
        return { stats, status: 'unsolvable', trace };
      default: {
        const exhaustive: never = status;
        throw new Error(`Unknown solve status: ${String(exhaustive)}`);
      }
    }
  }

  /**
   * The search as a lazy sequence of steps. Each step has already been
   * applied to `board` when it is yielded. Returning from the iterator early
   * stops the search and leaves the board as it is at that step.
   */
  public *steps(board: Board): Generator<SolveStep, SolveStatus, undefined> {
    if (!board.isValid()) {
      return 'invalid-puzzle';
    }
    const solved = yield* this.search(board, 0);
    return solved ? 'solved' : 'unsolvable';
  }

  private deduce(board: Board): Deduction | null {
    for (const strategy of this.strategies) {
      const deduction = strategy.tryApply(board);
      if (deduction) {
        return deduction;
      }
    }
    return null;
  }

  /**
   * Places every deduction the strategies make until none applies.
   * Returns false on a contradiction; `forced` collects the placements
   * made so far either way.
   */
  private *propagate(board: Board, depth: number, forced: Placement[]): Generator<SolveStep, boolean, undefined> {
    let deduction = this.deduce(board);
    while (deduction) {
      if (deduction.type === 'contradiction') {
        return false;
      }
      const step = new Placement(deduction.row, deduction.col, deduction.value, depth);
      step.applyTo(board);
      forced.push(step);
      yield this.record(step);
      deduction = this.deduce(board);
    }
    return true;
  }

  private record(step: SolveStep): SolveStep {
    this.onStep?.(step);
    return step;
  }

  private *search(board: Board, depth: number): Generator<SolveStep, boolean, undefined> {
    const forced: Placement[] = [];
    if (yield* this.propagate(board, depth, forced)) {
      if (board.isComplete()) {
        return true;
      }
      const target = selectBranchCell(board);
      if (target) {
        for (const value of target.candidates) {
          board.set(target.row, target.col, value);
          yield this.record(new Placement(target.row, target.col, value, depth));
          if (yield* this.search(board, depth + 1)) {
            return true;
          }
          board.clear(target.row, target.col);
          yield this.record(new Retraction(target.row, target.col, value, depth));
        }
      }
    }
    yield* this.undo(board, depth, forced);
    return false;
  }

  private *undo(board: Board, depth: number, forced: readonly Placement[]): Generator<SolveStep, void, undefined> {
    for (const { col, row, value } of [...forced].reverse()) {
      board.clear(row, col);
      yield this.record(new Retraction(row, col, value, depth));
    }
  }
}

/**
 * The most constrained empty cell, or null when some empty cell has no
 * candidates at all.
 */
function selectBranchCell(board: Board): BranchCell | null {
  let best: BranchCell | null = null;
  for (let row = 0; row < GRID_SIZE; row++) {
    for (let col = 0; col < GRID_SIZE; col++) {
      if (board.get(row, col) !== EMPTY) {
        continue;
      }
      const candidates = board.candidates(row, col);
      if (candidates.length === 0) {
        return null;
      }
      if (!best || candidates.length < best.candidates.length) {
        best = { candidates, col, row };
      }
    }
  }
  return best;
}
