import type { Board } from './Board.ts';
import type {
  SolveStep,
  StepRecord,
  StepRenderer
} from './steps/SolveStep.ts';

import { GRID_SIZE } from './coordinates.ts';
import { TraceFormatError } from './errors.ts';
import { Placement } from './steps/Placement.ts';
import { Retraction } from './steps/Retraction.ts';
import { isDigit } from './typeGuards.ts';

/**
 * Chronological, append-only log of the solver's placements and
 * retractions. Replaying it from the starting board walks through every
 * board state the search visited.
 */
export class StepTrace implements Iterable<SolveStep> {
  public get length(): number {
    return this._steps.length;
  }

  public get maxDepth(): number {
    return this._steps.reduce((max, step) => Math.max(max, step.depth), 0);
  }

  public get placements(): number {
    return this._steps.filter((step) => step.kind === 'place').length;
  }

  public get retractions(): number {
    return this._steps.filter((step) => step.kind === 'retract').length;
  }

  public get steps(): readonly SolveStep[] {
    return this._steps;
  }

  private readonly _steps: SolveStep[] = [];

  /**
   * Rebuilds a trace from its JSON form.
   * @throws TraceFormatError on anything that is not an array of step records.
   */
  public static fromJSON(json: unknown): StepTrace {
    if (!Array.isArray(json)) {
      throw new TraceFormatError('Trace must be an array of steps');
    }
    const trace = new StepTrace();
    json.forEach((entry: unknown, index) => {
      trace.append(parseStepRecord(entry, index));
    });
    return trace;
  }

  public [Symbol.iterator](): Iterator<SolveStep> {
    return this._steps[Symbol.iterator]();
  }

  public append(step: SolveStep): void {
    this._steps.push(step);
  }

  public render(renderer: StepRenderer): void {
    for (const step of this._steps) {
      step.render(renderer);
    }
  }

  /** Applies every step to a copy of `initial` and returns the copy. */
  public replay(initial: Board): Board {
    const board = initial.clone();
    for (const step of this._steps) {
      step.applyTo(board);
    }
    return board;
  }

  /** Board strings after each step, in order. */
  public *replayStates(initial: Board): Generator<string, void, undefined> {
    const board = initial.clone();
    for (const step of this._steps) {
      step.applyTo(board);
      yield board.toString();
    }
  }

  public toJSON(): StepRecord[] {
    return this._steps.map((step) => step.toJSON());
  }
}

function isIndex(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < GRID_SIZE;
}

function parseStepRecord(entry: unknown, index: number): SolveStep {
  const position = `Step ${String(index + 1)}`;
  if (typeof entry !== 'object' || entry === null) {
    throw new TraceFormatError(`${position} is not an object`);
  }
  if (!('row' in entry) || !isIndex(entry.row) || !('col' in entry) || !isIndex(entry.col)) {
    throw new TraceFormatError(`${position} has no valid row/col`);
  }
  if (!('value' in entry) || !isDigit(entry.value)) {
    throw new TraceFormatError(`${position} has no digit value`);
  }
  if (!('depth' in entry) || typeof entry.depth !== 'number' || !Number.isInteger(entry.depth) || entry.depth < 0) {
    throw new TraceFormatError(`${position} has no valid depth`);
  }
  const kind = 'kind' in entry ? entry.kind : undefined;
  switch (kind) {
    case 'place':
      return new Placement(entry.row, entry.col, entry.value, entry.depth);
    case 'retract':
      return new Retraction(entry.row, entry.col, entry.value, entry.depth);
    default:
      throw new TraceFormatError(`${position} has unknown kind ${String(kind)}`);
  }
}
