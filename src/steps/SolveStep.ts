import type { Board } from '../Board.ts';
import type { Placement } from './Placement.ts';
import type { Retraction } from './Retraction.ts';

import { getCellRef } from '../coordinates.ts';

export type StepKind = 'place' | 'retract';

/** Plain form of a step, as stored in a trace file. */
export interface StepRecord {
  readonly col: number;
  readonly depth: number;
  readonly kind: StepKind;
  readonly row: number;
  readonly value: number;
}

export interface StepRenderer {
  renderPlacement(step: Placement): void;
  renderRetraction(step: Retraction): void;
}

/**
 * One atomic change made by the solver. `depth` is the recursion depth of
 * the search node that made it, 0 being the root.
 */
export abstract class SolveStep implements StepRecord {
  public abstract readonly kind: StepKind;

  public get ref(): string {
    return getCellRef(this.row, this.col);
  }

  protected constructor(
    public readonly row: number,
    public readonly col: number,
    public readonly value: number,
    public readonly depth: number
  ) {
  }

  public abstract applyTo(board: Board): void;
  public abstract render(renderer: StepRenderer): void;

  public toJSON(): StepRecord {
    return {
      col: this.col,
      depth: this.depth,
      kind: this.kind,
      row: this.row,
      value: this.value
    };
  }

  public toString(): string {
    return `${this.kind} ${String(this.value)} at ${this.ref} (depth ${String(this.depth)})`;
  }
}
