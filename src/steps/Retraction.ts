import type { Board } from '../Board.ts';
import type { StepRenderer } from './SolveStep.ts';

import { TraceFormatError } from '../errors.ts';
import { SolveStep } from './SolveStep.ts';

export class Retraction extends SolveStep {
  public readonly kind = 'retract';

  public constructor(row: number, col: number, value: number, depth: number) {
    super(row, col, value, depth);
  }

  /**
   * Clears the cell. The cell must hold the retracted digit, otherwise the
   * trace does not belong to this board.
   */
  public applyTo(board: Board): void {
    const current = board.get(this.row, this.col);
    if (current !== this.value) {
      throw new TraceFormatError(`Cannot retract ${String(this.value)} at ${this.ref}: cell holds ${String(current)}`);
    }
    board.clear(this.row, this.col);
  }

  public render(renderer: StepRenderer): void {
    renderer.renderRetraction(this);
  }
}
