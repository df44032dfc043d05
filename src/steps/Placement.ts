import type { Board } from '../Board.ts';
import type { StepRenderer } from './SolveStep.ts';

import { SolveStep } from './SolveStep.ts';

export class Placement extends SolveStep {
  public readonly kind = 'place';

  public constructor(row: number, col: number, value: number, depth: number) {
    super(row, col, value, depth);
  }

  public applyTo(board: Board): void {
    board.set(this.row, this.col, this.value);
  }

  public render(renderer: StepRenderer): void {
    renderer.renderPlacement(this);
  }
}
