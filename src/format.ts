import type { Board } from './Board.ts';
import type { Placement } from './steps/Placement.ts';
import type { Retraction } from './steps/Retraction.ts';
import type {
  SolveStep,
  StepRenderer
} from './steps/SolveStep.ts';

import {
  BOX_SIZE,
  EMPTY,
  GRID_SIZE
} from './coordinates.ts';

const BOX_RULE = '------+-------+------';
const DEPTH_INDENT = '  ';

/** Collects one formatted line per rendered step. */
export class TextStepRenderer implements StepRenderer {
  public readonly lines: string[] = [];

  public renderPlacement(step: Placement): void {
    this.lines.push(formatStep(step));
  }

  public renderRetraction(step: Retraction): void {
    this.lines.push(formatStep(step));
  }
}

/**
 * Renders the board as nine text rows with `|` between boxes and a rule
 * between bands of boxes. Blanks show as `.`.
 */
export function formatGrid(board: Board): string {
  const lines: string[] = [];
  for (let row = 0; row < GRID_SIZE; row++) {
    if (row > 0 && row % BOX_SIZE === 0) {
      lines.push(BOX_RULE);
    }
    const groups: string[] = [];
    for (let boxCol = 0; boxCol < GRID_SIZE; boxCol += BOX_SIZE) {
      const digits: string[] = [];
      for (let col = boxCol; col < boxCol + BOX_SIZE; col++) {
        const value = board.get(row, col);
        digits.push(value === EMPTY ? '.' : String(value));
      }
      groups.push(digits.join(' '));
    }
    lines.push(groups.join(' | '));
  }
  return lines.join('\n');
}

export function formatStep(step: SolveStep): string {
  return DEPTH_INDENT.repeat(step.depth) + step.toString();
}
