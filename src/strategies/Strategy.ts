import type { Board } from '../Board.ts';

export interface ContradictionDeduction {
  readonly note: string;
  readonly type: 'contradiction';
}

export type Deduction = ContradictionDeduction | PlacementDeduction;

export interface PlacementDeduction {
  readonly col: number;
  readonly note: string;
  readonly row: number;
  readonly type: 'placement';
  readonly value: number;
}

export interface Strategy {
  tryApply(board: Board): Deduction | null;
}
