export type {
  CellPosition,
  Conflict,
  Grid,
  House,
  HouseType
} from './Board.ts';
export type {
  InvalidPuzzleResult,
  SolvedResult,
  SolveResult,
  SolverOptions,
  SolveStats,
  SolveStatus,
  UnsolvableResult
} from './Solver.ts';
export type {
  StepKind,
  StepRecord,
  StepRenderer
} from './steps/SolveStep.ts';
export type {
  ContradictionDeduction,
  Deduction,
  PlacementDeduction,
  Strategy
} from './strategies/Strategy.ts';

export { Board } from './Board.ts';
export { getCellRef } from './coordinates.ts';
export {
  ConstraintViolationError,
  GridShapeError,
  PuzzleParseError,
  SudokuError,
  TraceFormatError
} from './errors.ts';
export {
  formatGrid,
  formatStep,
  TextStepRenderer
} from './format.ts';
export {
  parseCellRef,
  parseGridString,
  parsePuzzleYaml
} from './parsers.ts';
export { Solver } from './Solver.ts';
export { StepTrace } from './StepTrace.ts';
export { Placement } from './steps/Placement.ts';
export { Retraction } from './steps/Retraction.ts';
export { SolveStep } from './steps/SolveStep.ts';
export { createDefaultStrategies } from './strategies/createDefaultStrategies.ts';
export { HiddenSingleStrategy } from './strategies/HiddenSingleStrategy.ts';
export { NakedTwinsStrategy } from './strategies/NakedTwinsStrategy.ts';
export { SingleCandidateStrategy } from './strategies/SingleCandidateStrategy.ts';
