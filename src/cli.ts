/* eslint-disable no-console -- CLI output. */

import {
  existsSync,
  readFileSync,
  writeFileSync
} from 'node:fs';

import { Board } from './Board.ts';
import { SudokuError } from './errors.ts';
import {
  formatGrid,
  TextStepRenderer
} from './format.ts';
import { loadPuzzleFile } from './puzzleFiles.ts';
import { Solver } from './Solver.ts';
import { StepTrace } from './StepTrace.ts';
import { createDefaultStrategies } from './strategies/createDefaultStrategies.ts';

export enum ExitCode {
  InvalidInput = 2,
  Success = 0,
  Unsolvable = 1
}

interface SolveCliOptions {
  readonly printSteps: boolean;
  readonly propagate: boolean;
  readonly puzzlePath: string;
  readonly tracePath: string | undefined;
}

const JSON_INDENT = 2;
const REPLAY_USAGE = 'Usage: npm run replayTrace -- <puzzle-file> <trace.json>';
const SOLVE_USAGE = 'Usage: npm run solveSudoku -- <puzzle-file> [--propagate] [--steps] [--trace <out.json>]';

/**
 * Replays a stored trace onto its puzzle and prints the final grid.
 * A missing file, an unreadable puzzle or a trace that does not fit the
 * puzzle ends with {@link ExitCode.InvalidInput}.
 */
export function runReplayTrace(args: readonly string[]): ExitCode {
  const [puzzlePath, tracePath, ...rest] = args;
  if (puzzlePath === undefined || tracePath === undefined || rest.length > 0) {
    console.error(REPLAY_USAGE);
    return ExitCode.InvalidInput;
  }
  if (!checkExists(puzzlePath) || !checkExists(tracePath)) {
    return ExitCode.InvalidInput;
  }

  const replayed = loadInput(() => {
    const initial = Board.fromGrid(loadPuzzleFile(puzzlePath).grid);
    const json: unknown = JSON.parse(readFileSync(tracePath, 'utf-8'));
    const trace = StepTrace.fromJSON(json);
    return { final: trace.replay(initial), trace };
  });
  if (!replayed) {
    return ExitCode.InvalidInput;
  }

  const { final, trace } = replayed;
  console.log(`Replayed ${String(trace.length)} steps (${String(trace.placements)} placements, ${String(trace.retractions)} retractions)`);
  console.log(formatGrid(final));
  console.log(final.isComplete() ? 'Board complete' : `${String(final.filledCount)} cells filled`);
  return ExitCode.Success;
}

/**
 * Solves a puzzle file and prints the grid before and after, the steps and
 * the search statistics.
 */
export function runSolveSudoku(args: readonly string[]): ExitCode {
  const options = parseSolveArgs(args);
  if (!options) {
    console.error(SOLVE_USAGE);
    return ExitCode.InvalidInput;
  }
  if (!checkExists(options.puzzlePath)) {
    return ExitCode.InvalidInput;
  }

  const puzzle = loadInput(() => loadPuzzleFile(options.puzzlePath));
  if (!puzzle) {
    return ExitCode.InvalidInput;
  }
  const board = Board.fromGrid(puzzle.grid);
  if (puzzle.title) {
    console.log(puzzle.title);
  }
  console.log(formatGrid(board));
  console.log();

  const solver = new Solver(options.propagate ? { strategies: createDefaultStrategies() } : {});
  const startTime = performance.now();
  const result = solver.solve(board);
  const elapsedMs = performance.now() - startTime;

  if (options.printSteps) {
    const renderer = new TextStepRenderer();
    result.trace.render(renderer);
    console.log(renderer.lines.join('\n'));
    console.log();
  }
  if (options.tracePath) {
    writeFileSync(options.tracePath, JSON.stringify(result.trace, null, JSON_INDENT), 'utf-8');
    console.log(`Trace written to ${options.tracePath}`);
  }

  let exitCode: ExitCode;
  switch (result.status) {
    case 'invalid-puzzle':
      console.error('Invalid puzzle:');
      for (const conflict of result.conflicts) {
        console.error(`  ${String(conflict.value)} repeated in ${conflict.house.type} ${String(conflict.house.id)}`);
      }
      return ExitCode.InvalidInput;
    case 'solved':
      console.log(formatGrid(board));
      exitCode = ExitCode.Success;
      break;
    case 'unsolvable':
      console.log('Not solvable');
      exitCode = ExitCode.Unsolvable;
      break;
    default: {
      const exhaustive: never = result;
      throw new Error(`Unknown result: ${String(exhaustive)}`);
    }
  }

  const { maxDepth, placements, retractions } = result.stats;
  console.log(`${String(placements)} placements, ${String(retractions)} retractions, max depth ${String(maxDepth)}`);
  console.log(`It took ${elapsedMs.toFixed(1)} ms to solve this puzzle.`);
  return exitCode;
}

function checkExists(path: string): boolean {
  if (existsSync(path)) {
    return true;
  }
  console.error(`Error: ${path} not found`);
  return false;
}

/** Runs `load`, printing bad puzzle or trace input instead of throwing it. */
function loadInput<T>(load: () => T): T | undefined {
  try {
    return load();
  } catch (error) {
    if (error instanceof SudokuError || error instanceof SyntaxError) {
      console.error(`Error: ${error.message}`);
      return undefined;
    }
    throw error;
  }
}

function parseSolveArgs(args: readonly string[]): null | SolveCliOptions {
  let printSteps = false;
  let propagate = false;
  let puzzlePath: string | undefined;
  let tracePath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--propagate':
        propagate = true;
        break;
      case '--steps':
        printSteps = true;
        break;
      case '--trace':
        i++;
        tracePath = args[i];
        if (tracePath === undefined) {
          return null;
        }
        break;
      default:
        if (arg === undefined || arg.startsWith('--') || puzzlePath !== undefined) {
          return null;
        }
        puzzlePath = arg;
    }
  }

  if (puzzlePath === undefined) {
    return null;
  }
  return { printSteps, propagate, puzzlePath, tracePath };
}

/* eslint-enable no-console -- End CLI output. */
