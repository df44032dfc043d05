/**
 * Solve a Sudoku puzzle file and print the grid before and after.
 *
 * Usage:
 *     npm run solveSudoku -- puzzles/warmup.yaml [--propagate] [--steps] [--trace trace.json]
 *
 * --propagate  place naked singles, hidden singles and naked-twin singles before every branch
 * --steps      print every placement and retraction
 * --trace      write the step trace as JSON for replayTrace
 *
 * Exit code: 0 solved, 1 unsolvable, 2 invalid puzzle, unreadable input or bad usage.
 */

import { runSolveSudoku } from '../src/cli.ts';

const FIRST_CLI_ARG_INDEX = 2;

process.exitCode = runSolveSudoku(process.argv.slice(FIRST_CLI_ARG_INDEX));
