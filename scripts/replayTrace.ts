/**
 * Replay a stored step trace onto its puzzle and print the resulting grid.
 *
 * Usage:
 *     npm run replayTrace -- puzzles/warmup.yaml trace.json
 *
 * Exit code: 0 replayed, 2 missing or malformed puzzle or trace, or bad usage.
 */

import { runReplayTrace } from '../src/cli.ts';

const FIRST_CLI_ARG_INDEX = 2;

process.exitCode = runReplayTrace(process.argv.slice(FIRST_CLI_ARG_INDEX));
