import type { PuzzleFile } from './parsers.ts';

import { readFileSync } from 'node:fs';
import {
  basename,
  extname
} from 'node:path';

import {
  parseGridString,
  parsePuzzleYaml
} from './parsers.ts';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export function loadPuzzleFile(path: string): PuzzleFile {
  return parsePuzzleText(path, readFileSync(path, 'utf-8'));
}

/**
 * Picks the parser by extension: YAML documents for `.yaml`/`.yml`, a bare
 * grid string otherwise. A bare grid takes its title from the file name.
 */
export function parsePuzzleText(path: string, text: string): PuzzleFile {
  const extension = extname(path);
  if (YAML_EXTENSIONS.has(extension.toLowerCase())) {
    return parsePuzzleYaml(text);
  }
  return { grid: parseGridString(text), title: basename(path, extension) };
}
