import fs from 'node:fs';
import path from 'node:path';

import type { OutputPaths, PipelineResult } from '../shared/types.js';

export const OUTPUT_FILES = {
  resolved: 'movies_output.json',
  unresolved: 'movies_not_found.txt',
  ambiguous: 'movies_multiple_matches.txt',
} as const;

/**
 * First free path among base, <name>_1<ext>, <name>_2<ext>, ...
 */
export function uniqueFilePath(basePath: string): string {
  const dir = path.dirname(basePath);
  const ext = path.extname(basePath);
  const name = path.basename(basePath, ext);

  let candidate = basePath;
  for (let counter = 1; fs.existsSync(candidate); counter++) {
    candidate = path.join(dir, `${name}_${counter}${ext}`);
  }
  return candidate;
}

function toLines(items: readonly string[]): string {
  return items.map((item) => `${item}\n`).join('');
}

export function writeResults(
  outputDir: string,
  result: Pick<PipelineResult, 'resolved' | 'unresolved' | 'ambiguous'>
): OutputPaths {
  fs.mkdirSync(outputDir, { recursive: true });

  const resolved = uniqueFilePath(path.join(outputDir, OUTPUT_FILES.resolved));
  fs.writeFileSync(resolved, JSON.stringify(result.resolved, null, 2));

  const unresolved = uniqueFilePath(path.join(outputDir, OUTPUT_FILES.unresolved));
  fs.writeFileSync(unresolved, toLines(result.unresolved));

  const ambiguous = uniqueFilePath(path.join(outputDir, OUTPUT_FILES.ambiguous));
  fs.writeFileSync(ambiguous, toLines(result.ambiguous));

  return { resolved, unresolved, ambiguous };
}
