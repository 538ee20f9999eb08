/**
 * Interactive pick for ambiguous titles (selection.interactive).
 */

import * as readline from 'node:readline';

import type { AmbiguityResolver, CandidateMatch, TitleEntry } from '../shared/types.js';

export type Ask = (query: string) => Promise<string>;
export type Print = (line: string) => void;

/** 1-based index, 'skip' for 0, or null when the answer is not usable */
export function parseSelection(answer: string, count: number): number | 'skip' | null {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const n = Number.parseInt(trimmed, 10);
  if (n === 0) return 'skip';
  return n <= count ? n : null;
}

export async function promptForMatch(
  ask: Ask,
  print: Print,
  entry: TitleEntry,
  candidates: readonly CandidateMatch[]
): Promise<CandidateMatch | null> {
  print(`Multiple matches found for '${entry}'. Please select one:`);
  candidates.forEach((movie, i) => {
    print(`${i + 1}. ${movie.title ?? '(untitled)'} (${movie.year ?? '?'}) - ${movie.imdbId ?? 'no imdb id'}`);
  });

  for (;;) {
    const selection = parseSelection(await ask(`Enter selection (1-${candidates.length}) or 0 to skip: `), candidates.length);
    if (selection === 'skip') return null;
    if (selection !== null) {
      const picked = candidates[selection - 1];
      if (picked) return picked;
    }
    print('Invalid selection, please try again.');
  }
}

export interface TerminalPrompt {
  resolve: AmbiguityResolver;
  close(): void;
}

export interface TerminalStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Once the input ends, pending and later questions reject, so the caller
 * records the title as unresolved instead of waiting forever.
 */
export function createTerminalPrompt(streams: TerminalStreams = {}): TerminalPrompt {
  const rl = readline.createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout,
  });

  let closed = false;
  const pending = new Set<(err: Error) => void>();
  rl.on('close', () => {
    closed = true;
    for (const reject of pending) reject(new Error('input closed before a selection was made'));
    pending.clear();
  });

  const ask: Ask = (query) =>
    new Promise((resolve, reject) => {
      if (closed) {
        reject(new Error('input closed before a selection was made'));
        return;
      }
      pending.add(reject);
      rl.question(query, (answer) => {
        pending.delete(reject);
        resolve(answer);
      });
    });
  const print: Print = (line) => console.log(line);

  return {
    resolve: (entry, candidates) => promptForMatch(ask, print, entry, candidates),
    close: () => rl.close(),
  };
}
