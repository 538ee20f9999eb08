import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { vi } from 'vitest';

import type { CandidateMatch, LookupConfig, TranslatorConfig } from '../shared/types.js';

export type FetchHandler = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

function toUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/** Replace global fetch for the current test */
export function stubFetch(handler: FetchHandler) {
  const fn = vi.fn(async (input: string | URL | Request, init?: RequestInit) => handler(toUrl(input), init));
  vi.stubGlobal('fetch', fn);
  return fn;
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
}

export function tmpDir(prefix = 'list-resolver-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function candidate(overrides: Partial<CandidateMatch> = {}): CandidateMatch {
  return {
    title: 'Untitled',
    year: 2000,
    imdbId: 'tt0000001',
    tmdbId: 1,
    images: [],
    ...overrides,
  };
}

export const lookupConfig: LookupConfig = {
  url: 'http://lookup.test:7878',
  endpoint: '/api/v3/movie/lookup',
  apiKey: 'test-key',
  apiKeyFiles: [],
  timeoutMs: 30_000,
};

export const translatorConfig: TranslatorConfig = {
  enabled: true,
  url: 'http://translate.test:5000',
  source: 'es',
  target: 'en',
  timeoutMs: 30_000,
  maxAttempts: 3,
  baseDelayMs: 1000,
};
