/**
 * Movie lookup client (Radarr-compatible /movie/lookup).
 * Never throws: any failure is logged and yields an empty candidate list.
 */

import { createLogger, errorMessage } from '../shared/log.js';
import type { CandidateMatch, LookupConfig, MovieImage, MovieLookup } from '../shared/types.js';

const log = createLogger('lookup');

/** Target year meaning "accept any year" */
export const ANY_YEAR = 0;

const YEAR_PATTERN = /\((\d{4})\)/;

interface RequestOptions extends RequestInit {
  query?: Record<string, string | number | undefined>;
  timeoutMs: number;
}

export function extractYear(term: string): number {
  const match = YEAR_PATTERN.exec(term);
  if (!match) return ANY_YEAR;
  const year = Number.parseInt(match[1], 10);
  return Number.isFinite(year) ? year : ANY_YEAR;
}

function hasIdentifier(c: CandidateMatch): boolean {
  return Boolean(c.imdbId) || (c.tmdbId !== undefined && c.tmdbId !== null);
}

function matchesYear(c: CandidateMatch, year: number): boolean {
  return year === ANY_YEAR || c.year === year || c.secondaryYear === year;
}

/** Keep candidates carrying an identifier whose primary or secondary year fits */
export function filterCandidates(candidates: readonly CandidateMatch[], year: number): CandidateMatch[] {
  return candidates.filter((c) => hasIdentifier(c) && matchesYear(c, year));
}

/** Popularity descending; missing popularity sorts last. Stable. */
export function rankCandidates(candidates: readonly CandidateMatch[]): CandidateMatch[] {
  const score = (c: CandidateMatch) => c.popularity ?? Number.NEGATIVE_INFINITY;
  return [...candidates].sort((a, b) => {
    const sa = score(a);
    const sb = score(b);
    if (sa === sb) return 0;
    return sb > sa ? 1 : -1;
  });
}

// ──────────────────────────────────────────────────────────────────
// Response parsing
// ──────────────────────────────────────────────────────────────────

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toImage(raw: unknown): MovieImage | null {
  if (!isObject(raw)) return null;
  const coverType = optString(raw.coverType);
  if (!coverType) return null;
  return { coverType, url: optString(raw.url), remoteUrl: optString(raw.remoteUrl) };
}

export function toCandidate(raw: unknown): CandidateMatch | null {
  if (!isObject(raw)) return null;
  const images = Array.isArray(raw.images)
    ? raw.images.map(toImage).filter((img): img is MovieImage => img !== null)
    : [];
  const genres = Array.isArray(raw.genres)
    ? raw.genres.filter((g): g is string => typeof g === 'string')
    : undefined;

  return {
    title: optString(raw.title),
    originalTitle: optString(raw.originalTitle),
    year: optNumber(raw.year),
    secondaryYear: optNumber(raw.secondaryYear),
    imdbId: optString(raw.imdbId),
    tmdbId: optNumber(raw.tmdbId),
    popularity: optNumber(raw.popularity),
    overview: optString(raw.overview),
    genres,
    images,
    remotePoster: optString(raw.remotePoster),
  };
}

// ──────────────────────────────────────────────────────────────────
// Client
// ──────────────────────────────────────────────────────────────────

export class LookupClient implements MovieLookup {
  private readonly baseUrl: string;
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(config: LookupConfig) {
    this.baseUrl = config.url.replace(/\/$/, '');
    this.endpoint = config.endpoint.startsWith('/') ? config.endpoint : `/${config.endpoint}`;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Search for a term, optionally carrying a "(YYYY)" suffix that constrains
   * the release year. Results are filtered and ranked by popularity.
   */
  async lookup(term: string): Promise<CandidateMatch[]> {
    try {
      const year = extractYear(term);
      const body = await this.request(this.endpoint, {
        query: { term, apiKey: this.apiKey },
        timeoutMs: this.timeoutMs,
      });
      if (!Array.isArray(body)) {
        throw new Error(`expected an array of movies, got ${body === null ? 'null' : typeof body}`);
      }
      const candidates = body.map(toCandidate).filter((c): c is CandidateMatch => c !== null);
      return rankCandidates(filterCandidates(candidates, year));
    } catch (err) {
      log.error(`API Error for "${term}": ${errorMessage(err)}`);
      return [];
    }
  }

  private async request(endpoint: string, opts: RequestOptions): Promise<unknown> {
    const { query, timeoutMs, ...init } = opts;
    const url = new URL(this.baseUrl + endpoint);
    if (query) {
      Object.entries(query).forEach(([k, v]) => {
        if (v !== undefined) url.searchParams.append(k, String(v));
      });
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(url.toString(), {
        ...init,
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      if (!res.ok) {
        const text = await res.text();
        throw new Error(`Lookup request failed ${res.status}: ${text}`);
      }
      return await res.json();
    } finally {
      clearTimeout(timer);
    }
  }
}
