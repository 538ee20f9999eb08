import type { CandidateMatch, ResolvedMovie } from '../shared/types.js';

export type Selection =
  | { kind: 'none' }
  | { kind: 'match'; match: CandidateMatch; ambiguous: boolean };

/**
 * Candidates arrive ranked. More than one means ambiguous, but the top one is
 * still taken.
 */
export function selectMatch(candidates: readonly CandidateMatch[]): Selection {
  const [top] = candidates;
  if (!top) return { kind: 'none' };
  return { kind: 'match', match: top, ambiguous: candidates.length > 1 };
}

export function posterUrl(movie: CandidateMatch): string {
  const poster = movie.images.find((img) => img.coverType === 'poster');
  if (poster?.remoteUrl) return poster.remoteUrl;
  if (movie.remotePoster) return movie.remotePoster;
  return '';
}

export function toResolvedMovie(movie: CandidateMatch): ResolvedMovie {
  return {
    Title: movie.title ?? null,
    Poster_url: posterUrl(movie),
    Imdb_id: movie.imdbId ?? null,
    Tmdb_id: movie.tmdbId ?? null,
  };
}
