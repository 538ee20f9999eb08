import { describe, expect, it } from 'vitest';

import { candidate } from '../../__tests__/helpers.js';
import { ResultBag } from '../resultBag.js';
import { posterUrl, selectMatch, toResolvedMovie } from '../selector.js';

describe('selectMatch', () => {
  it('returns none for an empty list', () => {
    expect(selectMatch([])).toEqual({ kind: 'none' });
  });

  it('takes a single candidate without flagging it', () => {
    const only = candidate({ title: 'Alien' });
    expect(selectMatch([only])).toEqual({ kind: 'match', match: only, ambiguous: false });
  });

  it('takes the first of several and flags the set as ambiguous', () => {
    const top = candidate({ title: 'Heat', popularity: 8 });
    const next = candidate({ title: 'Heat (TV)', popularity: 5 });
    expect(selectMatch([top, next])).toEqual({ kind: 'match', match: top, ambiguous: true });
  });
});

describe('posterUrl', () => {
  it('prefers the poster image', () => {
    const movie = candidate({
      images: [
        { coverType: 'fanart', remoteUrl: 'https://img.test/fanart.jpg' },
        { coverType: 'poster', remoteUrl: 'https://img.test/poster.jpg' },
      ],
      remotePoster: 'https://img.test/remote.jpg',
    });
    expect(posterUrl(movie)).toBe('https://img.test/poster.jpg');
  });

  it('falls back to remotePoster when the poster image has no remote url', () => {
    const movie = candidate({
      images: [{ coverType: 'poster', url: '/MediaCover/1/poster.jpg', remoteUrl: '' }],
      remotePoster: 'https://img.test/remote.jpg',
    });
    expect(posterUrl(movie)).toBe('https://img.test/remote.jpg');
  });

  it('returns an empty string when nothing is available', () => {
    expect(posterUrl(candidate({ images: [{ coverType: 'banner', remoteUrl: 'https://img.test/b.jpg' }] }))).toBe('');
  });
});

describe('toResolvedMovie', () => {
  it('projects to the export shape', () => {
    const movie = candidate({
      title: 'The Matrix',
      imdbId: 'tt0133093',
      tmdbId: 603,
      remotePoster: 'https://img.test/matrix.jpg',
    });
    expect(toResolvedMovie(movie)).toEqual({
      Title: 'The Matrix',
      Poster_url: 'https://img.test/matrix.jpg',
      Imdb_id: 'tt0133093',
      Tmdb_id: 603,
    });
  });

  it('uses null for missing identifiers', () => {
    expect(toResolvedMovie({ images: [], tmdbId: 7 })).toEqual({
      Title: null,
      Poster_url: '',
      Imdb_id: null,
      Tmdb_id: 7,
    });
  });
});

describe('ResultBag', () => {
  it('drains a copy in append order', () => {
    const bag = new ResultBag<string>();
    bag.append('a');
    bag.append('b');

    const drained = bag.drain();
    drained.push('c');

    expect(bag.drain()).toEqual(['a', 'b']);
    expect(bag.size).toBe(2);
  });
});
