/**
 * Unit tests for candidate file loading
 */

import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { loadCandidates, parseCandidates } from '../../src/services/candidate-loader.js';
import { CandidateFileError } from '../../src/lib/errors/RankingErrors.js';

const FIXTURE_PATH = join(fileURLToPath(new URL('.', import.meta.url)), '..', 'fixtures', 'movies.json');

describe('parseCandidates', () => {
  it('should accept a bare array of movies', () => {
    const movies = parseCandidates('inline', JSON.stringify([
      { id: 1, title: 'Inception', overview: 'dream heist', popularity: 90, genres: ['Sci-Fi'] },
    ]))._unsafeUnwrap();

    expect(movies).toEqual([
      {
        id: 1,
        title: 'Inception',
        overview: 'dream heist',
        popularity: 90,
        releaseDate: undefined,
        genres: ['Sci-Fi'],
        cast: undefined,
      },
    ]);
  });

  it('should accept a catalog search page', () => {
    const movies = parseCandidates('inline', JSON.stringify({
      results: [{ id: 'tt-1', title: 'Heist', overview: 'vault', popularity: 1 }],
    }))._unsafeUnwrap();

    expect(movies).toHaveLength(1);
    expect(movies[0].id).toBe('tt-1');
  });

  it('should map release_date and default missing fields', () => {
    const [movie] = parseCandidates('inline', JSON.stringify([
      { id: 2, title: 'Harbor Lights', overview: null, release_date: '2021-06-30' },
    ]))._unsafeUnwrap();

    expect(movie.overview).toBe('');
    expect(movie.popularity).toBe(0);
    expect(movie.releaseDate).toBe('2021-06-30');
  });

  it('should reject invalid JSON', () => {
    const error = parseCandidates('broken.json', '{ not json')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(CandidateFileError);
    expect(error.code).toBe('CANDIDATE_FILE_INVALID');
    expect(error.path).toBe('broken.json');
    expect(error.originalError).toBeInstanceOf(SyntaxError);
  });

  it('should reject negative popularity', () => {
    const result = parseCandidates('inline', JSON.stringify([
      { id: 3, title: 'Bad', overview: '', popularity: -1 },
    ]));

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(CandidateFileError);
  });

  it('should reject records without a title', () => {
    expect(parseCandidates('inline', JSON.stringify([{ id: 4 }])).isErr()).toBe(true);
  });
});

describe('loadCandidates', () => {
  it('should load the fixture file', () => {
    const movies = loadCandidates(FIXTURE_PATH)._unsafeUnwrap();

    expect(movies.map(movie => movie.id)).toEqual([1001, 1002, 1003]);
    expect(movies[1].cast).toEqual(['Placeholder Actor']);
    expect(movies[2].popularity).toBe(0);
  });

  it('should report unreadable files', () => {
    const missing = join(fileURLToPath(new URL('.', import.meta.url)), 'does-not-exist.json');
    const error = loadCandidates(missing)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(CandidateFileError);
    expect(error.message).toBe(`Invalid candidate file ${missing}: could not be read`);
  });
});
