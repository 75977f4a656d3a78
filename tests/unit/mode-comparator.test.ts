/**
 * Unit tests for ModeComparator
 */

import { describe, it, expect } from 'vitest';
import { ModeComparator } from '../../src/services/mode-comparator.js';
import { DEFAULT_RANKING_CONFIG } from '../../src/constants/ranking-constants.js';
import { EmptyCandidateSetError, InvalidQueryError } from '../../src/lib/errors/RankingErrors.js';
import type { Movie } from '../../src/models/movie.js';
import { amplificationArtifactCandidates, createMovie, dreamCandidates } from '../helpers/movie-test-helper.js';

describe('ModeComparator', () => {
  const comparator = new ModeComparator(DEFAULT_RANKING_CONFIG);

  it('should report agreement when both rankers select the same movie', () => {
    const comparison = comparator.compare(dreamCandidates(), 'dream inside dreams')._unsafeUnwrap();

    expect(comparison.classicalIndex).toBe(0);
    expect(comparison.quantumIndex).toBe(0);
    expect(comparison.agree).toBe(true);
    expect(comparison.quantumIterations).toBe(1);
    expect(comparison.diversity).toBe(0);
    expect(comparison.classical.mode).toBe('classical');
    expect(comparison.quantum.mode).toBe('quantum');
  });

  it('should surface disagreement without resolving it', () => {
    const comparison = comparator.compare(amplificationArtifactCandidates(), 'space')._unsafeUnwrap();

    expect(comparison.classicalIndex).toBe(0);
    expect(comparison.quantumIndex).toBe(2);
    expect(comparison.agree).toBe(false);
    expect(comparison.classical.index).toBe(0);
    expect(comparison.quantum.index).toBe(2);
  });

  it('should measure diversity between the two selections', () => {
    const comparison = comparator.compare(amplificationArtifactCandidates(), 'space')._unsafeUnwrap();

    // {sci-fi, adventure} against {romance, ann lee}
    expect(comparison.diversity).toBe(1);
  });

  it('should propagate ranking errors', () => {
    expect(comparator.compare([], 'space')._unsafeUnwrapErr()).toBeInstanceOf(EmptyCandidateSetError);
    expect(comparator.compare(dreamCandidates(), '...')._unsafeUnwrapErr()).toBeInstanceOf(InvalidQueryError);
  });

  it('should not mutate the candidates', () => {
    const candidates: readonly Movie[] = Object.freeze(
      [
        createMovie(1, 'Star Drifters', 'a space opera', 0, { genres: ['Sci-Fi'] }),
        createMovie(2, 'Paper Hearts', 'a quiet romance', 95, { genres: ['Romance'] }),
      ].map(movie => Object.freeze(movie))
    );
    const snapshot = JSON.stringify(candidates);

    expect(comparator.compare(candidates, 'space').isOk()).toBe(true);
    expect(JSON.stringify(candidates)).toBe(snapshot);
  });
});
