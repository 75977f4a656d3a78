/**
 * Unit tests for TieBreaker
 */

import { describe, it, expect } from 'vitest';
import { TieBreaker } from '../../src/services/tie-breaker.js';
import { SCORE_EPSILON } from '../../src/constants/ranking-constants.js';
import { createMovie } from '../helpers/movie-test-helper.js';

function moviesWithPopularity(...popularities: number[]) {
  return popularities.map((popularity, i) => createMovie(i, `Movie ${i}`, '', popularity));
}

describe('TieBreaker', () => {
  const tieBreaker = new TieBreaker(SCORE_EPSILON);

  describe('Selection', () => {
    it('should select the highest value', () => {
      expect(tieBreaker.selectBest([1, 3, 2], moviesWithPopularity(0, 0, 0))).toBe(1);
    });

    it('should return null for an empty vector', () => {
      expect(tieBreaker.selectBest([], [])).toBeNull();
    });
  });

  describe('Tie resolution', () => {
    it('should prefer higher popularity on equal values', () => {
      expect(tieBreaker.selectBest([5, 5], moviesWithPopularity(10, 20))).toBe(1);
    });

    it('should prefer the lowest index on full ties', () => {
      expect(tieBreaker.selectBest([5, 5, 5], moviesWithPopularity(7, 7, 7))).toBe(0);
    });

    it('should treat values within epsilon as tied', () => {
      const values = [1.0, 1.0 + 1e-12];

      expect(tieBreaker.selectBest(values, moviesWithPopularity(20, 10))).toBe(0);
    });

    it('should not treat values beyond epsilon as tied', () => {
      const values = [1.0, 1.001];

      expect(tieBreaker.selectBest(values, moviesWithPopularity(20, 10))).toBe(1);
    });
  });

  describe('Exclusion', () => {
    it('should find the runner-up when the winner is excluded', () => {
      expect(tieBreaker.selectBest([1, 3, 2], moviesWithPopularity(0, 0, 0), 1)).toBe(2);
    });

    it('should return null when the only entry is excluded', () => {
      expect(tieBreaker.selectBest([4], moviesWithPopularity(0), 0)).toBeNull();
    });
  });

  describe('compare', () => {
    it('should order by value, popularity, then index', () => {
      const movies = moviesWithPopularity(5, 9, 5);

      expect(tieBreaker.compare(0, 1, [2, 1, 2], movies)).toBeGreaterThan(0);
      expect(tieBreaker.compare(0, 1, [2, 2, 2], movies)).toBeLessThan(0);
      expect(tieBreaker.compare(0, 2, [2, 2, 2], movies)).toBeGreaterThan(0);
      expect(tieBreaker.compare(0, 0, [2, 2, 2], movies)).toBe(0);
    });
  });
});
