/**
 * Movie records supplied by the catalog collaborator
 *
 * @module movie
 */

import { z } from 'zod';

/**
 * Stable catalog identifier (numeric for the movie catalog, string for fixtures)
 */
export type MovieId = number | string;

/**
 * Candidate movie
 *
 * Owned by whoever builds the candidate set; the ranking engine only reads it.
 */
export interface Movie {
  readonly id: MovieId;
  readonly title: string;
  readonly overview: string;

  /**
   * Catalog popularity, non-negative and unbounded
   */
  readonly popularity: number;

  /**
   * ISO date (YYYY-MM-DD), used for exact title/year matching
   */
  readonly releaseDate?: string;

  readonly genres?: readonly string[];
  readonly cast?: readonly string[];
}

export const MovieSchema = z
  .object({
    id: z.union([z.number().int(), z.string().min(1)]).describe('Catalog identifier'),
    title: z.string().describe('Display title'),
    overview: z.string().nullish().describe('Plot overview'),
    popularity: z.number().nonnegative().nullish().describe('Catalog popularity (>= 0)'),
    releaseDate: z.string().optional(),
    release_date: z.string().optional(),
    genres: z.array(z.string()).optional(),
    cast: z.array(z.string()).optional(),
  })
  .transform((raw): Movie => ({
    id: raw.id,
    title: raw.title,
    overview: raw.overview ?? '',
    popularity: raw.popularity ?? 0,
    releaseDate: raw.releaseDate ?? raw.release_date,
    genres: raw.genres,
    cast: raw.cast,
  }));

/**
 * A candidate file is either a bare array or a catalog search response
 */
export const CandidateFileSchema = z.union([
  z.array(MovieSchema),
  z.object({ results: z.array(MovieSchema) }).transform(page => page.results),
]);
