/**
 * Exact title + release year lookup
 *
 * @module title-matcher
 */

import type { Movie } from '../models/movie.js';

/**
 * Find the first candidate whose title and release year match exactly
 *
 * Titles compare trimmed and case-insensitive; the year is matched against
 * the leading four characters of releaseDate.
 *
 * @param candidates - Candidate sequence
 * @param title - Title as understood from the query
 * @param year - Four-digit release year
 * @returns Index of the match, or null
 */
export function findTitleYearMatch(
  candidates: readonly Movie[],
  title: string,
  year: string
): number | null {
  const wantedTitle = title.trim().toLowerCase();
  const wantedYear = year.trim();

  if (wantedTitle.length === 0 || wantedYear.length === 0) {
    return null;
  }

  const index = candidates.findIndex(
    movie =>
      movie.title.trim().toLowerCase() === wantedTitle &&
      (movie.releaseDate ?? '').slice(0, 4) === wantedYear
  );

  return index === -1 ? null : index;
}
