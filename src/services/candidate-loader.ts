/**
 * Candidate set loading from JSON files
 *
 * @module candidate-loader
 */

import { readFileSync } from 'fs';
import type { Movie } from '../models/movie.js';
import { CandidateFileSchema } from '../models/movie.js';
import { CandidateFileError } from '../lib/errors/RankingErrors.js';
import { err, ok, toError, trySync, type Result } from '../lib/result-types.js';

/**
 * Parse an already-read candidate document
 *
 * Accepts a bare array of movies or a catalog search page ({ results: [...] }).
 *
 * @param source - Label used in error messages (usually the file path)
 * @param content - Raw JSON text
 */
export function parseCandidates(source: string, content: string): Result<Movie[], CandidateFileError> {
  const parsed = trySync(
    (): unknown => JSON.parse(content),
    error => new CandidateFileError(source, 'not valid JSON', toError(error))
  );
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const validated = CandidateFileSchema.safeParse(parsed.value);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return err(new CandidateFileError(source, `${issue?.message ?? 'schema mismatch'}${where}`));
  }

  return ok(validated.data);
}

/**
 * Load and validate a candidate file
 *
 * @param path - Path to a JSON candidate file
 */
export function loadCandidates(path: string): Result<Movie[], CandidateFileError> {
  const content = trySync(
    () => readFileSync(path, 'utf-8'),
    error => new CandidateFileError(path, 'could not be read', toError(error))
  );
  if (content.isErr()) {
    return err(content.error);
  }

  return parseCandidates(path, content.value);
}
