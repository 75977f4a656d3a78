/**
 * Text normalization shared by queries and movie text
 *
 * @module tokenizer
 */

import { err, ok, type Result } from './result-types.js';
import { InvalidQueryError } from './errors/RankingErrors.js';

const TOKEN_BOUNDARY = /[^\p{L}\p{N}]+/u;

/**
 * Lower-case and split on every non-alphanumeric boundary
 *
 * @param text - Raw text
 * @returns Tokens in order of appearance, duplicates kept
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_BOUNDARY)
    .filter(token => token.length > 0);
}

/**
 * Token set for membership tests
 */
export function tokenSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

/**
 * Normalize a raw query into its token set
 *
 * @param query - Raw query text
 * @returns Query tokens, or InvalidQueryError when none survive normalization
 */
export function parseQuery(query: string): Result<ReadonlySet<string>, InvalidQueryError> {
  const tokens = tokenSet(query);

  if (tokens.size === 0) {
    return err(new InvalidQueryError(query));
  }

  return ok(tokens);
}
