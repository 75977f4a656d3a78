/**
 * Base error class for ranking-related errors
 */
export abstract class RankingError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;

  constructor(message: string, code: string, category: ErrorCategory) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Caller supplied unusable input; retrying with the same input fails again
   */
  INPUT = 'input',

  /**
   * Local files or settings are unusable
   */
  ENVIRONMENT = 'environment'
}

/**
 * Ranking attempted over zero candidates
 */
export class EmptyCandidateSetError extends RankingError {
  constructor() {
    super('Cannot rank an empty candidate set', 'EMPTY_CANDIDATE_SET', ErrorCategory.INPUT);
  }
}

/**
 * Query normalized to zero tokens
 *
 * Callers decide whether this means "no query" (return candidates unranked) or a hard failure.
 */
export class InvalidQueryError extends RankingError {
  public readonly query: string;

  constructor(query: string) {
    super(`Query has no searchable terms: ${JSON.stringify(query)}`, 'INVALID_QUERY', ErrorCategory.INPUT);
    this.query = query;
  }
}

/**
 * Candidate set larger than limits.maxCandidates
 */
export class CandidateLimitError extends RankingError {
  public readonly candidateCount: number;
  public readonly maxCandidates: number;

  constructor(candidateCount: number, maxCandidates: number) {
    super(
      `Candidate set size (${candidateCount}) exceeds maximum (${maxCandidates})`,
      'CANDIDATE_LIMIT_EXCEEDED',
      ErrorCategory.INPUT
    );
    this.candidateCount = candidateCount;
    this.maxCandidates = maxCandidates;
  }
}

/**
 * Candidate file missing, unreadable, or not matching the movie schema
 */
export class CandidateFileError extends RankingError {
  public readonly path: string;
  public readonly originalError?: Error;

  constructor(path: string, reason: string, originalError?: Error) {
    super(`Invalid candidate file ${path}: ${reason}`, 'CANDIDATE_FILE_INVALID', ErrorCategory.ENVIRONMENT);
    this.path = path;
    this.originalError = originalError;
  }
}

/**
 * Configuration validation error
 */
export class ConfigurationError extends RankingError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    const message = `Invalid configuration for '${field}': ${reason} (value: ${JSON.stringify(value)})`;
    super(message, 'INVALID_CONFIGURATION', ErrorCategory.ENVIRONMENT);
    this.field = field;
    this.value = value;
  }
}

/**
 * Check if error is a ranking error
 */
export function isRankingError(error: unknown): error is RankingError {
  return error instanceof RankingError;
}
