/**
 * Result Type Utilities
 *
 * Re-exports and utilities for the Result/Either monad pattern using neverthrow.
 * Ranking operations report failures as values instead of throwing.
 */

import {
	Result as NeverthrowResult,
	ok as neverthrowOk,
	err as neverthrowErr,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Execute a synchronous function and wrap result in Result type
 *
 * @param fn - Synchronous function to execute
 * @param errorHandler - Function to convert errors to type E
 * @returns Result
 */
export function trySync<T, E>(
	fn: () => T,
	errorHandler: (error: unknown) => E
): Result<T, E> {
	try {
		const value = fn();
		return ok(value);
	} catch (error) {
		return err(errorHandler(error));
	}
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
