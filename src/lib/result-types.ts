/**
 * Result Type Utilities
 *
 * Re-exports of the neverthrow Result pattern. Services return these instead
 * of throwing for expected failures.
 */

import { Result as NeverthrowResult, ok as neverthrowOk, err as neverthrowErr } from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
