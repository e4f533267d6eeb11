/**
 * Result Type Utilities
 *
 * Store, index and cascade operations return neverthrow Results instead of
 * throwing; callers on the request path map the error side to a response.
 */

import { Result as NeverthrowResult, ok as neverthrowOk, err as neverthrowErr } from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Run `fn` and capture a throw as an Err built by `toError`
 */
export function trySync<T, E>(fn: () => T, toError: (error: unknown) => E): Result<T, E> {
	try {
		return ok(fn());
	} catch (error) {
		return err(toError(error));
	}
}
