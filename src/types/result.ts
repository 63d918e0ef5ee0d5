/**
 * Outcome of a fallible decode step. Decoders return one of these instead of
 * throwing; the public entry points turn a failure back into an exception.
 */
export type Result<T, E = Error> = { ok: true; data: T } | { ok: false; error: E };

export function ok<T>(data: T): Result<T, never> {
	return { ok: true, data };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Returns the value of a successful step, or throws its error. */
export function unwrap<T, E = Error>(result: Result<T, E>): T {
	if (result.ok) return result.data;
	throw result.error;
}

/** Returns the error of a failed step. A successful one is a programming error. */
export function unwrapErr<T, E>(result: Result<T, E>): E {
	if (!result.ok) return result.error;
	throw new Error("expected a failed result, got a value");
}

export function mapResult<T, U, E>(result: Result<T, E>, fn: (data: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.data)) : result;
}

/** Runs the next step only when the previous one produced a value. */
export function andThen<T, U, E>(
	result: Result<T, E>,
	fn: (data: T) => Result<U, E>,
): Result<U, E> {
	return result.ok ? fn(result.data) : result;
}
