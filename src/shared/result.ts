/**
 * Result<T, E>: the either-type every validation outcome is built on.
 *
 * `Validation<A>` is `Result<A, Errors>`; boundary helpers such as `toResult`
 * turn it into `Result<A, ValidationFailedError>` for callers that want a
 * single error value.
 */

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

/** Success branch of a Result. */
export type Ok<T> = Extract<Result<T, never>, { readonly ok: true }>;

/** Failure branch of a Result. */
export type Err<E> = Extract<Result<never, E>, { readonly ok: false }>;

// ── Factories ────────────────────────────────────────────────────────

/** Create a successful Result wrapping the given value. */
export function ok<T>(value: T): Ok<T> {
	return { ok: true, value };
}

/** Create a failed Result wrapping the given error. */
export function err<E>(error: E): Err<E> {
	return { ok: false, error };
}

// ── Extraction ───────────────────────────────────────────────────────

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Extract the success value or return the provided fallback on error. */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
	return result.ok ? result.value : fallback;
}

/** Type guard: narrows a Result to its success variant. */
export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
	return result.ok;
}

/** Type guard: narrows a Result to its error variant. */
export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
	return !result.ok;
}
