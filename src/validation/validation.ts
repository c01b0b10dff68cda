/**
 * Validation<A>: success value or the accumulated list of errors.
 *
 * Built on the shared Result type: `{ ok: true, value }` or
 * `{ ok: false, error: Errors }`.
 */

import { ValidationFailedError } from "../shared/errors.js";
import { type Err, type Ok, type Result, err, ok } from "../shared/result.js";
import type { Context } from "./context.js";
import type { Errors } from "./errors.js";
import { validationError } from "./validation-error.js";

export type Validation<A> = Result<A, Errors>;

export type Success<A> = Ok<A>;

export type Failure = Err<Errors>;

// ── Constructors ─────────────────────────────────────────────────────

export function success<A>(value: A): Success<A> {
	return ok(value);
}

/** A failed validation carrying `errors` as-is. */
export function failures(errors: Errors): Failure {
	return err(errors);
}

/** A failure with a single error built from a value and message. */
export function failureWithMessage(value: unknown, message: string, context: Context = []): Failure {
	return failures([validationError({ value, context, message })]);
}

/** A failure with a single error that wraps the lower-level `cause`. */
export function failureWithError(
	value: unknown,
	message: string,
	cause: Error,
	context: Context = [],
): Failure {
	return failures([validationError({ value, context, message, cause })]);
}

// ── Inspection ───────────────────────────────────────────────────────

export function isSuccess<A>(v: Validation<A>): v is Success<A> {
	return v.ok;
}

export function isFailure<A>(v: Validation<A>): v is Failure {
	return !v.ok;
}

export function fold<A, R>(
	v: Validation<A>,
	onFailure: (errors: Errors) => R,
	onSuccess: (value: A) => R,
): R {
	return v.ok ? onSuccess(v.value) : onFailure(v.error);
}

export function getOrElse<A>(v: Validation<A>, onFailure: (errors: Errors) => A): A {
	return v.ok ? v.value : onFailure(v.error);
}

/** The accumulated errors, or `[]` for a success. */
export function getErrors<A>(v: Validation<A>): Errors {
	return v.ok ? [] : v.error;
}

/** Collapses the error list into a single ValidationFailedError. */
export function toResult<A>(v: Validation<A>): Result<A, ValidationFailedError> {
	return v.ok ? v : err(new ValidationFailedError(v.error));
}
