/**
 * Combinator algebra over Decode.
 *
 * Every combinator hands the same input to each decoder it runs. The
 * exported functions are pipeable (data-last); `DecodeMonad` holds the
 * data-first forms used by the generic monoid constructors.
 */

import { toError } from "../shared/errors.js";
import type { Lazy } from "../shared/function.js";
import type { Alternative, Monad } from "../typeclass/typeclass.js";
import type { Errors } from "../validation/errors.js";
import * as V from "../validation/monad.js";
import { type Validation, failureWithError, failures, success } from "../validation/validation.js";
import type { Decode, Kleisli, Operator } from "./types.js";

// ── Constructors ─────────────────────────────────────────────────────

/** Ignores its input and succeeds with `a`. */
export function of<I, A>(a: A): Decode<I, A> {
	return () => success(a);
}

/** Ignores its input and fails with `errors`. */
export function left<I, A>(errors: Errors): Decode<I, A> {
	return () => failures(errors);
}

export function fromValidation<I, A>(v: Validation<A>): Decode<I, A> {
	return () => v;
}

/**
 * Lifts a throwing function. A thrown value becomes the `cause` of a single
 * error whose value is the input.
 */
export function fromThrowable<I, A>(f: (input: I) => A, message: string): Decode<I, A> {
	return (input) => {
		try {
			return success(f(input));
		} catch (e) {
			return failureWithError(input, message, toError(e));
		}
	};
}

// ── Data-first forms ─────────────────────────────────────────────────

function mapDecode<I, A, B>(fa: Decode<I, A>, f: (a: A) => B): Decode<I, B> {
	return (input) => V.map(fa(input), f);
}

function chainDecode<I, A, B>(fa: Decode<I, A>, f: Kleisli<I, A, B>): Decode<I, B> {
	return (input) => V.chain(fa(input), (a) => f(a)(input));
}

function chainLeftDecode<I, A>(fa: Decode<I, A>, f: Kleisli<I, Errors, A>): Decode<I, A> {
	return (input) => V.chainLeft(fa(input), (errors) => f(errors)(input));
}

function apDecode<I, A, B>(fab: Decode<I, (a: A) => B>, fa: Decode<I, A>): Decode<I, B> {
	return (input) => {
		const ff = fab(input);
		const fv = fa(input);
		return V.ap(ff, fv);
	};
}

function altDecode<I, A>(first: Decode<I, A>, second: Lazy<Decode<I, A>>): Decode<I, A> {
	return chainLeftDecode(first, () => second());
}

// ── Pipeable operators ───────────────────────────────────────────────

/** `f` is never called on a failure. */
export function map<A, B>(f: (a: A) => B): <I>(fa: Decode<I, A>) => Decode<I, B> {
	return (fa) => mapDecode(fa, f);
}

/**
 * Monadic bind: on success runs `f(a)` against the same input; a failure
 * short-circuits.
 */
export function chain<I, A, B>(f: Kleisli<I, A, B>): Operator<I, A, B> {
	return (fa) => chainDecode(fa, f);
}

/**
 * Recovery: on failure runs `f(errors)` against the same input. A successful
 * recovery discards the original errors; a failed one keeps both lists,
 * original first.
 */
export function chainLeft<I, A>(f: Kleisli<I, Errors, A>): Operator<I, A, A> {
	return (fa) => chainLeftDecode(fa, f);
}

/** Alias of {@link chainLeft}. */
export const orElse = chainLeft;

/**
 * Applicative apply. Both decoders always run; when both fail the function
 * side's errors come first.
 */
export function ap<I, A>(fa: Decode<I, A>): <B>(fab: Decode<I, (a: A) => B>) => Decode<I, B> {
	return (fab) => apDecode(fab, fa);
}

/**
 * Fallback. `second` is only forced after the first decoder has failed on the
 * given input; when both fail the errors appear in attempt order.
 */
export function alt<I, A>(second: Lazy<Decode<I, A>>): Operator<I, A, A> {
	return (first) => altDecode(first, second);
}

/** Rewrites the error list of a failure. */
export function mapLeft(f: (errors: Errors) => Errors): <I, A>(fa: Decode<I, A>) => Decode<I, A> {
	return (fa) => (input) => V.mapLeft(fa(input), f);
}

export const DecodeMonad: Monad<"Decode"> & Alternative<"Decode"> = {
	URI: "Decode",
	of,
	map: mapDecode,
	chain: chainDecode,
	ap: apDecode,
	alt: altDecode,
};
