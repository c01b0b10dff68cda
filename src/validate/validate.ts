/**
 * Combinators over Validate. Same semantics as the Decode algebra; the
 * `(input, context)` pair is handed unchanged to every validator a
 * combinator runs, except where `withContext` extends it.
 */

import type { Decode } from "../decode/types.js";
import {
	altMonoid as deriveAltMonoid,
	alternativeMonoid as deriveAlternativeMonoid,
	applicativeMonoid as deriveApplicativeMonoid,
} from "../monoid/constructors.js";
import type { Monoid } from "../monoid/monoid.js";
import type { Lazy } from "../shared/function.js";
import type { Alternative, Monad } from "../typeclass/typeclass.js";
import { type Context, appendContext } from "../validation/context.js";
import type { Errors } from "../validation/errors.js";
import * as V from "../validation/monad.js";
import { failureWithMessage, failures, success } from "../validation/validation.js";
import type { Kleisli, Operator, Validate } from "./types.js";

// ── Constructors ─────────────────────────────────────────────────────

export function of<I, A>(a: A): Validate<I, A> {
	return () => success(a);
}

export function left<I, A>(errors: Errors): Validate<I, A> {
	return () => failures(errors);
}

/** Fails with the input as the offending value, at the current context. */
export function failure<I, A>(message: string): Validate<I, A> {
	return (input, context) => failureWithMessage(input, message, context);
}

/** Passes the input through when `predicate` holds. */
export function fromPredicate<I, A extends I>(
	refinement: (input: I) => input is A,
	message: string,
): Validate<I, A>;
export function fromPredicate<I>(predicate: (input: I) => boolean, message: string): Validate<I, I>;
export function fromPredicate<I>(predicate: (input: I) => boolean, message: string): Validate<I, I> {
	return (input, context) =>
		predicate(input) ? success(input) : failureWithMessage(input, message, context);
}

/** A context-free decoder; the context is ignored. */
export function fromDecode<I, A>(decode: Decode<I, A>): Validate<I, A> {
	return (input) => decode(input);
}

/** Fixes the context, yielding a plain decoder. */
export function toDecode<I, A>(validate: Validate<I, A>, context: Context = []): Decode<I, A> {
	return (input) => validate(input, context);
}

/** Runs `fa` one level deeper, recording `input` as the actual value there. */
export function withContext(
	key: string,
	type: string,
): <I, A>(fa: Validate<I, A>) => Validate<I, A> {
	return (fa) => (input, context) => fa(input, appendContext(context, { key, type, actual: input }));
}

// ── Data-first forms ─────────────────────────────────────────────────

function mapValidate<I, A, B>(fa: Validate<I, A>, f: (a: A) => B): Validate<I, B> {
	return (input, context) => V.map(fa(input, context), f);
}

function chainValidate<I, A, B>(fa: Validate<I, A>, f: Kleisli<I, A, B>): Validate<I, B> {
	return (input, context) => V.chain(fa(input, context), (a) => f(a)(input, context));
}

function chainLeftValidate<I, A>(fa: Validate<I, A>, f: Kleisli<I, Errors, A>): Validate<I, A> {
	return (input, context) =>
		V.chainLeft(fa(input, context), (errors) => f(errors)(input, context));
}

function apValidate<I, A, B>(fab: Validate<I, (a: A) => B>, fa: Validate<I, A>): Validate<I, B> {
	return (input, context) => {
		const ff = fab(input, context);
		const fv = fa(input, context);
		return V.ap(ff, fv);
	};
}

function altValidate<I, A>(first: Validate<I, A>, second: Lazy<Validate<I, A>>): Validate<I, A> {
	return chainLeftValidate(first, () => second());
}

// ── Pipeable operators ───────────────────────────────────────────────

export function map<A, B>(f: (a: A) => B): <I>(fa: Validate<I, A>) => Validate<I, B> {
	return (fa) => mapValidate(fa, f);
}

export function chain<I, A, B>(f: Kleisli<I, A, B>): Operator<I, A, B> {
	return (fa) => chainValidate(fa, f);
}

export function chainLeft<I, A>(f: Kleisli<I, Errors, A>): Operator<I, A, A> {
	return (fa) => chainLeftValidate(fa, f);
}

/** Alias of {@link chainLeft}. */
export const orElse = chainLeft;

export function ap<I, A>(fa: Validate<I, A>): <B>(fab: Validate<I, (a: A) => B>) => Validate<I, B> {
	return (fab) => apValidate(fab, fa);
}

export function alt<I, A>(second: Lazy<Validate<I, A>>): Operator<I, A, A> {
	return (first) => altValidate(first, second);
}

export const ValidateMonad: Monad<"Validate"> & Alternative<"Validate"> = {
	URI: "Validate",
	of,
	map: mapValidate,
	chain: chainValidate,
	ap: apValidate,
	alt: altValidate,
};

// ── Monoids ──────────────────────────────────────────────────────────

export function applicativeMonoid<I, A>(m: Monoid<A>): Monoid<Validate<I, A>> {
	return deriveApplicativeMonoid(ValidateMonad)<I, A>(m);
}

export function alternativeMonoid<I, A>(m: Monoid<A>): Monoid<Validate<I, A>> {
	return deriveAlternativeMonoid(ValidateMonad)<I, A>(m);
}

export function altMonoid<I, A>(zero: Lazy<Validate<I, A>>): Monoid<Validate<I, A>> {
	return deriveAltMonoid(ValidateMonad)<I, A>(zero);
}
