/**
 * Combinators over Validation, data-first like the shared Result helpers.
 *
 * `ap` is the accumulating apply: both sides are inspected and their errors
 * concatenated. `chain` is fail-fast. `chainLeft` retains the original errors
 * when recovery fails too.
 */

import type { Monoid } from "../monoid/monoid.js";
import {
	alternativeMonoid as deriveAlternativeMonoid,
	applicativeMonoid as deriveApplicativeMonoid,
} from "../monoid/constructors.js";
import type { Lazy } from "../shared/function.js";
import type { Alternative, Monad } from "../typeclass/typeclass.js";
import { type Errors, concatErrors } from "./errors.js";
import { type Validation, failures, success } from "./validation.js";

export function of<A>(a: A): Validation<A> {
	return success(a);
}

export function map<A, B>(fa: Validation<A>, f: (a: A) => B): Validation<B> {
	return fa.ok ? success(f(fa.value)) : fa;
}

export function chain<A, B>(fa: Validation<A>, f: (a: A) => Validation<B>): Validation<B> {
	return fa.ok ? f(fa.value) : fa;
}

/**
 * Recovers from a failure. If the handler fails as well, the result carries
 * the original errors followed by the handler's.
 */
export function chainLeft<A>(
	fa: Validation<A>,
	f: (errors: Errors) => Validation<A>,
): Validation<A> {
	if (fa.ok) return fa;
	const recovered = f(fa.error);
	return recovered.ok ? recovered : failures(concatErrors(fa.error, recovered.error));
}

/** Alias of {@link chainLeft}. */
export const orElse = chainLeft;

export function ap<A, B>(fab: Validation<(a: A) => B>, fa: Validation<A>): Validation<B> {
	if (fab.ok) {
		return fa.ok ? success(fab.value(fa.value)) : fa;
	}
	return fa.ok ? fab : failures(concatErrors(fab.error, fa.error));
}

/** `second` is evaluated only if `first` failed. */
export function alt<A>(first: Validation<A>, second: Lazy<Validation<A>>): Validation<A> {
	return chainLeft(first, () => second());
}

/** Replaces the error list, e.g. to attach context. Successes pass through. */
export function mapLeft<A>(fa: Validation<A>, f: (errors: Errors) => Errors): Validation<A> {
	return fa.ok ? fa : failures(f(fa.error));
}

export const ValidationMonad: Monad<"Validation"> & Alternative<"Validation"> = {
	URI: "Validation",
	of,
	map,
	chain,
	ap,
	alt,
};

/** Combines successful values with `m`; aggregates errors otherwise. */
export function applicativeMonoid<A>(m: Monoid<A>): Monoid<Validation<A>> {
	return deriveApplicativeMonoid(ValidationMonad)<unknown, A>(m);
}

/** Like {@link applicativeMonoid}, but a single success survives a failing partner. */
export function alternativeMonoid<A>(m: Monoid<A>): Monoid<Validation<A>> {
	return deriveAlternativeMonoid(ValidationMonad)<unknown, A>(m);
}
