import {
	altMonoid as deriveAltMonoid,
	alternativeMonoid as deriveAlternativeMonoid,
	applicativeMonoid as deriveApplicativeMonoid,
} from "../monoid/constructors.js";
import type { Monoid } from "../monoid/monoid.js";
import type { Lazy } from "../shared/function.js";
import { DecodeMonad } from "./monad.js";
import type { Decode } from "./types.js";

/**
 * Lifts `m` into decoders: both run against the same input and their values
 * are combined with `m.concat`; if either fails, errors aggregate as in `ap`.
 *
 * @example
 * ```ts
 * const M = applicativeMonoid<string, string>(stringMonoid);
 * M.concat(of("Hello"), of(" World"))("input"); // success("Hello World")
 * ```
 */
export function applicativeMonoid<I, A>(m: Monoid<A>): Monoid<Decode<I, A>> {
	return deriveApplicativeMonoid(DecodeMonad)<I, A>(m);
}

/**
 * Applicative combination with fallback: both succeed ⇒ combined with `m`;
 * one fails ⇒ the other's value alone; both fail ⇒ the errors of the
 * combined attempt followed by those of each fallback attempt.
 */
export function alternativeMonoid<I, A>(m: Monoid<A>): Monoid<Decode<I, A>> {
	return deriveAlternativeMonoid(DecodeMonad)<I, A>(m);
}

/**
 * Priority list of decoders: the first success wins. `zero` is returned as
 * the identity and is not derived from any inner monoid.
 */
export function altMonoid<I, A>(zero: Lazy<Decode<I, A>>): Monoid<Decode<I, A>> {
	return deriveAltMonoid(DecodeMonad)<I, A>(zero);
}
