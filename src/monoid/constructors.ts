/**
 * Monoids over containers, derived from their type-class instances.
 *
 * Written once against Applicative/Alt; each container (Validation, Decode,
 * Validate) specializes them by passing its own instance.
 */

import type { Lazy } from "../shared/function.js";
import type { Kind, URIS } from "../typeclass/hkt.js";
import type { Alt, Alternative, Applicative } from "../typeclass/typeclass.js";
import { type Monoid, makeMonoid } from "./monoid.js";

/**
 * Runs both operands and combines their values with `m`; failures aggregate
 * the way the container's `ap` aggregates them.
 */
export function applicativeMonoid<F extends URIS>(
	F: Applicative<F>,
): <I, A>(m: Monoid<A>) => Monoid<Kind<F, I, A>> {
	return <I, A>(m: Monoid<A>) =>
		makeMonoid<Kind<F, I, A>>(
			(x, y) =>
				F.ap<I, A, A>(
					F.map<I, A, (b: A) => A>(x, (a) => (b) => m.concat(a, b)),
					y,
				),
			() => F.of<I, A>(m.empty()),
		);
}

/**
 * Applicative combination first; if that fails as a whole, the first operand
 * alone, then the second alone. Errors of every attempted path accumulate.
 */
export function alternativeMonoid<F extends URIS>(
	F: Alternative<F>,
): <I, A>(m: Monoid<A>) => Monoid<Kind<F, I, A>> {
	return <I, A>(m: Monoid<A>) => {
		const applicative = applicativeMonoid(F)<I, A>(m);
		return makeMonoid<Kind<F, I, A>>(
			(x, y) => F.alt<I, A>(applicative.concat(x, y), () => F.alt<I, A>(x, () => y)),
			applicative.empty,
		);
	};
}

/**
 * First success wins; `zero` is the identity. No values are combined.
 */
export function altMonoid<F extends URIS>(
	F: Alt<F>,
): <I, A>(zero: Lazy<Kind<F, I, A>>) => Monoid<Kind<F, I, A>> {
	return <I, A>(zero: Lazy<Kind<F, I, A>>) =>
		makeMonoid<Kind<F, I, A>>((x, y) => F.alt<I, A>(x, () => y), zero);
}
