/**
 * Semigroup / Monoid: the algebra every accumulation in the library rests on.
 *
 * `empty` is a thunk rather than a value: decoder monoids build their identity
 * on demand, and `altMonoid` takes a lazily supplied zero.
 */

/** An associative binary operation. */
export interface Semigroup<A> {
	readonly concat: (x: A, y: A) => A;
}

/** A semigroup with a two-sided identity element. */
export interface Monoid<A> extends Semigroup<A> {
	readonly empty: () => A;
}

export function makeMonoid<A>(concat: (x: A, y: A) => A, empty: () => A): Monoid<A> {
	return { concat, empty };
}

/** Folds a list left to right, starting from `m.empty()`. */
export function concatAll<A>(m: Monoid<A>): (as: readonly A[]) => A {
	return (as) => as.reduce((acc, a) => m.concat(acc, a), m.empty());
}

/** The same monoid with its arguments flipped. */
export function reverse<A>(m: Monoid<A>): Monoid<A> {
	return makeMonoid((x, y) => m.concat(y, x), m.empty);
}

// ── Instances ────────────────────────────────────────────────────────

export const stringMonoid: Monoid<string> = makeMonoid(
	(x, y) => x + y,
	() => "",
);

export const sumMonoid: Monoid<number> = makeMonoid(
	(x, y) => x + y,
	() => 0,
);

export const productMonoid: Monoid<number> = makeMonoid(
	(x, y) => x * y,
	() => 1,
);

/** Boolean conjunction. */
export const allMonoid: Monoid<boolean> = makeMonoid(
	(x, y) => x && y,
	() => true,
);

/** Boolean disjunction. */
export const anyMonoid: Monoid<boolean> = makeMonoid(
	(x, y) => x || y,
	() => false,
);

/** Concatenation of read-only arrays; preserves left-then-right order. */
export function arrayMonoid<A>(): Monoid<readonly A[]> {
	return makeMonoid<readonly A[]>(
		(x, y) => (x.length === 0 ? y : y.length === 0 ? x : [...x, ...y]),
		() => [],
	);
}

