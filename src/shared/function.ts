/**
 * Function helpers used to compose pipeable operators.
 */

/** A deferred computation. Combinators decide when (and whether) to call it. */
export type Lazy<A> = () => A;

/** Returns its argument unchanged. */
export function identity<A>(a: A): A {
	return a;
}

/** Returns a thunk that always yields `a`. */
export function constant<A>(a: A): Lazy<A> {
	return () => a;
}

/**
 * Threads a value through a sequence of unary functions, left to right.
 *
 * @example
 * ```ts
 * const result = pipe(of<string, number>(41), map((n) => n + 1))("input");
 * ```
 */
export function pipe<A>(a: A): A;
export function pipe<A, B>(a: A, ab: (a: A) => B): B;
export function pipe<A, B, C>(a: A, ab: (a: A) => B, bc: (b: B) => C): C;
export function pipe<A, B, C, D>(a: A, ab: (a: A) => B, bc: (b: B) => C, cd: (c: C) => D): D;
export function pipe<A, B, C, D, E>(
	a: A,
	ab: (a: A) => B,
	bc: (b: B) => C,
	cd: (c: C) => D,
	de: (d: D) => E,
): E;
export function pipe<A, B, C, D, E, F>(
	a: A,
	ab: (a: A) => B,
	bc: (b: B) => C,
	cd: (c: C) => D,
	de: (d: D) => E,
	ef: (e: E) => F,
): F;
export function pipe<A, B, C, D, E, F, G>(
	a: A,
	ab: (a: A) => B,
	bc: (b: B) => C,
	cd: (c: C) => D,
	de: (d: D) => E,
	ef: (e: E) => F,
	fg: (f: F) => G,
): G;
export function pipe<A, B, C, D, E, F, G, H>(
	a: A,
	ab: (a: A) => B,
	bc: (b: B) => C,
	cd: (c: C) => D,
	de: (d: D) => E,
	ef: (e: E) => F,
	fg: (f: F) => G,
	gh: (g: G) => H,
): H;
export function pipe(a: unknown, ...fns: ReadonlyArray<(x: unknown) => unknown>): unknown {
	let acc = a;
	for (const fn of fns) {
		acc = fn(acc);
	}
	return acc;
}

/** Left-to-right function composition. */
export function flow<A extends readonly unknown[], B>(ab: (...a: A) => B): (...a: A) => B;
export function flow<A extends readonly unknown[], B, C>(
	ab: (...a: A) => B,
	bc: (b: B) => C,
): (...a: A) => C;
export function flow<A extends readonly unknown[], B, C, D>(
	ab: (...a: A) => B,
	bc: (b: B) => C,
	cd: (c: C) => D,
): (...a: A) => D;
export function flow<A extends readonly unknown[], B, C, D, E>(
	ab: (...a: A) => B,
	bc: (b: B) => C,
	cd: (c: C) => D,
	de: (d: D) => E,
): (...a: A) => E;
export function flow(
	first: (...a: readonly unknown[]) => unknown,
	...rest: ReadonlyArray<(x: unknown) => unknown>
): (...a: readonly unknown[]) => unknown {
	return (...args) => {
		let acc = first(...args);
		for (const fn of rest) {
			acc = fn(acc);
		}
		return acc;
	};
}
