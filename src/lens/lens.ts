/**
 * Lens: a `{ get, set }` pair focusing one field of a structure.
 *
 * Only the capability consumed by the lens-based do-notation stages; `set`
 * never mutates its argument.
 */

export interface Lens<S, A> {
	readonly get: (s: S) => A;
	readonly set: (a: A) => (s: S) => S;
}

export function lens<S, A>(get: (s: S) => A, set: (a: A) => (s: S) => S): Lens<S, A> {
	return { get, set };
}

/**
 * Lens on a property of a record type.
 *
 * @example
 * ```ts
 * const name = prop<User>()("name");
 * name.set("Ada")(user);
 * ```
 */
export function prop<S>(): <K extends keyof S>(key: K) => Lens<S, S[K]> {
	return (key) =>
		lens(
			(s) => s[key],
			(a) => (s) => ({ ...s, [key]: a }),
		);
}

/** Focuses `ab` inside the part `sa` focuses. */
export function compose<A, B>(ab: Lens<A, B>): <S>(sa: Lens<S, A>) => Lens<S, B> {
	return (sa) =>
		lens(
			(s) => ab.get(sa.get(s)),
			(b) => (s) => sa.set(ab.set(b)(sa.get(s)))(s),
		);
}
