/**
 * Do-notation: build a struct field by field.
 *
 * `bind` stages are sequential and stop at the first failure. `apS` stages are
 * independent of earlier results and their failures accumulate.
 */

import type { Lens } from "../lens/lens.js";
import { ap, chain, map, of } from "./monad.js";
import type { Decode, Operator } from "./types.js";

/** Writes `value` into `state`, producing the next state. */
export type Setter<S1, T, S2> = (state: S1, value: T) => S2;

/** Starts a pipeline from an initial struct; always succeeds. */
export function Do<I, S>(empty: S): Decode<I, S> {
	return of(empty);
}

/**
 * Sequential stage: `f` may read every field bound so far.
 *
 * @example
 * ```ts
 * pipe(
 *   Do<Input, Order>({ id: 0, owner: "" }),
 *   bind((s: Order, id: number) => ({ ...s, id }), () => decodeId),
 *   bind((s: Order, owner: string) => ({ ...s, owner }), (s) => lookupOwner(s.id)),
 * );
 * ```
 */
export function bind<I, S1, S2, T>(
	setter: Setter<S1, T, S2>,
	f: (state: S1) => Decode<I, T>,
): Operator<I, S1, S2> {
	return chain<I, S1, S2>((state) => map((value: T) => setter(state, value))(f(state)));
}

/** Starts a struct from a single decoded value. */
export function bindTo<S, T>(setter: (value: T) => S): <I>(fa: Decode<I, T>) => Decode<I, S> {
	return map(setter);
}

/** Pure stage computed from the current state; never fails. Exported as `let`. */
function let_<S1, S2, T>(
	setter: Setter<S1, T, S2>,
	f: (state: S1) => T,
): <I>(fs: Decode<I, S1>) => Decode<I, S2> {
	return map((state: S1) => setter(state, f(state)));
}

export { let_ as let };

/** Pure stage with a constant value. */
export function letTo<S1, S2, T>(
	setter: Setter<S1, T, S2>,
	value: T,
): <I>(fs: Decode<I, S1>) => Decode<I, S2> {
	return map((state: S1) => setter(state, value));
}

/**
 * Independent stage: `fa` runs regardless of earlier stages, and its errors
 * are appended to any failure accumulated so far.
 */
export function apS<I, S1, S2, T>(setter: Setter<S1, T, S2>, fa: Decode<I, T>): Operator<I, S1, S2> {
	return (fs) => ap(fa)(map((state: S1) => (value: T) => setter(state, value))(fs));
}

// ── Lens variants ────────────────────────────────────────────────────

function setWith<S, T>(lens: Lens<S, T>): Setter<S, T, S> {
	return (state, value) => lens.set(value)(state);
}

/** {@link apS} writing through a lens. */
export function apSL<I, S, T>(lens: Lens<S, T>, fa: Decode<I, T>): Operator<I, S, S> {
	return apS<I, S, S, T>(setWith(lens), fa);
}

/** {@link bind} on the field a lens focuses, reading its current value. */
export function bindL<I, S, T>(lens: Lens<S, T>, f: (current: T) => Decode<I, T>): Operator<I, S, S> {
	return bind<I, S, S, T>(setWith(lens), (state) => f(lens.get(state)));
}

/** {@link let} on the field a lens focuses. */
export function letL<S, T>(
	lens: Lens<S, T>,
	f: (current: T) => T,
): <I>(fs: Decode<I, S>) => Decode<I, S> {
	return let_<S, S, T>(setWith(lens), (state) => f(lens.get(state)));
}

/** {@link letTo} on the field a lens focuses. */
export function letToL<S, T>(lens: Lens<S, T>, value: T): <I>(fs: Decode<I, S>) => Decode<I, S> {
	return letTo<S, S, T>(setWith(lens), value);
}
