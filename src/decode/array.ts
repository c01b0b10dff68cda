/**
 * Traversals over arrays of decoders. Applicative throughout: every element
 * is decoded and the errors of all failing elements are reported, in order.
 */

import { ap, map, of } from "./monad.js";
import type { Decode } from "./types.js";

function append<A>(as: readonly A[]): (a: A) => readonly A[] {
	return (a) => [...as, a];
}

/** Runs every decoder against the same input and collects the values. */
export function sequenceArray<I, A>(decoders: readonly Decode<I, A>[]): Decode<I, readonly A[]> {
	return decoders.reduce<Decode<I, readonly A[]>>(
		(acc, decoder) => ap(decoder)(map((as: readonly A[]) => append(as))(acc)),
		of<I, readonly A[]>([]),
	);
}

/**
 * Maps each element to a decoder and sequences the results.
 *
 * @example
 * ```ts
 * const decodeAll = traverseArray((key: string) => field(key));
 * decodeAll(["host", "port"])(config);
 * ```
 */
export function traverseArray<I, A, B>(
	f: (a: A, index: number) => Decode<I, B>,
): (as: readonly A[]) => Decode<I, readonly B[]> {
	return (as) => sequenceArray(as.map(f));
}
