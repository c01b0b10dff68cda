/**
 * Type<A, O, I>: a named codec: a refinement, a context-aware validator and
 * an encoder.
 */

import type { Decode } from "../decode/types.js";
import { type Monoid, makeMonoid } from "../monoid/monoid.js";
import type { Lazy } from "../shared/function.js";
import * as VD from "../validate/validate.js";
import type { Validate } from "../validate/types.js";
import { appendContext } from "../validation/context.js";
import { failureWithMessage, success } from "../validation/validation.js";

export interface Type<A, O = A, I = unknown> {
	readonly name: string;
	readonly is: (u: unknown) => u is A;
	readonly validate: Validate<I, A>;
	readonly encode: (a: A) => O;
}

export function makeType<A, O, I>(
	name: string,
	is: (u: unknown) => u is A,
	validate: Validate<I, A>,
	encode: (a: A) => O,
): Type<A, O, I> {
	return { name, is, validate, encode };
}

/** Entry point: validates from the root, whose context entry names the type. */
export function decode<A, O, I>(type: Type<A, O, I>): Decode<I, A> {
	return (input) => type.validate(input, [{ key: "", type: type.name, actual: input }]);
}

export function encode<A, O, I>(type: Type<A, O, I>): (a: A) => O {
	return (a) => type.encode(a);
}

/**
 * Validates the `key` property of an object input with `type`. The property
 * is pushed onto the context before `type` sees it; a missing property is
 * validated as `undefined`.
 */
export function property<A, O>(
	key: string,
	type: Type<A, O, unknown>,
): Validate<Readonly<Record<string, unknown>>, A> {
	return (input, context) => {
		const actual = Object.hasOwn(input, key) ? input[key] : undefined;
		return type.validate(actual, appendContext(context, { key, type: type.name, actual }));
	};
}

function isRecord(u: unknown): u is Readonly<Record<string, unknown>> {
	return typeof u === "object" && u !== null && !Array.isArray(u);
}

/** Accepts any non-null, non-array object. */
export const unknownRecord: Type<Readonly<Record<string, unknown>>> = makeType(
	"UnknownRecord",
	isRecord,
	(input: unknown, context) =>
		isRecord(input) ? success(input) : failureWithMessage(input, "expected an object", context),
	(a) => a,
);

// ── Alternatives ─────────────────────────────────────────────────────

/**
 * Tries `first`, then `second()`. Values are encoded with `first.encode`, so
 * both types must share an output representation.
 */
export function alt<A, O, I>(second: Lazy<Type<A, O, I>>): (first: Type<A, O, I>) => Type<A, O, I> {
	return (first) =>
		makeType(
			`Alt[${first.name}]`,
			(u: unknown): u is A => first.is(u) || second().is(u),
			VD.alt<I, A>(() => second().validate)(first.validate),
			first.encode,
		);
}

/** First successful type wins; `zero` is the identity. */
export function altMonoid<A, O, I>(zero: Lazy<Type<A, O, I>>): Monoid<Type<A, O, I>> {
	return makeMonoid((first, second) => alt(() => second)(first), zero);
}
