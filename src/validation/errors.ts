/**
 * Errors: the ordered, duplicate-preserving list that failures accumulate into.
 */

import { type Monoid, makeMonoid } from "../monoid/monoid.js";
import type { ValidationError } from "./validation-error.js";

export type Errors = readonly ValidationError[];

/** Left entries first, then right. No deduplication. */
export function concatErrors(left: Errors, right: Errors): Errors {
	if (right.length === 0) return left;
	if (left.length === 0) return right;
	return [...left, ...right];
}

export const ErrorsMonoid: Monoid<Errors> = makeMonoid(concatErrors, () => []);
