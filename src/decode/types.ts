/**
 * Decode<I, A>: a pure function from raw input to a Validation.
 */

import type { Validation } from "../validation/validation.js";

export type Decode<I, A> = (input: I) => Validation<A>;

/** Sequential composition unit: a value to the next decoder. */
export type Kleisli<I, A, B> = (a: A) => Decode<I, B>;

/** A pipeable transformation of decoders. */
export type Operator<I, A, B> = (fa: Decode<I, A>) => Decode<I, B>;
