import type { Context } from "../validation/context.js";
import type { Validation } from "../validation/validation.js";

/**
 * A decoder that also receives the context it runs in. The input and the
 * context travel together as a plain argument pair.
 */
export type Validate<I, A> = (input: I, context: Context) => Validation<A>;

export type Kleisli<I, A, B> = (a: A) => Validate<I, B>;

export type Operator<I, A, B> = (fa: Validate<I, A>) => Validate<I, B>;
