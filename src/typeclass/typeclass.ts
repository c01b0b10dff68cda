/**
 * Functor / Apply / Applicative / Chain / Monad / Alt.
 *
 * All operations are data-first; the pipeable operators each container
 * exports are thin wrappers over these.
 */

import type { Lazy } from "../shared/function.js";
import type { Kind, URIS } from "./hkt.js";

export interface Functor<F extends URIS> {
	readonly URI: F;
	readonly map: <I, A, B>(fa: Kind<F, I, A>, f: (a: A) => B) => Kind<F, I, B>;
}

/** Evaluates both operands; failures of both are combined. */
export interface Apply<F extends URIS> extends Functor<F> {
	readonly ap: <I, A, B>(fab: Kind<F, I, (a: A) => B>, fa: Kind<F, I, A>) => Kind<F, I, B>;
}

export interface Applicative<F extends URIS> extends Apply<F> {
	readonly of: <I, A>(a: A) => Kind<F, I, A>;
}

export interface Chain<F extends URIS> extends Apply<F> {
	readonly chain: <I, A, B>(fa: Kind<F, I, A>, f: (a: A) => Kind<F, I, B>) => Kind<F, I, B>;
}

export interface Monad<F extends URIS> extends Applicative<F>, Chain<F> {}

/** Fallback: `second` is evaluated only when `first` fails. */
export interface Alt<F extends URIS> extends Functor<F> {
	readonly alt: <I, A>(first: Kind<F, I, A>, second: Lazy<Kind<F, I, A>>) => Kind<F, I, A>;
}

export interface Alternative<F extends URIS> extends Applicative<F>, Alt<F> {}
