/**
 * Higher-kinded type emulation.
 *
 * Each container the library defines registers itself in `URItoKind` under a
 * string tag. Type classes are then written once over `F extends URIS` and
 * implemented by one instance object per container.
 */

import type { Decode } from "../decode/types.js";
import type { Validate } from "../validate/types.js";
import type { Validation } from "../validation/validation.js";

/** `I` is the input type; containers without one ignore it. */
export interface URItoKind<I, A> {
	readonly Validation: Validation<A>;
	readonly Decode: Decode<I, A>;
	readonly Validate: Validate<I, A>;
}

export type URIS = keyof URItoKind<unknown, unknown>;

export type Kind<F extends URIS, I, A> = URItoKind<I, A>[F];
