export type { Decode, Kleisli, Operator } from "./types.js";

export {
	of,
	left,
	fromValidation,
	fromThrowable,
	map,
	chain,
	chainLeft,
	orElse,
	ap,
	alt,
	mapLeft,
	DecodeMonad,
} from "./monad.js";

export { applicativeMonoid, alternativeMonoid, altMonoid } from "./monoid.js";

export {
	type Setter,
	Do,
	bind,
	bindTo,
	let,
	letTo,
	apS,
	apSL,
	bindL,
	letL,
	letToL,
} from "./bind.js";

export { sequenceArray, traverseArray } from "./array.js";
