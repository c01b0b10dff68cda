export type { Validate, Kleisli, Operator } from "./types.js";

export {
	of,
	left,
	failure,
	fromPredicate,
	fromDecode,
	toDecode,
	withContext,
	map,
	chain,
	chainLeft,
	orElse,
	ap,
	alt,
	ValidateMonad,
	applicativeMonoid,
	alternativeMonoid,
	altMonoid,
} from "./validate.js";
