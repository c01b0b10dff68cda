export {
	type ContextEntry,
	type Context,
	emptyContext,
	appendContext,
	formatPath,
} from "./context.js";

export { type ValidationError, type ValidationErrorInit, validationError } from "./validation-error.js";

export { type Errors, ErrorsMonoid, concatErrors } from "./errors.js";

export {
	type Validation,
	type Success,
	type Failure,
	success,
	failures,
	failureWithMessage,
	failureWithError,
	isSuccess,
	isFailure,
	fold,
	getOrElse,
	getErrors,
	toResult,
} from "./validation.js";

export {
	of,
	map,
	chain,
	chainLeft,
	orElse,
	ap,
	alt,
	mapLeft,
	ValidationMonad,
	applicativeMonoid,
	alternativeMonoid,
} from "./monad.js";
