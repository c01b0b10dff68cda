export {
	type FormatOptions,
	type FormatErrorsOptions,
	formatValidationError,
	formatErrors,
	toLogObject,
} from "./format.js";

export { type Reporter, createReporter } from "./reporter.js";
