export {
	type Result,
	type Ok,
	type Err,
	ok,
	err,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCode,
	CodecError,
	ValidationFailedError,
	ConfigError,
	toError,
	isCodecError,
	isValidationFailedError,
	isConfigError,
} from "./errors.js";

export { type Lazy, identity, constant, pipe, flow } from "./function.js";

export {
	type CodecConfig,
	DEFAULT_CODEC_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
