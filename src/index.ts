// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	type Lazy,
	identity,
	constant,
	pipe,
	flow,
	ErrorCode,
	CodecError,
	ValidationFailedError,
	ConfigError,
	toError,
	isCodecError,
	isValidationFailedError,
	isConfigError,
	type CodecConfig,
	DEFAULT_CODEC_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Algebra ──────────────────────────────────────────────────────────
export * as Monoid from "./monoid/index.js";
export type {
	Kind,
	URIS,
	URItoKind,
	Functor,
	Apply,
	Applicative,
	Chain,
	Monad,
	Alt,
	Alternative,
} from "./typeclass/index.js";

// ── Validation ───────────────────────────────────────────────────────
export {
	type ContextEntry,
	type Context,
	appendContext,
	formatPath,
	type ValidationError,
	validationError,
	type Errors,
	ErrorsMonoid,
	type Validation,
	success,
	failures,
	failureWithMessage,
	failureWithError,
	isSuccess,
	isFailure,
	getErrors,
	toResult,
} from "./validation/index.js";
export * as V from "./validation/index.js";

// ── Decoders ─────────────────────────────────────────────────────────
export type { Decode } from "./decode/index.js";
export * as D from "./decode/index.js";
export type { Validate } from "./validate/index.js";
export * as VD from "./validate/index.js";

// ── Codecs & Optics ──────────────────────────────────────────────────
export { type Type, makeType, decode, encode, property, unknownRecord } from "./codec/index.js";
export * as C from "./codec/index.js";
export { type Lens, lens, prop, compose } from "./lens/index.js";
export { z, fromZod, fromZodSchema } from "./lib/validation/index.js";

// ── Reporting ────────────────────────────────────────────────────────
export {
	formatValidationError,
	formatErrors,
	toLogObject,
	type Reporter,
	createReporter,
} from "./report/index.js";
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
