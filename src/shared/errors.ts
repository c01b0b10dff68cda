/**
 * CodecError hierarchy: errors raised at the library boundary.
 *
 * Combinators never throw; failures travel inside `Validation`. These classes
 * exist for the places where a caller asks to leave that world: `toResult`,
 * `unwrap`, configuration loading.
 */

import type { Errors } from "../validation/errors.js";

/** Stable machine-readable codes carried by every CodecError. */
export const ErrorCode = {
	ValidationFailed: "VALIDATION_FAILED",
	Config: "CONFIG_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Options for constructing CodecError subclasses with optional cause chain. */
interface CodecErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for everything the library throws. */
export class CodecError extends Error {
	readonly code: ErrorCode;
	readonly context: Record<string, unknown>;

	constructor(message: string, code: ErrorCode, context: Record<string, unknown> = {}) {
		super(message);
		this.name = "CodecError";
		this.code = code;
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

function countLabel(count: number): string {
	if (count === 0) return "no errors";
	if (count === 1) return "1 error";
	return `${count} errors`;
}

/** Aggregate of every ValidationError a failed decode produced. */
export class ValidationFailedError extends CodecError {
	readonly errors: Errors;

	constructor(errors: Errors, context: Record<string, unknown> & CodecErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(`ValidationErrors: ${countLabel(errors.length)}`, ErrorCode.ValidationFailed, rest);
		this.name = "ValidationFailedError";
		this.errors = errors;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			errors: this.errors.map((e) => ({ message: e.message, value: e.value })),
		};
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends CodecError {
	constructor(message: string, context: Record<string, unknown> & CodecErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, ErrorCode.Config, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Normalization ────────────────────────────────────────────────────

/** Normalize any thrown value into an Error instance. */
export function toError(thrown: unknown): Error {
	if (thrown instanceof Error) return thrown;
	if (typeof thrown === "string") return new Error(thrown);
	return new Error(String(thrown));
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for CodecError and its subclasses. */
export function isCodecError(e: unknown): e is CodecError {
	return e instanceof CodecError;
}

/** Type guard for ValidationFailedError. */
export function isValidationFailedError(e: unknown): e is ValidationFailedError {
	return e instanceof ValidationFailedError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
