/**
 * Rendering of validation errors for people and for log pipelines.
 */

import { inspect } from "node:util";
import { formatPath } from "../validation/context.js";
import type { Errors } from "../validation/errors.js";
import type { ValidationError } from "../validation/validation-error.js";

export interface FormatOptions {
	/** Append the offending value on its own line */
	readonly verbose?: boolean;
}

export interface FormatErrorsOptions extends FormatOptions {
	/** Render at most this many errors; the rest are summarized */
	readonly maxReportedErrors?: number;
}

/**
 * `"<path>: <message>"`, or just the message at the root.
 *
 * @example
 * ```ts
 * formatValidationError(error); // "user.address.zipCode: expected 5 digits"
 * ```
 */
export function formatValidationError(error: ValidationError, options: FormatOptions = {}): string {
	const path = formatPath(error.context);
	let result = path === "" ? error.message : `${path}: ${error.message}`;
	if (error.cause !== undefined) {
		result += ` (caused by: ${error.cause.message})`;
	}
	if (options.verbose === true) {
		const value = inspect(error.value, { depth: 2, breakLength: Number.POSITIVE_INFINITY });
		result += `\n  value: ${value}`;
	}
	return result;
}

export function formatErrors(errors: Errors, options: FormatErrorsOptions = {}): string {
	if (errors.length === 0) return "ValidationErrors: no errors";

	const limit = Math.max(0, options.maxReportedErrors ?? errors.length);
	const lines = [`ValidationErrors (${errors.length}):`];
	for (const [index, error] of errors.slice(0, limit).entries()) {
		lines.push(`  [${index}] ${formatValidationError(error, options)}`);
	}
	if (errors.length > limit) {
		lines.push(`  ... and ${errors.length - limit} more`);
	}
	return lines.join("\n");
}

/** Plain object for structured logs. */
export function toLogObject(error: ValidationError): Record<string, unknown> {
	const path = formatPath(error.context);
	return {
		message: error.message,
		value: error.value,
		...(path !== "" && { path }),
		...(error.cause !== undefined && { cause: error.cause }),
	};
}
