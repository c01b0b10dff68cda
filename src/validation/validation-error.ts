/**
 * ValidationError: a single decode failure, captured where it was detected.
 */

import type { Context } from "./context.js";

export interface ValidationError {
	/** The offending input */
	readonly value: unknown;
	/** Path from the root input to `value` */
	readonly context: Context;
	readonly message: string;
	/** Lower-level error that triggered the failure, kept for diagnostics */
	readonly cause?: Error;
}

export interface ValidationErrorInit {
	readonly value?: unknown;
	readonly context?: Context;
	readonly message: string;
	readonly cause?: Error | undefined;
}

/** Creates a frozen ValidationError; missing context defaults to the root. */
export function validationError(init: ValidationErrorInit): ValidationError {
	const base = {
		value: init.value,
		context: init.context ?? [],
		message: init.message,
	};
	return Object.freeze(init.cause === undefined ? base : { ...base, cause: init.cause });
}
