/**
 * Zod bridge: turns a Zod schema into a codec `Type` whose failures are
 * ValidationErrors, one per Zod issue, with the issue path appended to the
 * context.
 *
 * Re-exports `z` so schemas can be built without a direct zod dependency.
 */

import { z } from "zod";
import { type Type, makeType } from "../../codec/type.js";
import type { Validate } from "../../validate/types.js";
import { type Context, appendContext } from "../../validation/context.js";
import type { Errors } from "../../validation/errors.js";
import { validationError } from "../../validation/validation-error.js";
import { failures, success } from "../../validation/validation.js";

export { z };

function valueAt(root: unknown, path: readonly (string | number)[]): unknown {
	let current: unknown = root;
	for (const segment of path) {
		if (typeof current !== "object" || current === null) return undefined;
		current = Reflect.get(current, segment);
	}
	return current;
}

function issueContext(context: Context, root: unknown, path: readonly (string | number)[]): Context {
	let result = context;
	for (const [index, segment] of path.entries()) {
		result = appendContext(result, {
			key: String(segment),
			type: typeof segment === "number" ? "element" : "field",
			actual: valueAt(root, path.slice(0, index + 1)),
		});
	}
	return result;
}

/** Validates with `schema.safeParse`, mapping every issue to a ValidationError. */
export function fromZodSchema<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Validate<unknown, T> {
	return (input, context) => {
		const result = schema.safeParse(input);
		if (result.success) {
			return success(result.data);
		}
		const errors: Errors = result.error.issues.map((issue) => {
			const path = issue.path.filter((p): p is string | number => typeof p !== "symbol");
			return validationError({
				value: valueAt(input, path),
				context: issueContext(context, input, path),
				message: issue.message,
			});
		});
		return failures(errors);
	};
}

/**
 * A codec backed by a Zod schema; encoding is the identity.
 *
 * The guard runs the schema, so it is only sound when the schema's input and
 * output types agree. Schemas that transform or default their input must pass
 * an `is` that checks the output type.
 *
 * @example
 * ```ts
 * const Port = fromZod("Port", z.number().int().min(1).max(65535));
 * decode(Port)(8080); // success(8080)
 *
 * const Count = fromZod("Count", z.string().transform(Number), isNumber);
 * ```
 */
export function fromZod<T>(
	name: string,
	schema: z.ZodType<T, z.ZodTypeDef, T>,
): Type<T, T, unknown>;
export function fromZod<T>(
	name: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	is: (u: unknown) => u is T,
): Type<T, T, unknown>;
export function fromZod<T>(
	name: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	is: (u: unknown) => u is T = (u: unknown): u is T => schema.safeParse(u).success,
): Type<T, T, unknown> {
	return makeType(name, is, fromZodSchema(schema), (a: T) => a);
}
