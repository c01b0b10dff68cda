/**
 * Context: the path from the root input to the value being validated.
 *
 * Append-only: every push returns a new array, so a context captured by an
 * error never changes afterwards.
 */

/** One step of the path: a field/index key and the type expected there. */
export interface ContextEntry {
	readonly key: string;
	readonly type: string;
	readonly actual?: unknown;
}

export type Context = readonly ContextEntry[];

export const emptyContext: Context = [];

/** Returns a new context with `entry` appended. */
export function appendContext(context: Context, entry: ContextEntry): Context {
	return [...context, entry];
}

/**
 * Renders a context as a dotted path, e.g. `user.address.zipCode`.
 * Entries without a key contribute their type name instead; entries with
 * neither a key nor a type are skipped.
 */
export function formatPath(context: Context): string {
	return context
		.map((entry) => (entry.key !== "" ? entry.key : entry.type))
		.filter((segment) => segment !== "")
		.join(".");
}
