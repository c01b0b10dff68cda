/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Error instances nested in log objects (validation causes, mostly) are
 * flattened to `{ name, message }` so they survive JSON serialization, and
 * configurable paths can be censored, e.g. `errors[*].value` when the decoded
 * input may hold secrets.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Error serializer ────────────────────────────────────────────────

function isPlainObject(value: object): boolean {
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

// Only arrays and plain objects are rebuilt; dates, maps and class instances
// are left for pino's JSON serialization.
function serializeValue(value: unknown, depth: number): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	if (depth <= 0 || value === null || typeof value !== "object") return value;
	if (Array.isArray(value)) {
		return value.map((item: unknown) => serializeValue(item, depth - 1));
	}
	if (!isPlainObject(value)) return value;
	const result: Record<string, unknown> = {};
	for (const [key, entry] of Object.entries(value)) {
		result[key] = serializeValue(entry, depth - 1);
	}
	return result;
}

function serializeErrors(obj: object): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = serializeValue(value, 3);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type LevelName = "info" | "warn" | "error" | "debug";

function emit(pinoLogger: pino.Logger, level: LevelName, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[level](String(msgOrObj ?? ""));
		return;
	}
	if (typeof msgOrObj === "object" && !Array.isArray(msgOrObj)) {
		pinoLogger[level](serializeErrors(msgOrObj), msg ?? "");
		return;
	}
	pinoLogger[level]({ value: msgOrObj }, msg ?? "");
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", redactPaths: ["errors[*].value"] });
 * logger.warn({ count: 2 }, "decode failed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}
