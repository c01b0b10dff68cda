/**
 * Library configuration for reporting and logging.
 *
 * Decoding itself is configuration-free; these settings only control how
 * failures are rendered and where they are logged.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface CodecConfig {
	/** Minimum level the reporter's logger emits */
	readonly logLevel: LogLevel;
	/** Maximum number of errors rendered by `formatErrors` before truncation */
	readonly maxReportedErrors: number;
	/** Whether rendered errors include the offending value */
	readonly verbose: boolean;
}

export const DEFAULT_CODEC_CONFIG: CodecConfig = {
	logLevel: "info",
	maxReportedErrors: 20,
	verbose: false,
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(raw: string): raw is LogLevel {
	return LOG_LEVELS.some((level) => level === raw);
}

/** Mutable builder shape for constructing Partial<CodecConfig>. */
interface MutableCodecConfig {
	logLevel?: LogLevel;
	maxReportedErrors?: number;
	verbose?: boolean;
}

/**
 * Reads config values from environment variables.
 * Supported: VALGEBRA_LOG_LEVEL, VALGEBRA_MAX_REPORTED_ERRORS, VALGEBRA_VERBOSE.
 * @throws ConfigError if a variable contains an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CodecConfig> {
	const result: MutableCodecConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["VALGEBRA_LOG_LEVEL"];
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError(
				`Invalid VALGEBRA_LOG_LEVEL: "${level}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = level;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const maxErrors = env["VALGEBRA_MAX_REPORTED_ERRORS"];
	if (maxErrors) {
		const parsed = strictParseInt(maxErrors);
		if (Number.isNaN(parsed) || parsed <= 0) {
			throw new ConfigError(
				`Invalid VALGEBRA_MAX_REPORTED_ERRORS: "${maxErrors}" must be a positive integer`,
			);
		}
		result.maxReportedErrors = parsed;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const verbose = env["VALGEBRA_VERBOSE"];
	if (verbose !== undefined) {
		if (verbose !== "true" && verbose !== "false") {
			throw new ConfigError(`Invalid VALGEBRA_VERBOSE: "${verbose}" must be "true" or "false"`);
		}
		result.verbose = verbose === "true";
	}

	return result;
}

/**
 * Defaults, then environment, then explicit overrides.
 * @throws ConfigError if the environment or an override holds an invalid value
 */
export function resolveConfig(
	overrides: Partial<CodecConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): CodecConfig {
	const config = { ...DEFAULT_CODEC_CONFIG, ...configFromEnv(env), ...overrides };
	if (!Number.isInteger(config.maxReportedErrors) || config.maxReportedErrors <= 0) {
		throw new ConfigError(
			`Invalid maxReportedErrors: ${config.maxReportedErrors} must be a positive integer`,
		);
	}
	if (!isLogLevel(config.logLevel)) {
		throw new ConfigError(
			`Invalid logLevel: "${config.logLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
		);
	}
	return config;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}
