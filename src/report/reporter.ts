/**
 * Reporter: formats and logs validation outcomes according to CodecConfig.
 */

import { type Logger, createLogger } from "../lib/logger/index.js";
import type { CodecConfig } from "../shared/config.js";
import type { Errors } from "../validation/errors.js";
import type { Validation } from "../validation/validation.js";
import { formatErrors, toLogObject } from "./format.js";

export interface Reporter {
	/** Human-readable rendering of an error list. */
	format(errors: Errors): string;
	/** Failures at `warn` with every error, successes at `debug`. */
	log<A>(validation: Validation<A>, msg: string): void;
}

export function createReporter(config: CodecConfig, logger?: Logger): Reporter {
	const log = logger ?? createLogger({ level: config.logLevel });
	return {
		format(errors) {
			return formatErrors(errors, {
				maxReportedErrors: config.maxReportedErrors,
				verbose: config.verbose,
			});
		},
		log(validation, msg) {
			if (validation.ok) {
				log.debug(msg);
				return;
			}
			const errors = validation.error.slice(0, Math.max(0, config.maxReportedErrors));
			log.warn({ count: validation.error.length, errors: errors.map(toLogObject) }, msg);
		},
	};
}
