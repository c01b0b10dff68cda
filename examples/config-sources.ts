/**
 * Config Sources: sequential decoding with fallbacks.
 *
 * A port is read from an explicit setting, then from a legacy setting, then
 * defaulted. `bind` stages depend on earlier fields; `alt` chains the sources.
 *
 * Run: npx tsx examples/config-sources.ts
 */

import {
	D,
	type Decode,
	Monoid,
	failureWithMessage,
	isErr,
	pipe,
	success,
	toResult,
	unwrapOr,
} from "../src/index.js";

type Env = Readonly<Record<string, string | undefined>>;

interface ServerConfig {
	readonly host: string;
	readonly port: number;
	readonly url: string;
}

function required(key: string): Decode<Env, string> {
	return (env) => {
		const value = env[key];
		return value === undefined || value === ""
			? failureWithMessage(value, `${key} is not set`, [{ key, type: "string" }])
			: success(value);
	};
}

function portFrom(key: string): Decode<Env, number> {
	return pipe(
		required(key),
		D.chain((raw: string): Decode<Env, number> => () => {
			const port = Number.parseInt(raw, 10);
			return Number.isInteger(port) && port > 0 && port < 65_536
				? success(port)
				: failureWithMessage(raw, "not a valid port", [{ key, type: "Port" }]);
		}),
	);
}

const firstPort = Monoid.concatAll(D.altMonoid<Env, number>(() => D.left<Env, number>([])));

const decodePort = pipe(
	firstPort([portFrom("PORT"), portFrom("HTTP_PORT")]),
	D.alt(() => D.of<Env, number>(8080)),
);

const decodeConfig: Decode<Env, ServerConfig> = pipe(
	D.Do<Env, ServerConfig>({ host: "", port: 0, url: "" }),
	D.bind(
		(s: ServerConfig, host: string) => ({ ...s, host }),
		() => required("HOST"),
	),
	D.bind(
		(s: ServerConfig, port: number) => ({ ...s, port }),
		() => decodePort,
	),
	D.let(
		(s: ServerConfig, url: string) => ({ ...s, url }),
		(s) => `http://${s.host}:${s.port}`,
	),
);

const environments: Env[] = [
	{ HOST: "localhost", PORT: "3000" },
	{ HOST: "localhost", PORT: "abc", HTTP_PORT: "8081" },
	{ HOST: "localhost" },
	{},
];

const fallback: ServerConfig = { host: "127.0.0.1", port: 8080, url: "http://127.0.0.1:8080" };

for (const env of environments) {
	const result = decodeConfig(env);
	if (isErr(result)) {
		console.log(`Invalid: ${result.error.map((e) => e.message).join("; ")}`);
	}
	console.log(unwrapOr(toResult(result), fallback).url);
}
