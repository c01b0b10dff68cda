/**
 * Signup Form: independent fields with accumulated errors.
 *
 * Each field is decoded with a Zod-backed codec; `apSL` stages run regardless
 * of earlier failures, so one pass reports everything wrong with the form.
 *
 * Run: npx tsx examples/signup-form.ts
 */

import {
	C,
	type Context,
	D,
	type Decode,
	VD,
	createReporter,
	fromZod,
	pipe,
	prop,
	property,
	resolveConfig,
	type Type,
	unknownRecord,
	z,
} from "../src/index.js";

type Form = Readonly<Record<string, unknown>>;

interface Signup {
	readonly username: string;
	readonly contact: string;
	readonly age: number;
}

const Username = fromZod("Username", z.string().min(3, "at least 3 characters"));
const Email = fromZod("Email", z.string().email("invalid email"));
const Phone = fromZod("Phone", z.string().regex(/^\+?\d{7,15}$/, "invalid phone"));
const Age = fromZod("Age", z.number().int().min(18, "must be an adult"));

const root: Context = [{ key: "", type: "Signup" }];

function field<A>(key: string, type: Type<A>): Decode<Form, A> {
	return VD.toDecode(property(key, type), root);
}

const decodeSignup: Decode<unknown, Signup> = pipe(
	VD.toDecode(unknownRecord.validate, root),
	D.chain((form: Form) => () =>
		pipe(
			D.Do<Form, Signup>({ username: "", contact: "", age: 0 }),
			D.apSL(prop<Signup>()("username"), field("username", Username)),
			D.apSL(prop<Signup>()("contact"), field("contact", C.alt(() => Phone)(Email))),
			D.apSL(prop<Signup>()("age"), field("age", Age)),
		)(form),
	),
);

const reporter = createReporter(resolveConfig({ verbose: true }));

const submissions: unknown[] = [
	{ username: "ada", contact: "ada@example.com", age: 36 },
	{ username: "al", contact: "not-a-contact", age: 15 },
	"username=ada",
];

for (const submission of submissions) {
	const result = decodeSignup(submission);
	if (result.ok) {
		console.log(`Accepted: ${JSON.stringify(result.value)}`);
	} else {
		console.log(reporter.format(result.error));
	}
	reporter.log(result, "signup processed");
}
