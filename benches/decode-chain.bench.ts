import { bench, describe } from "vitest";
import { sequenceArray } from "../src/decode/array.js";
import { alt, chain, left, map, of } from "../src/decode/monad.js";
import { altMonoid } from "../src/decode/monoid.js";
import type { Decode } from "../src/decode/types.js";
import { concatAll } from "../src/monoid/monoid.js";
import { pipe } from "../src/shared/function.js";
import { validationError } from "../src/validation/validation-error.js";
import { failures, success } from "../src/validation/validation.js";

const positive: Decode<number, number> = (n) =>
	n > 0 ? success(n) : failures([validationError({ value: n, message: "must be positive" })]);

describe("decode combinators", () => {
	const pipeline = pipe(
		positive,
		map((n: number) => n * 2),
		chain((n: number) => of<number, number>(n + 1)),
		alt(() => of<number, number>(0)),
	);

	bench("map/chain/alt pipeline 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			pipeline(i - 500);
		}
	});

	const hundred = Array.from({ length: 100 }, () => positive);

	bench("sequenceArray of 100 succeeding decoders", () => {
		sequenceArray(hundred)(1);
	});

	bench("sequenceArray of 100 failing decoders", () => {
		sequenceArray(hundred)(-1);
	});

	const fallbacks = concatAll(altMonoid<number, number>(() => left<number, number>([])))(hundred);

	bench("altMonoid fold of 100 failing alternatives", () => {
		fallbacks(-1);
	});
});
