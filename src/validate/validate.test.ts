import { describe, expect, it } from "vitest";
import { stringMonoid, sumMonoid } from "../monoid/monoid.js";
import { pipe } from "../shared/function.js";
import type { Context } from "../validation/context.js";
import { validationError } from "../validation/validation-error.js";
import { failureWithMessage, failures, success } from "../validation/validation.js";
import type { Validate } from "./types.js";
import {
	ValidateMonad,
	alt,
	altMonoid,
	alternativeMonoid,
	ap,
	applicativeMonoid,
	chain,
	chainLeft,
	failure,
	fromDecode,
	fromPredicate,
	left,
	map,
	of,
	orElse,
	toDecode,
	withContext,
} from "./validate.js";

const root: Context = [{ key: "", type: "User", actual: {} }];

const isString = fromPredicate(
	(u: unknown): u is string => typeof u === "string",
	"expected a string",
);
const positive = fromPredicate((n: number) => n > 0, "must be positive");

describe("Validate combinators", () => {
	describe("constructors", () => {
		it("of ignores input and context", () => {
			expect(of<string, number>(1)("x", root)).toEqual(success(1));
		});

		it("left fails with the given errors", () => {
			const errors = [validationError({ message: "nope" })];
			expect(left<string, number>(errors)("x", root)).toEqual(failures(errors));
		});

		it("failure records the input at the current context", () => {
			expect(failure<string, number>("rejected")("x", root)).toEqual(
				failureWithMessage("x", "rejected", root),
			);
		});

		it("fromPredicate narrows with a refinement", () => {
			expect(isString("hello", [])).toEqual(success("hello"));
			expect(isString(5, root)).toEqual(failureWithMessage(5, "expected a string", root));
		});

		it("fromPredicate passes the input through when a boolean check holds", () => {
			expect(positive(3, [])).toEqual(success(3));
			expect(positive(-3, [])).toEqual(failureWithMessage(-3, "must be positive"));
		});
	});

	describe("withContext", () => {
		it("appends a path entry recording the input", () => {
			const age = withContext("age", "number")(positive);
			expect(age(-1, root)).toEqual(
				failures([
					validationError({
						value: -1,
						message: "must be positive",
						context: [...root, { key: "age", type: "number", actual: -1 }],
					}),
				]),
			);
		});

		it("does not alter the caller's context", () => {
			const context: Context = [{ key: "", type: "Root" }];
			withContext("field", "string")(isString)(1, context);
			expect(context).toEqual([{ key: "", type: "Root" }]);
		});
	});

	describe("conversion", () => {
		it("toDecode fixes the context", () => {
			const decoder = toDecode(positive, root);
			expect(decoder(-2)).toEqual(failureWithMessage(-2, "must be positive", root));
		});

		it("toDecode defaults to the empty context", () => {
			expect(toDecode(positive)(-2)).toEqual(failureWithMessage(-2, "must be positive"));
		});

		it("fromDecode ignores the context", () => {
			const validate = fromDecode((n: number) =>
				n > 10 ? success(n) : failureWithMessage(n, "too small"),
			);
			expect(validate(5, root)).toEqual(failureWithMessage(5, "too small"));
		});
	});

	describe("operators", () => {
		it("map transforms a success", () => {
			expect(pipe(positive, map((n: number) => String(n)))(7, [])).toEqual(success("7"));
		});

		it("chain hands the same input and context to the next validator", () => {
			const seen: Array<[number, Context]> = [];
			const spy: Validate<number, number> = (input, context) => {
				seen.push([input, context]);
				return success(input * 2);
			};
			const validator = pipe(
				positive,
				chain(() => spy),
			);
			expect(validator(4, root)).toEqual(success(8));
			expect(seen).toEqual([[4, root]]);
		});

		it("chain short-circuits on failure", () => {
			let called = false;
			const validator = pipe(
				positive,
				chain((): Validate<number, number> => {
					called = true;
					return of(0);
				}),
			);
			expect(validator(-1, [])).toEqual(failureWithMessage(-1, "must be positive"));
			expect(called).toBe(false);
		});

		it("ap accumulates both failures at the shared context", () => {
			const even = fromPredicate((n: number) => n % 2 === 0, "must be even");
			const both = pipe(
				positive,
				map((a: number) => (b: number) => a + b),
				ap(even),
			);
			expect(both(-3, root)).toEqual(
				failures([
					validationError({ value: -3, message: "must be positive", context: root }),
					validationError({ value: -3, message: "must be even", context: root }),
				]),
			);
			expect(both(4, root)).toEqual(success(8));
		});

		it("chainLeft keeps both error lists when recovery fails", () => {
			const validator = pipe(
				positive,
				chainLeft(() => failure<number, number>("recovery failed")),
			);
			expect(validator(-1, [])).toEqual(
				failures([
					validationError({ value: -1, message: "must be positive" }),
					validationError({ value: -1, message: "recovery failed" }),
				]),
			);
		});

		it("orElse discards the errors of a successful recovery", () => {
			const validator = pipe(
				positive,
				orElse(() => of<number, number>(1)),
			);
			expect(validator(-1, [])).toEqual(success(1));
		});

		it("alt tries the fallback with the same context", () => {
			const validator = pipe(
				positive,
				alt(() => failure<number, number>("fallback failed")),
			);
			expect(validator(-1, root)).toEqual(
				failures([
					validationError({ value: -1, message: "must be positive", context: root }),
					validationError({ value: -1, message: "fallback failed", context: root }),
				]),
			);
		});
	});

	describe("monoids", () => {
		it("applicativeMonoid combines values", () => {
			const m = applicativeMonoid<string, string>(stringMonoid);
			const upper: Validate<string, string> = (input) => success(input.toUpperCase());
			expect(m.concat(upper, of("!"))("hi", [])).toEqual(success("HI!"));
			expect(m.empty()("hi", [])).toEqual(success(""));
		});

		it("alternativeMonoid keeps the succeeding side", () => {
			const m = alternativeMonoid<number, number>(sumMonoid);
			expect(m.concat(positive, of(10))(-1, [])).toEqual(success(10));
			expect(m.concat(positive, of(10))(5, [])).toEqual(success(15));
		});

		it("altMonoid returns the first success", () => {
			const m = altMonoid<number, number>(() => failure("no alternative matched"));
			const validator = m.concat(m.concat(positive, of(0)), of(1));
			expect(validator(-1, [])).toEqual(success(0));
			expect(m.empty()(7, root)).toEqual(failureWithMessage(7, "no alternative matched", root));
		});

		it("instance exposes the data-first forms", () => {
			const doubled = ValidateMonad.map(positive, (n: number) => n * 2);
			expect(doubled(21, [])).toEqual(success(42));
		});
	});
});
