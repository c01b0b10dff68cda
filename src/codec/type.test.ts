import { describe, expect, it } from "vitest";
import { concatAll } from "../monoid/monoid.js";
import { identity } from "../shared/function.js";
import * as VD from "../validate/validate.js";
import type { Context } from "../validation/context.js";
import { validationError } from "../validation/validation-error.js";
import { failureWithMessage, failures, getErrors, success } from "../validation/validation.js";
import {
	type Type,
	alt,
	altMonoid,
	decode,
	encode,
	makeType,
	property,
	unknownRecord,
} from "./type.js";

const isString = (u: unknown): u is string => typeof u === "string";
const isNumber = (u: unknown): u is number => typeof u === "number";

const str: Type<string> = makeType(
	"string",
	isString,
	(input: unknown, context) =>
		isString(input) ? success(input) : failureWithMessage(input, "expected a string", context),
	identity,
);

const num: Type<number> = makeType(
	"number",
	isNumber,
	(input: unknown, context) =>
		isNumber(input) ? success(input) : failureWithMessage(input, "expected a number", context),
	identity,
);

const numberFromString: Type<number> = makeType(
	"NumberFromString",
	isNumber,
	(input: unknown, context) => {
		const parsed = isString(input) && input.trim() !== "" ? Number(input) : Number.NaN;
		return Number.isNaN(parsed)
			? failureWithMessage(input, "expected a numeric string", context)
			: success(parsed);
	},
	identity,
);

describe("Type", () => {
	describe("decode", () => {
		it("succeeds with the validated value", () => {
			expect(decode(str)("hello")).toEqual(success("hello"));
		});

		it("roots the context at the type name", () => {
			expect(decode(str)(5)).toEqual(
				failures([
					validationError({
						value: 5,
						message: "expected a string",
						context: [{ key: "", type: "string", actual: 5 }],
					}),
				]),
			);
		});
	});

	describe("encode", () => {
		it("delegates to the codec's encoder", () => {
			const upper = makeType("Upper", isString, str.validate, (a: string) => a.toUpperCase());
			expect(encode(upper)("abc")).toBe("ABC");
		});
	});

	describe("property", () => {
		const root: Context = [{ key: "", type: "User" }];

		it("pushes the key, the field's type and the actual value", () => {
			const errors = getErrors(property("name", str)({ name: 5 }, root));
			expect(errors).toEqual([
				validationError({
					value: 5,
					message: "expected a string",
					context: [...root, { key: "name", type: "string", actual: 5 }],
				}),
			]);
		});

		it("validates a missing property as undefined", () => {
			const errors = getErrors(property("name", str)({}, root));
			expect(errors[0]?.value).toBeUndefined();
			expect(errors[0]?.context[1]).toEqual({ key: "name", type: "string", actual: undefined });
		});

		it("ignores inherited properties", () => {
			const input: Readonly<Record<string, unknown>> = Object.create({ name: "inherited" });
			expect(property("name", str)(input, []).ok).toBe(false);
		});
	});

	describe("unknownRecord", () => {
		it("accepts plain objects", () => {
			expect(decode(unknownRecord)({ a: 1 })).toEqual(success({ a: 1 }));
		});

		it.each([null, [], "text", 3])("rejects %j", (input) => {
			const errors = getErrors(decode(unknownRecord)(input));
			expect(errors.map((e) => e.message)).toEqual(["expected an object"]);
		});
	});

	describe("alt", () => {
		const numberLike = alt(() => numberFromString)(num);

		it("names the combined type after the first", () => {
			expect(numberLike.name).toBe("Alt[number]");
		});

		it("falls back to the second type", () => {
			expect(decode(numberLike)(7)).toEqual(success(7));
			expect(decode(numberLike)("8")).toEqual(success(8));
		});

		it("reports both failures in attempt order", () => {
			const errors = getErrors(decode(numberLike)(true));
			expect(errors.map((e) => e.message)).toEqual([
				"expected a number",
				"expected a numeric string",
			]);
			expect(errors[0]?.context).toEqual([{ key: "", type: "Alt[number]", actual: true }]);
		});

		it("guards with either type", () => {
			expect(numberLike.is(1)).toBe(true);
			expect(numberLike.is("1")).toBe(false);
		});
	});

	describe("altMonoid", () => {
		const never: Type<number> = makeType(
			"Never",
			(_u: unknown): _u is number => false,
			VD.left<unknown, number>([]),
			identity,
		);
		const M = altMonoid(() => never);

		it("folds a list of alternatives", () => {
			const combined = concatAll(M)([num, numberFromString]);
			expect(combined.name).toBe("Alt[Alt[Never]]");
			expect(decode(combined)("42")).toEqual(success(42));
		});

		it("contributes no errors of its own through an empty zero", () => {
			const combined = concatAll(M)([num, numberFromString]);
			const errors = getErrors(decode(combined)(false));
			expect(errors.map((e) => e.message)).toEqual([
				"expected a number",
				"expected a numeric string",
			]);
		});
	});
});
