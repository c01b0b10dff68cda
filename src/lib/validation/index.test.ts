import { describe, expect, it } from "vitest";
import { decode, property } from "../../codec/type.js";
import { formatPath } from "../../validation/context.js";
import { getErrors, success } from "../../validation/validation.js";
import { fromZod, fromZodSchema, z } from "./index.js";

describe("zod bridge", () => {
	describe("fromZodSchema()", () => {
		it("succeeds with the parsed data", () => {
			const validate = fromZodSchema(z.string().trim());
			expect(validate("  hello ", [])).toEqual(success("hello"));
		});

		it("maps each issue to an error at the issue path", () => {
			const schema = z.object({
				user: z.object({
					name: z.string(),
					age: z.number(),
				}),
			});
			const input = { user: { name: 42, age: "wrong" } };
			const errors = getErrors(fromZodSchema(schema)(input, []));

			expect(errors).toHaveLength(2);
			expect(errors[0]?.value).toBe(42);
			expect(errors[0]?.message).toBe("Expected string, received number");
			expect(errors[0]?.context).toEqual([
				{ key: "user", type: "field", actual: input.user },
				{ key: "name", type: "field", actual: 42 },
			]);
			expect(errors[1]?.value).toBe("wrong");
			expect(formatPath(errors[1]?.context ?? [])).toBe("user.age");
		});

		it("marks numeric path segments as elements", () => {
			const errors = getErrors(fromZodSchema(z.array(z.number()))([1, "x"], []));

			expect(errors).toHaveLength(1);
			expect(errors[0]?.context).toEqual([{ key: "1", type: "element", actual: "x" }]);
		});

		it("extends the caller's context", () => {
			const root = [{ key: "", type: "Settings" }];
			const errors = getErrors(
				fromZodSchema(z.object({ port: z.number() }))({ port: "80" }, root),
			);

			expect(formatPath(errors[0]?.context ?? [])).toBe("Settings.port");
		});
	});

	describe("fromZod()", () => {
		const Port = fromZod("Port", z.number().int().min(1, "port must be positive"));

		it("builds a codec whose guard agrees with the schema", () => {
			expect(Port.name).toBe("Port");
			expect(Port.is(8080)).toBe(true);
			expect(Port.is(0)).toBe(false);
			expect(Port.encode(8080)).toBe(8080);
		});

		it("fails at the root context with the schema's message", () => {
			const errors = getErrors(decode(Port)(0));

			expect(errors).toHaveLength(1);
			expect(errors[0]?.message).toBe("port must be positive");
			expect(errors[0]?.value).toBe(0);
			expect(formatPath(errors[0]?.context ?? [])).toBe("Port");
		});

		it("reports the property path when used for a field", () => {
			const errors = getErrors(property("port", Port)({ port: -1 }, []));

			expect(errors[0]?.message).toBe("port must be positive");
			expect(formatPath(errors[0]?.context ?? [])).toBe("port");
		});

		it("uses the supplied output guard for a transforming schema", () => {
			const isNumber = (u: unknown): u is number => typeof u === "number";
			const Count = fromZod("Count", z.string().transform(Number), isNumber);

			expect(Count.is("5")).toBe(false);
			expect(Count.is(5)).toBe(true);
			expect(decode(Count)("5")).toEqual(success(5));
			expect(getErrors(decode(Count)(5)).map((e) => e.message)).toEqual([
				"Expected string, received number",
			]);
		});
	});
});
