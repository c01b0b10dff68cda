import { describe, expect, it } from "vitest";
import {
	allMonoid,
	anyMonoid,
	arrayMonoid,
	concatAll,
	makeMonoid,
	productMonoid,
	reverse,
	stringMonoid,
	sumMonoid,
} from "./monoid.js";

describe("Monoid", () => {
	describe("instances", () => {
		it("stringMonoid concatenates", () => {
			expect(stringMonoid.concat("foo", "bar")).toBe("foobar");
			expect(stringMonoid.empty()).toBe("");
		});

		it("sumMonoid and productMonoid", () => {
			expect(sumMonoid.concat(2, 3)).toBe(5);
			expect(sumMonoid.empty()).toBe(0);
			expect(productMonoid.concat(2, 3)).toBe(6);
			expect(productMonoid.empty()).toBe(1);
		});

		it("allMonoid and anyMonoid", () => {
			expect(allMonoid.concat(true, false)).toBe(false);
			expect(allMonoid.empty()).toBe(true);
			expect(anyMonoid.concat(true, false)).toBe(true);
			expect(anyMonoid.empty()).toBe(false);
		});

		it("arrayMonoid keeps left-then-right order", () => {
			const m = arrayMonoid<number>();
			expect(m.concat([1, 2], [3])).toEqual([1, 2, 3]);
			expect(m.empty()).toEqual([]);
		});

		it("arrayMonoid returns the non-empty side unchanged", () => {
			const m = arrayMonoid<number>();
			const xs = [1, 2];
			expect(m.concat(xs, [])).toBe(xs);
			expect(m.concat([], xs)).toBe(xs);
		});
	});

	describe("concatAll", () => {
		it("folds from empty", () => {
			expect(concatAll(sumMonoid)([1, 2, 3, 4])).toBe(10);
			expect(concatAll(stringMonoid)(["a", "b", "c"])).toBe("abc");
		});

		it("returns empty for an empty list", () => {
			expect(concatAll(productMonoid)([])).toBe(1);
		});
	});

	describe("reverse", () => {
		it("flips argument order", () => {
			expect(reverse(stringMonoid).concat("a", "b")).toBe("ba");
			expect(concatAll(reverse(stringMonoid))(["a", "b", "c"])).toBe("cba");
		});
	});

	describe("makeMonoid", () => {
		interface Stats {
			readonly count: number;
			readonly total: number;
		}

		it("builds a struct monoid from its parts", () => {
			const stats = makeMonoid<Stats>(
				(x, y) => ({ count: x.count + y.count, total: x.total + y.total }),
				() => ({ count: 0, total: 0 }),
			);
			const result = concatAll(stats)([
				{ count: 1, total: 10 },
				{ count: 2, total: 5 },
			]);
			expect(result).toEqual({ count: 3, total: 15 });
		});
	});
});
