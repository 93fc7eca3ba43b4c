import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { failure, flatMap, getOrNull, isFailure, isSuccess, map, recover, success } from "./result.js";
import type { Result } from "./result.js";

const arbResult: fc.Arbitrary<Result<number, string>> = fc.oneof(
	fc.integer().map((v): Result<number, string> => success(v)),
	fc.string().map((f): Result<number, string> => failure(f)),
);

const double = (x: number): number => x * 2;
const increment = (x: number): number => x + 1;
const halveIfEven = (x: number): Result<number, string> =>
	x % 2 === 0 ? success(x / 2) : failure(`odd: ${x}`);

describe("Result (property-based)", () => {
	describe("variant queries", () => {
		it("a success is a success and never a failure", () => {
			fc.assert(
				fc.property(fc.anything(), (v) => {
					const r = success(v);
					expect(isSuccess(r)).toBe(true);
					expect(isFailure(r)).toBe(false);
				}),
				{ numRuns: 200 },
			);
		});

		it("a failure is a failure and never a success", () => {
			fc.assert(
				fc.property(fc.anything(), (f) => {
					const r = failure(f);
					expect(isFailure(r)).toBe(true);
					expect(isSuccess(r)).toBe(false);
				}),
				{ numRuns: 200 },
			);
		});

		it("getOrNull returns exactly the wrapped value", () => {
			fc.assert(
				fc.property(fc.integer(), (v) => {
					expect(getOrNull(success(v))).toBe(v);
				}),
			);
		});
	});

	describe("functor laws", () => {
		it("identity: map(r, id) equals r", () => {
			fc.assert(
				fc.property(arbResult, (r) => {
					expect(map(r, (x) => x)).toEqual(r);
				}),
				{ numRuns: 500 },
			);
		});

		it("composition: map(map(r, f), g) equals map(r, g . f)", () => {
			fc.assert(
				fc.property(arbResult, (r) => {
					expect(map(map(r, double), increment)).toEqual(map(r, (x) => increment(double(x))));
				}),
				{ numRuns: 500 },
			);
		});
	});

	describe("monad laws", () => {
		it("left identity: flatMap(success(v), f) equals f(v)", () => {
			fc.assert(
				fc.property(fc.integer(), (v) => {
					expect(flatMap(success(v), halveIfEven)).toEqual(halveIfEven(v));
				}),
				{ numRuns: 500 },
			);
		});

		it("right identity: flatMap(r, success) equals r", () => {
			fc.assert(
				fc.property(arbResult, (r) => {
					expect(flatMap(r, (x) => success(x))).toEqual(r);
				}),
				{ numRuns: 500 },
			);
		});

		it("associativity: chaining order of binds does not matter", () => {
			fc.assert(
				fc.property(arbResult, (r) => {
					const lhs = flatMap(flatMap(r, halveIfEven), halveIfEven);
					const rhs = flatMap(r, (x) => flatMap(halveIfEven(x), halveIfEven));
					expect(lhs).toEqual(rhs);
				}),
				{ numRuns: 500 },
			);
		});
	});

	describe("recover", () => {
		it("always yields a success", () => {
			fc.assert(
				fc.property(arbResult, (r) => {
					expect(isSuccess(recover(r, (f) => f.length))).toBe(true);
				}),
			);
		});

		it("leaves successes untouched", () => {
			fc.assert(
				fc.property(fc.integer(), (v) => {
					expect(recover(success(v), () => -1)).toEqual(success(v));
				}),
			);
		});
	});
});
