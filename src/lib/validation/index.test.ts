import { describe, expect, it } from "vitest";
import { z } from "zod";
import { ResultOfError } from "../../shared/errors.js";
import { flatMap, isFailure, isSuccess, success } from "../../shared/result.js";
import { ValidationError, validate } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns success(data) for valid input", () => {
			const result = validate(z.string(), "hello");

			expect(isSuccess(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("hello");
			}
		});

		it("returns failure(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isFailure(result)).toBe(true);
			if (!result.ok) {
				expect(result.failure).toBeInstanceOf(ValidationError);
				expect(result.failure).toBeInstanceOf(ResultOfError);
				expect(result.failure.code).toBe("VALIDATION_FAILED");
				expect(result.failure.message).toBe("Validation failed");
			}
		});

		it("includes issue paths for nested objects", () => {
			const schema = z.object({
				user: z.object({
					name: z.string(),
					age: z.number(),
				}),
			});
			const result = validate(schema, { user: { name: 42, age: "wrong" } });

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.failure.issues.map((i) => i.path)).toEqual([
					["user", "name"],
					["user", "age"],
				]);
				expect(result.failure.context).toEqual({ issueCount: 2 });
				for (const issue of result.failure.issues) {
					expect(issue.message.length).toBeGreaterThan(0);
				}
			}
		});

		it("keeps array indices as numbers in paths", () => {
			const result = validate(z.array(z.number()), [1, "two"]);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.failure.issues[0]?.path).toEqual([1]);
			}
		});

		it("serializes issues in toJSON", () => {
			const result = validate(z.object({ id: z.string() }), {});

			expect(result.ok).toBe(false);
			if (!result.ok) {
				const json = result.failure.toJSON();
				expect(json.code).toBe("VALIDATION_FAILED");
				expect(json.issues).toEqual(result.failure.issues);
			}
		});

		it("returns transformed output of the schema", () => {
			const schema = z.string().transform((s) => s.length);
			expect(flatMap(validate(schema, "four"), (n) => success(n * 2))).toEqual(success(8));
		});
	});
});
