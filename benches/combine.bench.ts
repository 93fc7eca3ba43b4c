import { bench, describe } from "vitest";
import { combine, flatCombine } from "../src/shared/combine.js";
import { failure, success } from "../src/shared/result.js";
import type { Result } from "../src/shared/result.js";

describe("combine", () => {
	const a: Result<number, string> = success(1);
	const b: Result<number, string> = success(2);
	const c: Result<number, string> = success(3);
	const broken: Result<number, string> = failure("broken");

	const many: Result<number, string>[] = Array.from({ length: 100 }, (_, i) => success(i));
	const manyBroken: Result<number, string>[] = [broken, ...many];

	bench("three-arity combine 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			combine(a, b, c, (x, y, z) => x + y + z);
		}
	});

	bench("three-arity flatCombine 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			flatCombine(a, b, c, (x, y, z) => success(x + y + z));
		}
	});

	bench("variadic combine over 100 results", () => {
		combine(many, (values) => values.length);
	});

	bench("variadic combine short-circuiting at the head", () => {
		combine(manyBroken, (values) => values.length);
	});
});
