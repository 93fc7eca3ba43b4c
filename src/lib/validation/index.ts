/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Re-exports `z` so schemas can be built without a direct zod dependency.
 */

import { z } from "zod";
import { ResultOfError } from "../../shared/errors.js";
import { failure, success } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Schema validation failure carrying one or more issues. */
export class ValidationError extends ResultOfError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			issues: this.issues,
		};
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const parsed = schema.safeParse(data);
	if (parsed.success) {
		return success(parsed.data);
	}
	const issues: ValidationIssue[] = parsed.error.issues.map((i) => ({
		path: [...i.path],
		message: i.message,
	}));
	return failure(new ValidationError("Validation failed", issues));
}
