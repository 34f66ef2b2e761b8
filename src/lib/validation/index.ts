/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code builds schemas with the re-exported `z` and never imports
 * "zod" directly, so the dependency stays behind one import path.
 */

import { z } from "zod";
import { ErrorCategory, PipelineError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Raised when untrusted data does not match its schema. */
export class ValidationError extends PipelineError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.Mapping, { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Render issues as `path: message` pairs joined by `; `. */
export function formatIssues(issues: readonly ValidationIssue[]): string {
	return issues
		.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
		.join("; ");
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(`Validation failed: ${formatIssues(issues)}`, issues));
}
