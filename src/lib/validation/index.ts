/**
 * Validation wrapper: thin abstraction over Zod that returns
 * Result<T, InvalidConfigurationError>.
 *
 * Re-exports `z` so schemas can be built without a direct zod import.
 */

import { z } from "zod";
import { type ConfigIssue, InvalidConfigurationError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** Convert zod issues into the configuration issue shape. */
export function toConfigIssues(error: z.ZodError): ConfigIssue[] {
	return error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	message = "Invalid configuration",
): Result<T, InvalidConfigurationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	return err(new InvalidConfigurationError(message, toConfigIssues(result.error)));
}
