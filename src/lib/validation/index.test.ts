import { describe, expect, it } from "vitest";
import { InvalidConfigurationError, SynthError } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import { toConfigIssues, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.number().int().min(0), 5);

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe(5);
			}
		});

		it("returns err(InvalidConfigurationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(InvalidConfigurationError);
				expect(result.error.message).toBe("Invalid configuration");
			}
		});

		it("uses the supplied message", () => {
			const result = validate(z.string(), 1, "Invalid generation settings");
			if (!result.ok) {
				expect(result.error.message).toBe("Invalid generation settings");
			}
			expect(result.ok).toBe(false);
		});

		it("includes issue paths for nested objects", () => {
			const schema = z.object({
				prices: z.object({
					start: z.number().positive(),
					end: z.number().positive(),
				}),
			});
			const result = validate(schema, { prices: { start: -1, end: "2" } });

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error.issues).toHaveLength(2);
				const paths = result.error.issues.map((i) => i.path.join("."));
				expect(paths).toEqual(["prices.start", "prices.end"]);
				for (const issue of result.error.issues) {
					expect(issue.message.length).toBeGreaterThan(0);
				}
			}
		});

		it("returns transformed output", () => {
			const schema = z.string().transform((s) => s.toLowerCase());
			const result = validate(schema, "WAVE");
			expect(result).toEqual({ ok: true, value: "wave" });
		});
	});

	describe("toConfigIssues", () => {
		it("maps zod issues to path and message", () => {
			const parsed = z.object({ digits: z.number().int() }).safeParse({ digits: 1.5 });
			expect(parsed.success).toBe(false);
			if (!parsed.success) {
				const issues = toConfigIssues(parsed.error);
				expect(issues).toHaveLength(1);
				expect(issues[0]?.path).toEqual(["digits"]);
			}
		});
	});

	describe("InvalidConfigurationError", () => {
		it("extends SynthError with code and category", () => {
			const result = validate(z.boolean(), "yes");
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(SynthError);
				expect(result.error.code).toBe("INVALID_CONFIGURATION");
				expect(result.error.category).toBe("usage");
			}
			expect(result.ok).toBe(false);
		});
	});
});
