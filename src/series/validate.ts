/**
 * Generation config checks, run before the first record is produced.
 */

import { calendarDate, compareDates } from "../shared/calendar.js";
import type { CalendarDate } from "../shared/calendar.js";
import { type ConfigurationError, UnsupportedPatternError } from "../shared/errors.js";
import { err, map } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { validate, z } from "../lib/validation/index.js";
import { SEED_RANGE } from "./random.js";
import { type GenerationConfig, PATTERNS, isPattern } from "./types.js";

/** Prices are doubles; beyond 15 decimals the rounding target is below float resolution. */
export const MAX_DIGITS = 15;
/** One point per millisecond. */
export const MAX_DENSITY_PER_MINUTE = 60_000;
export const MAX_PRICE = 1e9;
export const MAX_VOLATILITY = 1e6;
/** Keeps `spread * point` exact in Decimal and the spread an exact double. */
export const MAX_SPREAD_POINTS = 1e9;

const calendarDateSchema: z.ZodType<CalendarDate> = z
	.object({
		year: z.number().int(),
		month: z.number().int(),
		day: z.number().int(),
	})
	.refine((d) => calendarDate(d.year, d.month, d.day) !== undefined, {
		message: "must be an existing calendar date",
	});

const priceSchema = z.number().finite().positive().max(MAX_PRICE);

export const generationConfigSchema = z
	.object({
		startDate: calendarDateSchema,
		endDate: calendarDateSchema,
		startPrice: priceSchema,
		endPrice: priceSchema,
		digits: z.number().int().min(0).max(MAX_DIGITS),
		spreadPoints: z.number().int().min(0).max(MAX_SPREAD_POINTS),
		densityPerMinute: z.number().finite().min(0).max(MAX_DENSITY_PER_MINUTE),
		pattern: z.string(),
		volatility: z.number().finite().min(0).max(MAX_VOLATILITY),
		seed: z
			.number()
			.int()
			.min(0)
			.max(SEED_RANGE - 1)
			.optional(),
	})
	.superRefine((config, ctx) => {
		if (compareDates(config.endDate, config.startDate) < 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["endDate"],
				message: "must not precede startDate",
			});
		}
	});

/**
 * Check every GenerationConfig invariant.
 * An unknown pattern is reported on its own, ahead of any other issue.
 */
export function validateGenerationConfig(
	config: GenerationConfig,
): Result<GenerationConfig, ConfigurationError> {
	const patternName: unknown = config.pattern;
	if (typeof patternName === "string" && !isPattern(patternName)) {
		return err(new UnsupportedPatternError(patternName, PATTERNS));
	}
	return map(validate(generationConfigSchema, config, "Invalid generation config"), () => config);
}
