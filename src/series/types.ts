import type { CalendarDate } from "../shared/calendar.js";
import type { Decimal } from "../shared/decimal.js";

/** Modeling patterns; all are deterministic except `random`. */
export const Pattern = {
	None: "none",
	Curve: "curve",
	Random: "random",
	Wave: "wave",
	Zigzag: "zigzag",
} as const;

export type Pattern = (typeof Pattern)[keyof typeof Pattern];

export const PATTERNS: readonly Pattern[] = Object.values(Pattern);

/** Narrow an arbitrary string to a Pattern. */
export function isPattern(value: string): value is Pattern {
	return (PATTERNS as readonly string[]).includes(value);
}

/** Parameters of one generation run. */
export interface GenerationConfig {
	/** First day of the range, from 00:00 UTC. */
	readonly startDate: CalendarDate;
	/** Last day of the range (inclusive). */
	readonly endDate: CalendarDate;
	/** Bid at the first step. */
	readonly startPrice: number;
	/** Bid at the last step for `none`, and the trend target for every pattern. */
	readonly endPrice: number;
	/** Decimal places prices are rounded to. */
	readonly digits: number;
	/** Bid/ask distance in points (10^-digits). */
	readonly spreadPoints: number;
	/** Data points per minute of simulated time; 0 produces nothing. */
	readonly densityPerMinute: number;
	readonly pattern: Pattern;
	/** Scales the pattern's deviation from the trend line; 1.0 is the baseline amplitude. */
	readonly volatility: number;
	/** Seed for the `random` pattern; drawn from system entropy when absent. */
	readonly seed?: number | undefined;
}

/** One quote of the synthetic feed. */
export interface PriceRecord {
	readonly timestampMs: number;
	readonly bid: Decimal;
	readonly ask: Decimal;
	readonly bidVolume: number;
	readonly askVolume: number;
}

/**
 * A single-pass sequence of records. Records are computed on demand; a new
 * generateSeries() call with the same config and seed yields the same records.
 */
export interface PriceSeries extends IterableIterator<PriceRecord> {
	/** Total number of records the sequence will produce. */
	readonly stepCount: number;
	/** Nominal spacing between records. */
	readonly intervalMs: number;
	/** Seed of the random stream actually used. */
	readonly seed: number;
	/** Stop the sequence early; later next() calls report done. */
	return(): IteratorResult<PriceRecord, void>;
}
