/**
 * Series generator: turns a GenerationConfig into a lazy sequence of quotes.
 *
 * Step i sits at startDate 00:00 UTC + floor(i * 60000 / density) ms. Its bid
 * is the straight line from startPrice to endPrice plus the pattern offset,
 * rounded to `digits` and floored at one point; ask is bid plus the spread.
 */

import { daysInclusive, startOfDayMs } from "../shared/calendar.js";
import { Decimal } from "../shared/decimal.js";
import type { ConfigurationError } from "../shared/errors.js";
import { map } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { Duration } from "../shared/time.js";
import { type OffsetModel, createPatternModel } from "./patterns.js";
import { SeededRandom, entropySeed } from "./random.js";
import type { GenerationConfig, PriceRecord, PriceSeries } from "./types.js";
import { validateGenerationConfig } from "./validate.js";
import { quoteVolumes } from "./volumes.js";

export interface GenerateOptions {
	/** Seed source used when the config carries no seed. Defaults to system entropy. */
	readonly entropy?: (() => number) | undefined;
}

/** Spacing between steps in milliseconds; Infinity when density is 0. */
export function stepIntervalMs(densityPerMinute: number): number {
	return Duration.minutes(1) / densityPerMinute;
}

/** Offset of a step from the start of the range, in whole milliseconds. */
export function stepOffsetMs(step: number, densityPerMinute: number): number {
	return Math.floor((step * Duration.minutes(1)) / densityPerMinute);
}

/** Number of steps whose timestamp falls inside the date range. */
export function countSteps(config: GenerationConfig): number {
	const density = config.densityPerMinute;
	if (density === 0) return 0;
	const spanMs = Duration.days(daysInclusive(config.startDate, config.endDate));
	let steps = Math.ceil((spanMs * density) / Duration.minutes(1));
	// the estimate can be off by one either way under float rounding
	while (steps > 0 && stepOffsetMs(steps - 1, density) >= spanMs) steps--;
	while (stepOffsetMs(steps, density) < spanMs) steps++;
	return steps;
}

function lerp(from: number, to: number, t: number): number {
	return from === to ? from : (1 - t) * from + t * to;
}

class SeriesIterator implements PriceSeries {
	readonly stepCount: number;
	readonly intervalMs: number;
	readonly seed: number;
	private readonly records: Generator<PriceRecord, void, undefined>;

	constructor(
		records: Generator<PriceRecord, void, undefined>,
		stepCount: number,
		intervalMs: number,
		seed: number,
	) {
		this.records = records;
		this.stepCount = stepCount;
		this.intervalMs = intervalMs;
		this.seed = seed;
	}

	next(): IteratorResult<PriceRecord, void> {
		return this.records.next();
	}

	/** Stop early; remaining records are never computed. */
	return(): IteratorResult<PriceRecord, void> {
		return this.records.return(undefined);
	}

	[Symbol.iterator](): this {
		return this;
	}
}

function* produceRecords(
	config: GenerationConfig,
	steps: number,
	offsetAt: OffsetModel,
): Generator<PriceRecord, void, undefined> {
	const { startPrice, endPrice, digits, spreadPoints, densityPerMinute } = config;
	const startMs = startOfDayMs(config.startDate);
	const point = Decimal.pow10(-digits);
	const spread = Decimal.from(spreadPoints).mul(point);
	const last = steps - 1;

	for (let step = 0; step < steps; step++) {
		const timestampMs = startMs + stepOffsetMs(step, densityPerMinute);
		const baseline = lerp(startPrice, endPrice, last > 0 ? step / last : 0);
		const price = baseline + offsetAt(step, baseline);
		const bid = Decimal.max(Decimal.from(price).round(digits), point);
		yield {
			timestampMs,
			bid,
			ask: bid.add(spread),
			...quoteVolumes(timestampMs, spreadPoints),
		};
	}
}

function createSeries(config: GenerationConfig, entropy: () => number): PriceSeries {
	const steps = countSteps(config);
	const intervalMs = stepIntervalMs(config.densityPerMinute);
	const seed = config.seed ?? entropy();
	const point = 10 ** -config.digits;
	const trendStep = steps > 1 ? Math.abs(config.endPrice - config.startPrice) / (steps - 1) : 0;

	const offsetAt = createPatternModel(config.pattern, {
		steps,
		startPrice: config.startPrice,
		endPrice: config.endPrice,
		volatility: config.volatility,
		unit: trendStep > 0 ? trendStep : point,
		random: new SeededRandom(seed),
	});

	return new SeriesIterator(produceRecords(config, steps, offsetAt), steps, intervalMs, seed);
}

/**
 * Validate `config` and return its record sequence.
 * Fails before producing anything when the config is invalid.
 *
 * @example
 * ```ts
 * const series = unwrap(generateSeries({ ...config, pattern: "wave" }));
 * for (const record of series) await sink.write(record);
 * ```
 */
export function generateSeries(
	config: GenerationConfig,
	options: GenerateOptions = {},
): Result<PriceSeries, ConfigurationError> {
	return map(validateGenerationConfig(config), (valid) =>
		createSeries(valid, options.entropy ?? entropySeed),
	);
}
