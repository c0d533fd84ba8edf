import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { startOfDayMs } from "../shared/calendar.js";
import { Decimal } from "../shared/decimal.js";
import { unwrap } from "../shared/result.js";
import { countSteps, generateSeries } from "./generator.js";
import { PATTERNS, Pattern } from "./types.js";
import type { GenerationConfig } from "./types.js";

const price = fc.double({ min: 0.01, max: 1_000, noNaN: true, noDefaultInfinity: true });

const config: fc.Arbitrary<GenerationConfig> = fc.record({
	startDate: fc.constant({ year: 2024, month: 2, day: 28 }),
	endDate: fc.constantFrom(
		{ year: 2024, month: 2, day: 28 },
		{ year: 2024, month: 2, day: 29 },
		{ year: 2024, month: 3, day: 1 },
	),
	startPrice: price,
	endPrice: price,
	digits: fc.integer({ min: 0, max: 8 }),
	spreadPoints: fc.integer({ min: 0, max: 100 }),
	densityPerMinute: fc.constantFrom(0, 0.3, 1, 2.5),
	pattern: fc.constantFrom(...PATTERNS),
	volatility: fc.double({ min: 0, max: 5, noNaN: true, noDefaultInfinity: true }),
	seed: fc.integer({ min: 0, max: 2 ** 32 - 1 }),
});

function roundedBid(value: number, digits: number): string {
	return Decimal.max(Decimal.from(value).round(digits), Decimal.pow10(-digits)).toString();
}

describe("generateSeries (property-based)", () => {
	it("produces countSteps records inside the range in time order", () => {
		fc.assert(
			fc.property(config, (c) => {
				const records = Array.from(unwrap(generateSeries(c)));
				expect(records).toHaveLength(countSteps(c));
				const endMs = startOfDayMs(c.endDate) + 86_400_000;
				let previous = startOfDayMs(c.startDate);
				for (const record of records) {
					expect(record.timestampMs).toBeGreaterThanOrEqual(previous);
					expect(record.timestampMs).toBeLessThan(endMs);
					previous = record.timestampMs;
				}
			}),
			{ numRuns: 40 },
		);
	});

	it("keeps ask - bid at exactly the spread and bids at or above one point", () => {
		fc.assert(
			fc.property(config, (c) => {
				const point = Decimal.pow10(-c.digits);
				const spread = Decimal.from(c.spreadPoints).mul(point);
				for (const record of unwrap(generateSeries(c))) {
					expect(record.ask.sub(record.bid).eq(spread)).toBe(true);
					expect(record.bid.gte(point)).toBe(true);
					expect(record.bid.round(c.digits).eq(record.bid)).toBe(true);
				}
			}),
			{ numRuns: 40 },
		);
	});

	it("pins every pattern but wave to both prices", () => {
		const pinned = config.filter((c) => c.pattern !== Pattern.Wave && c.densityPerMinute > 0);
		fc.assert(
			fc.property(pinned, (c) => {
				const bids = Array.from(unwrap(generateSeries(c)), (r) => r.bid.toString());
				expect(bids[0]).toBe(roundedBid(c.startPrice, c.digits));
				expect(bids[bids.length - 1]).toBe(roundedBid(c.endPrice, c.digits));
			}),
			{ numRuns: 40 },
		);
	});

	it("is reproducible from the same config and seed", () => {
		fc.assert(
			fc.property(config, (c) => {
				const first = Array.from(unwrap(generateSeries(c)), (r) => r.bid.toString());
				const second = Array.from(unwrap(generateSeries(c)), (r) => r.bid.toString());
				expect(second).toEqual(first);
			}),
			{ numRuns: 20 },
		);
	});
});
