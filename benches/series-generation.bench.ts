import { bench, describe } from "vitest";
import { generateSeries } from "../src/series/generator.js";
import type { GenerationConfig } from "../src/series/types.js";
import { unwrap } from "../src/shared/result.js";
import { formatRecord } from "../src/sink/csv-format.js";

const WEEK: GenerationConfig = {
	startDate: { year: 2020, month: 1, day: 1 },
	endDate: { year: 2020, month: 1, day: 7 },
	startPrice: 1.1,
	endPrice: 1.2,
	digits: 5,
	spreadPoints: 10,
	densityPerMinute: 1,
	pattern: "none",
	volatility: 1,
	seed: 1,
};

function drain(config: GenerationConfig): number {
	let last = 0;
	for (const record of unwrap(generateSeries(config))) last = record.timestampMs;
	return last;
}

describe("series generation", () => {
	bench("linear week", () => {
		drain(WEEK);
	});

	bench("random week", () => {
		drain({ ...WEEK, pattern: "random" });
	});

	bench("zigzag week", () => {
		drain({ ...WEEK, pattern: "zigzag" });
	});

	bench("format week as lines", () => {
		const options = { digits: 5, delimiter: "," };
		for (const record of unwrap(generateSeries(WEEK))) {
			formatRecord(record, options);
		}
	});
});
