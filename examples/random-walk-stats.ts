/**
 * Random Walk Stats: draw a seeded random series in memory and summarize it.
 *
 * Shows that the same seed replays the same path.
 * Run: npx tsx examples/random-walk-stats.ts [seed]
 */

import { Decimal, MemorySink, generateSeries, parseCalendarDate, unwrap, writeSeries } from "../src/index.js";
import type { CalendarDate, PriceRecord } from "../src/index.js";

function day(text: string): CalendarDate {
	const date = parseCalendarDate(text);
	if (date === undefined) throw new Error(`bad date ${text}`);
	return date;
}

const seed = Number(process.argv[2] ?? "7");

async function draw(): Promise<PriceRecord[]> {
	const sink = new MemorySink();
	const series = unwrap(
		generateSeries({
			startDate: day("2022.06.01"),
			endDate: day("2022.06.30"),
			startPrice: 145.2,
			endPrice: 151.8,
			digits: 3,
			spreadPoints: 15,
			densityPerMinute: 1,
			pattern: "random",
			volatility: 2,
			seed,
		}),
	);
	await writeSeries(series, sink);
	return sink.records();
}

// ── Summary ──────────────────────────────────────────────────────────

const records = await draw();
let high = Decimal.zero();
let low: Decimal | undefined;
for (const { bid } of records) {
	if (bid.gt(high)) high = bid;
	if (low === undefined || bid.lt(low)) low = bid;
}

console.log(`seed ${seed}: ${records.length} records`);
console.log(`  first ${records[0]?.bid.toFixed(3)}  last ${records.at(-1)?.bid.toFixed(3)}`);
console.log(`  high  ${high.toFixed(3)}  low  ${low?.toFixed(3)}`);

const replay = await draw();
const same = replay.every((r, i) => records[i]?.bid.eq(r.bid) === true);
console.log(`  replay identical: ${same}`);
