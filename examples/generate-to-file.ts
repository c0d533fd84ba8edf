/**
 * Generate a week of EURUSD-like quotes with a zigzag and write them to a CSV file.
 *
 * Run: npx tsx examples/generate-to-file.ts [path]
 */

import { CsvSink, createLogger, generateSeries, loadConfig, writeSeries } from "../src/index.js";

const logger = createLogger({ level: "info", name: "example" });
const path = process.argv[2] ?? "eurusd-zigzag.csv";

const loaded = loadConfig({
	OutputFile: path,
	StartDate: "2021.03.01",
	EndDate: "2021.03.07",
	StartPrice: 1.2071,
	EndPrice: 1.1925,
	Pattern: "zigzag",
	Volatility: 1.5,
	Header: true,
});
if (!loaded.ok) {
	logger.error({ err: loaded.error.toJSON() }, loaded.error.message);
	process.exit(2);
}
const config = loaded.value;

const series = generateSeries(config.generation);
if (!series.ok) {
	logger.error({ err: series.error.toJSON() }, series.error.message);
	process.exit(2);
}

const sink = await CsvSink.toFile(config.outputFile, {
	digits: config.generation.digits,
	delimiter: config.delimiter,
	header: config.header,
});
if (!sink.ok) {
	logger.error({ err: sink.error.toJSON() }, sink.error.message);
	process.exit(1);
}

const records = await writeSeries(series.value, sink.value);
logger.info({ records, path }, "series written");
