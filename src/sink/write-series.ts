import type { PriceRecord } from "../series/types.js";
import type { RecordSink } from "./types.js";

/**
 * Pump `records` into `sink` in order and close it, also on failure.
 * Resolves with the number of records written.
 */
export async function writeSeries(records: Iterable<PriceRecord>, sink: RecordSink): Promise<number> {
	let count = 0;
	try {
		for (const record of records) {
			await sink.write(record);
			count++;
		}
	} finally {
		await sink.close();
	}
	return count;
}
