/**
 * Delimited line rendering for PriceRecords.
 *
 * `2020.01.01 00:00:00.000,1.00000,1.00010,787.00000,797.00000`
 * Fields containing the delimiter or a quote are quoted, quotes doubled.
 */

import { formatTimestamp } from "../shared/calendar.js";
import type { PriceRecord } from "../series/types.js";

export interface FormatOptions {
	/** Decimals for prices and volumes. */
	readonly digits: number;
	readonly delimiter: string;
}

export const HEADER_COLUMNS = ["timestamp", "bid", "ask", "bid_volume", "ask_volume"] as const;

function quote(field: string, delimiter: string): string {
	if (!field.includes(delimiter) && !field.includes('"')) return field;
	return `"${field.replaceAll('"', '""')}"`;
}

function join(fields: readonly string[], delimiter: string): string {
	return fields.map((f) => quote(f, delimiter)).join(delimiter);
}

/** Column header line, without the line terminator. */
export function formatHeader(delimiter: string): string {
	return join(HEADER_COLUMNS, delimiter);
}

/** One record as a line, without the line terminator. */
export function formatRecord(record: PriceRecord, options: FormatOptions): string {
	const { digits, delimiter } = options;
	return join(
		[
			formatTimestamp(record.timestampMs),
			record.bid.toFixed(digits),
			record.ask.toFixed(digits),
			record.bidVolume.toFixed(digits),
			record.askVolume.toFixed(digits),
		],
		delimiter,
	);
}
