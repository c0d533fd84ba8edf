/**
 * MemorySink: keeps every record in an array.
 *
 * For tests and for callers that post-process a short series in process.
 */

import { OutputError } from "../shared/errors.js";
import type { PriceRecord } from "../series/types.js";
import type { RecordSink } from "./types.js";

export class MemorySink implements RecordSink {
	private readonly store: PriceRecord[] = [];
	private closed = false;

	async write(record: PriceRecord): Promise<void> {
		if (this.closed) {
			throw new OutputError("MemorySink is closed");
		}
		this.store.push(record);
	}

	async close(): Promise<void> {
		this.closed = true;
	}

	/** Shallow copy of the records received so far. */
	records(): PriceRecord[] {
		return [...this.store];
	}

	get size(): number {
		return this.store.length;
	}

	get isClosed(): boolean {
		return this.closed;
	}
}
