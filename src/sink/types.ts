import type { PriceRecord } from "../series/types.js";

/** Destination for generated records. Writes are applied in call order. */
export interface RecordSink {
	/** Rejects with OutputError when the destination fails. */
	write(record: PriceRecord): Promise<void>;
	/** Flush and release the destination. Safe to call more than once. */
	close(): Promise<void>;
}
