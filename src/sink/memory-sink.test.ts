import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { OutputError } from "../shared/errors.js";
import type { PriceRecord } from "../series/types.js";
import { MemorySink } from "./memory-sink.js";

const RECORD: PriceRecord = {
	timestampMs: 0,
	bid: Decimal.from("1.1"),
	ask: Decimal.from("1.2"),
	bidVolume: 0,
	askVolume: 10,
};

describe("MemorySink", () => {
	it("keeps records in write order", async () => {
		const sink = new MemorySink();
		await sink.write(RECORD);
		await sink.write({ ...RECORD, timestampMs: 1 });
		expect(sink.size).toBe(2);
		expect(sink.records().map((r) => r.timestampMs)).toEqual([0, 1]);
	});

	it("returns a copy of its records", async () => {
		const sink = new MemorySink();
		await sink.write(RECORD);
		sink.records().pop();
		expect(sink.size).toBe(1);
	});

	it("rejects writes once closed", async () => {
		const sink = new MemorySink();
		await sink.close();
		expect(sink.isClosed).toBe(true);
		await expect(sink.write(RECORD)).rejects.toBeInstanceOf(OutputError);
	});
});
