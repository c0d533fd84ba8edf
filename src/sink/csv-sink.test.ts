import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { OutputError } from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import type { PriceRecord } from "../series/types.js";
import { CsvSink } from "./csv-sink.js";

const JAN_1_2020 = Date.UTC(2020, 0, 1);
const FORMAT = { digits: 5, delimiter: "," } as const;
const HEADER = "timestamp,bid,ask,bid_volume,ask_volume\n";

function record(minute: number): PriceRecord {
	return {
		timestampMs: JAN_1_2020 + minute * 60_000,
		bid: Decimal.from("1.5"),
		ask: Decimal.from("1.5001"),
		bidVolume: minute,
		askVolume: minute + 10,
	};
}

function line(minute: number): string {
	const mm = String(minute).padStart(2, "0");
	return `2020.01.01 00:${mm}:00.000,1.50000,1.50010,${minute}.00000,${minute + 10}.00000\n`;
}

interface Collector {
	readonly stream: Writable;
	text(): string;
}

function collector(highWaterMark = 16_384): Collector {
	const chunks: string[] = [];
	const stream = new Writable({
		highWaterMark,
		write(chunk: Buffer, _encoding, callback) {
			chunks.push(chunk.toString());
			setImmediate(callback);
		},
	});
	return { stream, text: () => chunks.join("") };
}

function failing(callbackTiming: "sync" | "async"): Writable {
	return new Writable({
		write(_chunk, _encoding, callback) {
			const error = new Error("disk full");
			if (callbackTiming === "sync") callback(error);
			else setImmediate(() => callback(error));
		},
	});
}

describe("CsvSink", () => {
	describe("over a stream", () => {
		it("writes one line per record and ends the stream on close", async () => {
			const out = collector();
			const sink = CsvSink.create(out.stream, FORMAT);
			await sink.write(record(0));
			await sink.write(record(1));
			await sink.close();

			expect(out.text()).toBe(line(0) + line(1));
			expect(sink.recordsWritten).toBe(2);
			expect(out.stream.writableFinished).toBe(true);
		});

		it("writes the header first when asked", async () => {
			const out = collector();
			const sink = CsvSink.create(out.stream, { ...FORMAT, header: true });
			await sink.write(record(0));
			await sink.close();
			expect(out.text()).toBe(HEADER + line(0));
		});

		it("leaves the stream open when end is false", async () => {
			const out = collector();
			const sink = CsvSink.create(out.stream, { ...FORMAT, end: false });
			await sink.write(record(0));
			await sink.close();
			expect(out.stream.writableEnded).toBe(false);
		});

		it("waits for drain under backpressure and keeps the order", async () => {
			const out = collector(1);
			const sink = CsvSink.create(out.stream, FORMAT);
			for (let minute = 0; minute < 50; minute++) {
				await sink.write(record(minute));
			}
			await sink.close();
			expect(out.text()).toBe(Array.from({ length: 50 }, (_, m) => line(m)).join(""));
		});

		it("rejects writes after close", async () => {
			const sink = CsvSink.create(collector().stream, FORMAT);
			await sink.close();
			await expect(sink.write(record(0))).rejects.toBeInstanceOf(OutputError);
		});

		it("close is idempotent", async () => {
			const sink = CsvSink.create(collector().stream, FORMAT);
			await sink.close();
			await expect(sink.close()).resolves.toBeUndefined();
		});
	});

	describe("stream failures", () => {
		it("rejects the write that hits the error", async () => {
			const sink = CsvSink.create(failing("sync"), { ...FORMAT, target: "out.csv" });
			await expect(sink.write(record(0))).rejects.toThrow("Failed to write out.csv: disk full");
			await expect(sink.close()).resolves.toBeUndefined();
		});

		it("reports an error that arrives after the last write from close", async () => {
			const sink = CsvSink.create(failing("async"), FORMAT);
			await sink.write(record(0));
			await expect(sink.close()).rejects.toThrow("disk full");
		});
	});

	describe("toFile", () => {
		let dir: string;

		beforeEach(async () => {
			dir = await mkdtemp(join(tmpdir(), "csv-sink-"));
		});

		afterEach(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it("writes the header and records to the file", async () => {
			const path = join(dir, "out.csv");
			const sink = unwrap(await CsvSink.toFile(path, { ...FORMAT, header: true }));
			await sink.write(record(0));
			await sink.write(record(1));
			await sink.close();
			expect(await readFile(path, "utf-8")).toBe(HEADER + line(0) + line(1));
		});

		it("leaves just the header for an empty series", async () => {
			const path = join(dir, "empty.csv");
			const sink = unwrap(await CsvSink.toFile(path, { ...FORMAT, header: true }));
			await sink.close();
			expect(await readFile(path, "utf-8")).toBe(HEADER);
		});

		it("fails to open a path in a missing directory", async () => {
			const path = join(dir, "missing", "out.csv");
			const result = await CsvSink.toFile(path, FORMAT);
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(OutputError);
				expect(result.error.message.startsWith(`Failed to open ${path}:`)).toBe(true);
				expect(result.error.context["errno"]).toBe("ENOENT");
			}
		});
	});
});
