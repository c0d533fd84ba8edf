/**
 * CsvSink: delimited text output over any Writable.
 *
 * Writes one line per record, waiting for `drain` whenever the stream asks
 * for backpressure. A stream error is reported by the next write(), or by
 * close() when no write follows it.
 */

import { createWriteStream } from "node:fs";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import type { Writable } from "node:stream";
import { OutputError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { PriceRecord } from "../series/types.js";
import { type FormatOptions, formatHeader, formatRecord } from "./csv-format.js";
import type { RecordSink } from "./types.js";

const EOL = "\n";

export interface CsvSinkOptions extends FormatOptions {
	/** Write the column header before the first record. */
	readonly header?: boolean;
	/** End the stream on close(). Leave false for stdout. */
	readonly end?: boolean;
	/** Name used in error messages. */
	readonly target?: string;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

function outputError(action: string, target: string, cause: unknown): OutputError {
	const reason = cause instanceof Error ? cause.message : String(cause);
	const errno = isNodeError(cause) ? cause.code : undefined;
	return new OutputError(`Failed to ${action} ${target}: ${reason}`, {
		cause,
		target,
		...(errno !== undefined && { errno }),
	});
}

export class CsvSink implements RecordSink {
	private readonly stream: Writable;
	private readonly format: FormatOptions;
	private readonly endOnClose: boolean;
	private readonly target: string;
	private closed = false;
	private failure: OutputError | undefined;
	private failureReported = false;
	private written = 0;

	private constructor(stream: Writable, options: CsvSinkOptions) {
		this.stream = stream;
		this.format = { digits: options.digits, delimiter: options.delimiter };
		this.endOnClose = options.end ?? true;
		this.target = options.target ?? "output stream";
		stream.on("error", (error: unknown) => {
			this.failure ??= outputError("write", this.target, error);
		});
		if (options.header === true) {
			// buffered without waiting for drain
			stream.write(`${formatHeader(options.delimiter)}${EOL}`);
		}
	}

	/** Wrap an already open stream. */
	static create(stream: Writable, options: CsvSinkOptions): CsvSink {
		return new CsvSink(stream, options);
	}

	/**
	 * Create or truncate `path` and wait until it is open, so that a bad
	 * path fails before any record is generated.
	 */
	static async toFile(
		path: string,
		options: Omit<CsvSinkOptions, "end" | "target">,
	): Promise<Result<CsvSink, OutputError>> {
		const stream = createWriteStream(path, { encoding: "utf-8" });
		try {
			await once(stream, "open");
		} catch (error: unknown) {
			return err(outputError("open", path, error));
		}
		return ok(new CsvSink(stream, { ...options, end: true, target: path }));
	}

	/** Records written so far, header excluded. */
	get recordsWritten(): number {
		return this.written;
	}

	async write(record: PriceRecord): Promise<void> {
		if (this.closed) {
			throw new OutputError(`CsvSink for ${this.target} is closed`, { target: this.target });
		}
		this.throwIfFailed();
		if (!this.stream.write(`${formatRecord(record, this.format)}${EOL}`)) {
			try {
				await once(this.stream, "drain");
			} catch (error: unknown) {
				this.failure ??= outputError("write", this.target, error);
			}
			this.throwIfFailed();
		}
		this.written++;
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;

		if (this.failure !== undefined) {
			if (this.endOnClose) this.stream.destroy();
			if (!this.failureReported) {
				this.failureReported = true;
				throw this.failure;
			}
			return;
		}
		if (!this.endOnClose) return;

		this.stream.end();
		try {
			await finished(this.stream);
		} catch (error: unknown) {
			throw this.failure ?? outputError("close", this.target, error);
		}
	}

	private throwIfFailed(): void {
		if (this.failure === undefined && this.stream.destroyed) {
			this.failure = new OutputError(`${this.target} is no longer writable`, { target: this.target });
		}
		if (this.failure !== undefined) {
			this.failureReported = true;
			throw this.failure;
		}
	}
}
