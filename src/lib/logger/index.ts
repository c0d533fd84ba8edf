/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Domain and CLI code depend on the small Logger interface below; pino is
 * only imported here. Output is newline-delimited JSON on the configured
 * destination (stderr in the CLI, so it never mixes with CSV on stdout).
 */

import { pino } from "pino";
import type { DestinationStream, LoggerOptions, Logger as PinoLogger } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Bound as the `name` field of every line. */
	readonly name?: string;
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

/** Narrow an arbitrary string to a LogLevel. */
export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function forward(target: PinoLogger, method: LogMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		target[method](String(msgOrObj ?? ""));
	} else if (typeof msgOrObj === "object") {
		target[method](msgOrObj, msg ?? "");
	} else {
		target[method]({ value: msgOrObj }, msg ?? "");
	}
}

function wrapPino(pinoLogger: PinoLogger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with an optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug", destination: process.stderr });
 * logger.info({ records: 1440 }, "series written");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: LoggerOptions = {
		level: config.level,
	};
	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}

	if (config.destination) {
		const target = config.destination;
		const stream: DestinationStream = {
			write(chunk: string): void {
				target.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}

	return wrapPino(pino(pinoOptions));
}
