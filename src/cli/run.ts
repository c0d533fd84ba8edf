/**
 * CLI driver: arguments and environment in, delimited records out.
 *
 * Exit codes: 0 on success, 2 for usage and configuration errors (reported
 * before any output file is created), 1 for output and unexpected failures.
 */

import type { Writable } from "node:stream";
import { logLevelFromEnv, paramsFromEnv } from "../config/env.js";
import { loadConfigFrom, summarizeConfig } from "../config/loader.js";
import { STDOUT_PATH } from "../config/types.js";
import type { RunConfig } from "../config/types.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { generateSeries } from "../series/generator.js";
import {
	type ConfigurationError,
	InvalidConfigurationError,
	type OutputError,
	classifyError,
} from "../shared/errors.js";
import { ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { CsvSink } from "../sink/csv-sink.js";
import { writeSeries } from "../sink/write-series.js";
import { USAGE, parseCliArgs } from "./args.js";

export const ExitCode = {
	Success: 0,
	Failure: 1,
	Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Process surroundings, injectable for tests. */
export interface CliIo {
	readonly stdout: Writable;
	/** Receives log lines and usage errors. */
	readonly stderr: Writable;
	readonly env: NodeJS.ProcessEnv;
	readonly clock?: Clock | undefined;
	/** Seed source for runs without --seed. */
	readonly entropy?: (() => number) | undefined;
}

function reportUsageError(stderr: Writable, error: ConfigurationError): void {
	const lines = [`fxsynth: ${error.message}`];
	if (error instanceof InvalidConfigurationError) {
		for (const issue of error.issues) {
			lines.push(`  ${issue.path.join(".")}: ${issue.message}`);
		}
	}
	if (error.hint !== undefined) {
		lines.push(`  ${error.hint}`);
	}
	lines.push("Run fxsynth --help for usage.");
	stderr.write(`${lines.join("\n")}\n`);
}

async function openSink(config: RunConfig, stdout: Writable): Promise<Result<CsvSink, OutputError>> {
	const format = { digits: config.generation.digits, delimiter: config.delimiter, header: config.header };
	if (config.outputFile === STDOUT_PATH) {
		return ok(CsvSink.create(stdout, { ...format, end: false, target: "stdout" }));
	}
	return CsvSink.toFile(config.outputFile, format);
}

function logFailure(logger: Logger, error: unknown): void {
	const failure = classifyError(error);
	logger.error({ err: failure.toJSON() }, failure.message);
}

/** Run one invocation and resolve with its exit code. Never rejects for expected failures. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<ExitCode> {
	const clock = io.clock ?? SystemClock;
	const startedAt = clock.now();

	const args = parseCliArgs(argv);
	const verbose = args.ok && args.value.verbose;
	const logger = createLogger({
		level: verbose ? "debug" : (logLevelFromEnv(io.env) ?? "warn"),
		name: "fxsynth",
		destination: io.stderr,
	});

	if (!args.ok) {
		reportUsageError(io.stderr, args.error);
		return ExitCode.Usage;
	}
	if (args.value.help) {
		io.stdout.write(USAGE);
		return ExitCode.Success;
	}

	const loaded = loadConfigFrom(paramsFromEnv(io.env), args.value.params);
	if (!loaded.ok) {
		reportUsageError(io.stderr, loaded.error);
		return ExitCode.Usage;
	}
	const config = loaded.value;
	logger.debug(summarizeConfig(config), "configuration loaded");

	const generated = generateSeries(config.generation, { entropy: io.entropy });
	if (!generated.ok) {
		reportUsageError(io.stderr, generated.error);
		return ExitCode.Usage;
	}
	const series = generated.value;
	logger.debug({ steps: series.stepCount, intervalMs: series.intervalMs, seed: series.seed }, "series prepared");

	const opened = await openSink(config, io.stdout);
	if (!opened.ok) {
		logFailure(logger, opened.error);
		return ExitCode.Failure;
	}

	try {
		const records = await writeSeries(series, opened.value);
		logger.info(
			{ records, seed: series.seed, elapsedMs: clock.now() - startedAt, output: config.outputFile },
			"series written",
		);
		return ExitCode.Success;
	} catch (error: unknown) {
		logFailure(logger, error);
		return ExitCode.Failure;
	}
}
