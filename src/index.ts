// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	isOk,
	isErr,
	Decimal,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	type CalendarDate,
	calendarDate,
	parseCalendarDate,
	formatCalendarDate,
	formatTimestamp,
	ErrorCategory,
	SynthError,
	InvalidConfigurationError,
	UnsupportedPatternError,
	OutputError,
	SystemError,
	type ConfigIssue,
	type ConfigurationError,
	classifyError,
	isInvalidConfiguration,
	isUnsupportedPattern,
	isOutputError,
	isSystemError,
} from "./shared/index.js";

// ── Series ───────────────────────────────────────────────────────────
export type { GenerationConfig, PriceRecord, PriceSeries, GenerateOptions } from "./series/index.js";
export {
	Pattern,
	PATTERNS,
	isPattern,
	generateSeries,
	countSteps,
	stepIntervalMs,
	stepOffsetMs,
	validateGenerationConfig,
	SeededRandom,
	entropySeed,
	quoteVolumes,
	MAX_DIGITS,
	MAX_DENSITY_PER_MINUTE,
} from "./series/index.js";

// ── Config ───────────────────────────────────────────────────────────
export type { ParamValue, RawParams, RunConfig } from "./config/index.js";
export {
	ParamName,
	STDOUT_PATH,
	DEFAULT_PARAMS,
	paramsFromEnv,
	loadConfig,
	loadConfigFrom,
	mergeParams,
	summarizeConfig,
} from "./config/index.js";

// ── Sink ─────────────────────────────────────────────────────────────
export type { RecordSink, FormatOptions, CsvSinkOptions } from "./sink/index.js";
export { CsvSink, MemorySink, writeSeries, formatHeader, formatRecord } from "./sink/index.js";

// ── CLI ──────────────────────────────────────────────────────────────
export { runCli, ExitCode } from "./cli/run.js";
export type { CliIo } from "./cli/run.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, z } from "./lib/validation/index.js";
