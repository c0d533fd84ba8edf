/**
 * SynthError hierarchy: structured error classification.
 *
 * Every error carries a category (usage, io, internal) which the CLI maps to
 * an exit code. Nothing in the engine is retried: configuration errors are
 * detected before the first record is produced.
 */

/** Error categories that drive how the boundary reports a failure. */
export const ErrorCategory = {
	Usage: "usage",
	Io: "io",
	Internal: "internal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing SynthError subclasses with optional cause chain. */
interface SynthErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all generation and output failures. */
export class SynthError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "SynthError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isUsageError(): boolean {
		return this.category === ErrorCategory.Usage;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A single configuration problem with the path to the offending field. */
export interface ConfigIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Usage error for configuration values that violate the generation invariants. */
export class InvalidConfigurationError extends SynthError {
	readonly issues: readonly ConfigIssue[];

	constructor(
		message: string,
		issues: readonly ConfigIssue[] = [],
		context: Record<string, unknown> & SynthErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(message, "INVALID_CONFIGURATION", ErrorCategory.Usage, rest);
		this.name = "InvalidConfigurationError";
		this.issues = issues;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			issues: this.issues,
		};
	}
}

/** Usage error for a pattern name outside the supported set. */
export class UnsupportedPatternError extends SynthError {
	readonly pattern: string;
	readonly supported: readonly string[];

	constructor(pattern: string, supported: readonly string[]) {
		super(
			`Unsupported pattern "${pattern}"`,
			"UNSUPPORTED_PATTERN",
			ErrorCategory.Usage,
			{ pattern },
			`Expected one of: ${supported.join(", ")}`,
		);
		this.name = "UnsupportedPatternError";
		this.pattern = pattern;
		this.supported = supported;
	}
}

/** I/O error raised while opening or writing the output. */
export class OutputError extends SynthError {
	constructor(message: string, context: Record<string, unknown> & SynthErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "OUTPUT_ERROR", ErrorCategory.Io, rest);
		this.name = "OutputError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Internal error for unexpected failures. */
export class SystemError extends SynthError {
	constructor(message: string, context: Record<string, unknown> & SynthErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Internal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Errors the configuration layer and the generator can report. */
export type ConfigurationError = InvalidConfigurationError | UnsupportedPatternError;

// ── Classification helper ────────────────────────────────────────────

const IO_ERROR_CODES: ReadonlySet<string> = new Set([
	"ENOENT",
	"EACCES",
	"EPERM",
	"EISDIR",
	"ENOTDIR",
	"ENOSPC",
	"EROFS",
	"EMFILE",
	"EPIPE",
	"EEXIST",
]);

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

/** Classify an unknown error into the appropriate SynthError subtype by inspecting its errno code. */
export function classifyError(error: unknown): SynthError {
	if (error instanceof SynthError) return error;
	if (isNodeError(error) && error.code !== undefined && IO_ERROR_CODES.has(error.code)) {
		return new OutputError(error.message, { cause: error, errno: error.code });
	}
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for InvalidConfigurationError. */
export function isInvalidConfiguration(e: unknown): e is InvalidConfigurationError {
	return e instanceof InvalidConfigurationError;
}

/** Type guard for UnsupportedPatternError. */
export function isUnsupportedPattern(e: unknown): e is UnsupportedPatternError {
	return e instanceof UnsupportedPatternError;
}

/** Type guard for OutputError. */
export function isOutputError(e: unknown): e is OutputError {
	return e instanceof OutputError;
}

/** Type guard for SystemError. */
export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
