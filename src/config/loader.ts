/**
 * Configuration loader: raw parameters from flags, environment or code into a RunConfig.
 *
 * Names are matched case-insensitively, values may be strings or numbers,
 * and anything missing falls back to DEFAULT_PARAMS. The generation part is
 * then held to the same checks generateSeries() applies.
 */

import { validate, z } from "../lib/validation/index.js";
import { formatCalendarDate, parseCalendarDate } from "../shared/calendar.js";
import {
	type ConfigIssue,
	type ConfigurationError,
	InvalidConfigurationError,
	UnsupportedPatternError,
} from "../shared/errors.js";
import { err, map, mapErr } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { PATTERNS, isPattern } from "../series/types.js";
import type { GenerationConfig } from "../series/types.js";
import { validateGenerationConfig } from "../series/validate.js";
import { DEFAULT_PARAMS } from "./defaults.js";
import { ParamName, STDOUT_PATH } from "./types.js";
import type { ParamValue, RawParams, RunConfig } from "./types.js";

const NAMES_BY_KEY: ReadonlyMap<string, ParamName> = new Map(
	Object.values(ParamName).map((name) => [name.toLowerCase(), name]),
);

const GENERATION_FIELDS: Readonly<Record<keyof GenerationConfig, ParamName>> = {
	startDate: ParamName.StartDate,
	endDate: ParamName.EndDate,
	startPrice: ParamName.StartPrice,
	endPrice: ParamName.EndPrice,
	digits: ParamName.Digits,
	spreadPoints: ParamName.Spread,
	densityPerMinute: ParamName.Density,
	pattern: ParamName.Pattern,
	volatility: ParamName.Volatility,
	seed: ParamName.Seed,
};

const PARAMS_BY_FIELD: ReadonlyMap<string, ParamName> = new Map(Object.entries(GENERATION_FIELDS));

const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_WORDS: ReadonlySet<string> = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS: ReadonlySet<string> = new Set(["false", "0", "no", "off"]);

// ── Field schemas ────────────────────────────────────────────────────

const numeric = z.union([z.number(), z.string()]).transform((value, ctx) => {
	const text = typeof value === "string" ? value.trim() : undefined;
	const parsed = text === undefined ? value : DECIMAL_NUMBER.test(text) ? Number(text) : Number.NaN;
	if (Number.isNaN(parsed)) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${value}"` });
		return z.NEVER;
	}
	return parsed;
});

const date = z.string().transform((value, ctx) => {
	const parsed = parseCalendarDate(value);
	if (parsed === undefined) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `expected an existing date as yyyy.mm.dd, got "${value}"`,
		});
		return z.NEVER;
	}
	return parsed;
});

const flag = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
	if (typeof value === "boolean") return value;
	const word = value.trim().toLowerCase();
	if (TRUE_WORDS.has(word)) return true;
	if (FALSE_WORDS.has(word)) return false;
	ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${value}"` });
	return z.NEVER;
});

const patternName = z.string().transform((value, ctx) => {
	const name = value.trim().toLowerCase();
	if (isPattern(name)) return name;
	ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported pattern "${value}"` });
	return z.NEVER;
});

const rawParamsSchema = z.object({
	[ParamName.OutputFile]: z.string().trim().min(1, "must not be empty"),
	[ParamName.StartDate]: date,
	[ParamName.EndDate]: date,
	[ParamName.StartPrice]: numeric,
	[ParamName.EndPrice]: numeric,
	[ParamName.Digits]: numeric,
	[ParamName.Spread]: numeric,
	[ParamName.Density]: numeric,
	[ParamName.Pattern]: patternName,
	[ParamName.Volatility]: numeric,
	[ParamName.Seed]: numeric.optional(),
	[ParamName.Header]: flag,
	[ParamName.Delimiter]: z
		.string()
		.length(1, "must be a single character")
		.refine((c) => c !== "\n" && c !== "\r" && c !== '"', "must not be a quote or line break"),
});

type ParsedParams = z.output<typeof rawParamsSchema>;

// ── Loading ──────────────────────────────────────────────────────────

/**
 * Merge parameter sources; later sources win. Names are canonicalized, so
 * `digits` in one source overrides `Digits` in an earlier one. Unknown names
 * are kept verbatim for loadConfig() to report.
 */
export function mergeParams(...sources: readonly RawParams[]): RawParams {
	const merged: Record<string, ParamValue> = {};
	for (const source of sources) {
		for (const [key, value] of Object.entries(source)) {
			if (value === undefined) continue;
			merged[NAMES_BY_KEY.get(key.toLowerCase()) ?? key] = value;
		}
	}
	return merged;
}

function unknownParamIssues(params: RawParams): ConfigIssue[] {
	return Object.keys(params)
		.filter((key) => !NAMES_BY_KEY.has(key.toLowerCase()))
		.map((key) => ({ path: [key], message: "unknown parameter" }));
}

function toGenerationConfig(parsed: ParsedParams): GenerationConfig {
	return {
		startDate: parsed.StartDate,
		endDate: parsed.EndDate,
		startPrice: parsed.StartPrice,
		endPrice: parsed.EndPrice,
		digits: parsed.Digits,
		spreadPoints: parsed.Spread,
		densityPerMinute: parsed.Density,
		pattern: parsed.Pattern,
		volatility: parsed.Volatility,
		seed: parsed.Seed,
	};
}

/** Report generation issues under the parameter names the caller used. */
function renameIssues(error: ConfigurationError): ConfigurationError {
	if (!(error instanceof InvalidConfigurationError)) return error;
	const issues = error.issues.map((issue) => {
		const [field, ...rest] = issue.path;
		const name = typeof field === "string" ? PARAMS_BY_FIELD.get(field) : undefined;
		return name === undefined ? issue : { ...issue, path: [name, ...rest] };
	});
	return new InvalidConfigurationError("Invalid configuration", issues);
}

/**
 * Build a RunConfig from raw parameters, filling gaps from DEFAULT_PARAMS.
 * An unsupported pattern is reported on its own; every other problem is
 * collected into one InvalidConfigurationError.
 */
export function loadConfig(params: RawParams = {}): Result<RunConfig, ConfigurationError> {
	const merged = mergeParams(DEFAULT_PARAMS, params);

	const pattern = merged[ParamName.Pattern];
	if (typeof pattern === "string" && !isPattern(pattern.trim().toLowerCase())) {
		return err(new UnsupportedPatternError(pattern, PATTERNS));
	}

	const unknown = unknownParamIssues(merged);
	const parsed = validate(rawParamsSchema, merged);
	if (!parsed.ok || unknown.length > 0) {
		const issues = [...unknown, ...(parsed.ok ? [] : parsed.error.issues)];
		return err(new InvalidConfigurationError("Invalid configuration", issues));
	}

	const values = parsed.value;
	const generation = mapErr(validateGenerationConfig(toGenerationConfig(values)), renameIssues);
	return map(generation, (valid) => ({
		outputFile: values.OutputFile,
		header: values.Header,
		delimiter: values.Delimiter,
		generation: valid,
	}));
}

/** loadConfig() over several sources, later ones taking precedence. */
export function loadConfigFrom(...sources: readonly RawParams[]): Result<RunConfig, ConfigurationError> {
	return loadConfig(mergeParams(...sources));
}

/** Plain-object view of a RunConfig for logs. */
export function summarizeConfig(config: RunConfig): Record<string, string | number | boolean> {
	const g = config.generation;
	return {
		output: config.outputFile === STDOUT_PATH ? "stdout" : config.outputFile,
		startDate: formatCalendarDate(g.startDate),
		endDate: formatCalendarDate(g.endDate),
		startPrice: g.startPrice,
		endPrice: g.endPrice,
		digits: g.digits,
		spread: g.spreadPoints,
		density: g.densityPerMinute,
		pattern: g.pattern,
		volatility: g.volatility,
	};
}
