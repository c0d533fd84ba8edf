/**
 * Environment overrides.
 *
 * Supported: FXSYNTH_OUTPUT_FILE, FXSYNTH_START_DATE, FXSYNTH_END_DATE,
 * FXSYNTH_START_PRICE, FXSYNTH_END_PRICE, FXSYNTH_DIGITS, FXSYNTH_SPREAD,
 * FXSYNTH_DENSITY, FXSYNTH_PATTERN, FXSYNTH_VOLATILITY, FXSYNTH_SEED,
 * FXSYNTH_HEADER, FXSYNTH_DELIMITER and FXSYNTH_LOG_LEVEL.
 * Values are passed through as strings; loadConfig() parses them.
 */

import { type LogLevel, isLogLevel } from "../lib/logger/index.js";
import { ParamName } from "./types.js";
import type { RawParams } from "./types.js";

export const ENV_PREFIX = "FXSYNTH_";

const ENV_PARAMS: ReadonlyArray<readonly [string, ParamName]> = [
	["FXSYNTH_OUTPUT_FILE", ParamName.OutputFile],
	["FXSYNTH_START_DATE", ParamName.StartDate],
	["FXSYNTH_END_DATE", ParamName.EndDate],
	["FXSYNTH_START_PRICE", ParamName.StartPrice],
	["FXSYNTH_END_PRICE", ParamName.EndPrice],
	["FXSYNTH_DIGITS", ParamName.Digits],
	["FXSYNTH_SPREAD", ParamName.Spread],
	["FXSYNTH_DENSITY", ParamName.Density],
	["FXSYNTH_PATTERN", ParamName.Pattern],
	["FXSYNTH_VOLATILITY", ParamName.Volatility],
	["FXSYNTH_SEED", ParamName.Seed],
	["FXSYNTH_HEADER", ParamName.Header],
	["FXSYNTH_DELIMITER", ParamName.Delimiter],
];

/** Collect generation parameters from FXSYNTH_* variables. Empty variables are skipped. */
export function paramsFromEnv(env: NodeJS.ProcessEnv = process.env): RawParams {
	const params: Record<string, string> = {};
	for (const [variable, name] of ENV_PARAMS) {
		const value = env[variable];
		if (value) {
			params[name] = value;
		}
	}
	return params;
}

/** FXSYNTH_LOG_LEVEL when it names a known level. */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
	const raw = env[`${ENV_PREFIX}LOG_LEVEL`]?.trim().toLowerCase();
	return raw !== undefined && isLogLevel(raw) ? raw : undefined;
}
