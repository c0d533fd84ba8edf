import type { GenerationConfig } from "../series/types.js";

/** `outputFile` value that selects standard output. */
export const STDOUT_PATH = "-";

/** Everything one invocation needs: where to write, how, and what to generate. */
export interface RunConfig {
	/** Destination path, or STDOUT_PATH. */
	readonly outputFile: string;
	/** Write a column header line before the first record. */
	readonly header: boolean;
	/** Single-character field separator. */
	readonly delimiter: string;
	readonly generation: GenerationConfig;
}

/** Parameter names as users write them; matched case-insensitively. */
export const ParamName = {
	OutputFile: "OutputFile",
	StartDate: "StartDate",
	EndDate: "EndDate",
	StartPrice: "StartPrice",
	EndPrice: "EndPrice",
	Digits: "Digits",
	Spread: "Spread",
	Density: "Density",
	Pattern: "Pattern",
	Volatility: "Volatility",
	Seed: "Seed",
	Header: "Header",
	Delimiter: "Delimiter",
} as const;

export type ParamName = (typeof ParamName)[keyof typeof ParamName];

export type ParamValue = string | number | boolean;

/** Unvalidated parameters from any source. Undefined values count as absent. */
export type RawParams = Readonly<Record<string, ParamValue | undefined>>;
