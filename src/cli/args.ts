/**
 * Command-line argument parsing.
 *
 * fxsynth [startDate] [endDate] [startPrice] [endPrice] [options]
 */

import { type ParseArgsConfig, parseArgs } from "node:util";
import { ParamName } from "../config/types.js";
import type { ParamValue, RawParams } from "../config/types.js";
import { InvalidConfigurationError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export const USAGE = `Usage: fxsynth [startDate] [endDate] [startPrice] [endPrice] [options]

Generate synthetic bid/ask price data as delimited text.

Arguments:
  startDate                  first day, yyyy.mm.dd (default 2020.01.01)
  endDate                    last day, inclusive (default 2020.01.31)
  startPrice                 bid at the first record (default 1.00)
  endPrice                   bid at the last record (default 2.00)

Options:
  -D, --digits <n>           decimal digits of prices (default 5)
  -s, --spread <points>      spread between bid and ask in points (default 10)
  -d, --density <n>          data points per minute (default 1)
  -p, --pattern <name>       none, curve, random, wave or zigzag (default none)
  -V, --volatility <x>       volatility factor (default 1.0)
  -o, --output-file <path>   output file, - for stdout (default data.csv)
      --seed <n>             seed for the random pattern
      --header               write a column header line
      --delimiter <c>        field delimiter (default ,)
  -v, --verbose              debug logging on stderr
  -h, --help                 show this help

Parameters can also be set through FXSYNTH_* variables, e.g. FXSYNTH_DIGITS=3.
FXSYNTH_LOG_LEVEL sets the log level when --verbose is absent.
`;

const OPTIONS = {
	digits: { type: "string", short: "D" },
	spread: { type: "string", short: "s" },
	density: { type: "string", short: "d" },
	pattern: { type: "string", short: "p" },
	volatility: { type: "string", short: "V" },
	"output-file": { type: "string", short: "o" },
	seed: { type: "string" },
	header: { type: "boolean" },
	delimiter: { type: "string" },
	verbose: { type: "boolean", short: "v" },
	help: { type: "boolean", short: "h" },
} as const satisfies ParseArgsConfig["options"];

const POSITIONALS = [ParamName.StartDate, ParamName.EndDate, ParamName.StartPrice, ParamName.EndPrice] as const;

export interface CliArgs {
	/** Only what the command line actually set. */
	readonly params: RawParams;
	readonly verbose: boolean;
	readonly help: boolean;
}

function isParseArgsError(error: unknown): error is Error & { code: string } {
	return (
		error instanceof TypeError &&
		"code" in error &&
		typeof error.code === "string" &&
		error.code.startsWith("ERR_PARSE_ARGS")
	);
}

function parse(argv: readonly string[]) {
	return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
}

/** Parse argv (without the node and script entries). */
export function parseCliArgs(argv: readonly string[]): Result<CliArgs, InvalidConfigurationError> {
	let parsed: ReturnType<typeof parse>;
	try {
		parsed = parse(argv);
	} catch (error: unknown) {
		if (isParseArgsError(error)) {
			return err(new InvalidConfigurationError(error.message));
		}
		throw error;
	}

	const { values, positionals } = parsed;
	if (positionals.length > POSITIONALS.length) {
		const extra = positionals.slice(POSITIONALS.length).join(" ");
		return err(new InvalidConfigurationError(`Unexpected arguments: ${extra}`));
	}

	const params: Record<string, ParamValue | undefined> = {
		[ParamName.Digits]: values.digits,
		[ParamName.Spread]: values.spread,
		[ParamName.Density]: values.density,
		[ParamName.Pattern]: values.pattern,
		[ParamName.Volatility]: values.volatility,
		[ParamName.OutputFile]: values["output-file"],
		[ParamName.Seed]: values.seed,
		[ParamName.Header]: values.header,
		[ParamName.Delimiter]: values.delimiter,
	};
	positionals.forEach((value, i) => {
		const name = POSITIONALS[i];
		if (name !== undefined) params[name] = value;
	});

	return ok({
		params: Object.fromEntries(Object.entries(params).filter(([, value]) => value !== undefined)),
		verbose: values.verbose ?? false,
		help: values.help ?? false,
	});
}
