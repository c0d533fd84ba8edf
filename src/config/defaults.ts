import { ParamName } from "./types.js";
import type { ParamValue } from "./types.js";

/** Values used for every parameter the caller leaves out. Seed has none. */
export const DEFAULT_PARAMS: Readonly<Partial<Record<ParamName, ParamValue>>> = {
	[ParamName.OutputFile]: "data.csv",
	[ParamName.StartDate]: "2020.01.01",
	[ParamName.EndDate]: "2020.01.31",
	[ParamName.StartPrice]: "1.00",
	[ParamName.EndPrice]: "2.00",
	[ParamName.Digits]: 5,
	[ParamName.Spread]: 10,
	[ParamName.Density]: 1,
	[ParamName.Pattern]: "none",
	[ParamName.Volatility]: "1.0",
	[ParamName.Header]: false,
	[ParamName.Delimiter]: ",",
};
