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
} from "./result.js";

export {
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
} from "./errors.js";

export { Decimal, MAX_DECIMAL_PLACES } from "./decimal.js";
export { type Clock, SystemClock, FakeClock, Duration } from "./time.js";
export {
	type CalendarDate,
	calendarDate,
	parseCalendarDate,
	startOfDayMs,
	daysInclusive,
	compareDates,
	formatCalendarDate,
	formatTimestamp,
} from "./calendar.js";
