import { describe, expect, it } from "vitest";
import {
	calendarDate,
	compareDates,
	daysInclusive,
	formatCalendarDate,
	formatTimestamp,
	parseCalendarDate,
	startOfDayMs,
} from "./calendar.js";

describe("calendar", () => {
	describe("calendarDate", () => {
		it("accepts existing days", () => {
			expect(calendarDate(2020, 2, 29)).toEqual({ year: 2020, month: 2, day: 29 });
			expect(calendarDate(2020, 12, 31)).toEqual({ year: 2020, month: 12, day: 31 });
		});

		it("rejects days that do not exist", () => {
			expect(calendarDate(2021, 2, 29)).toBeUndefined();
			expect(calendarDate(2020, 4, 31)).toBeUndefined();
			expect(calendarDate(2020, 13, 1)).toBeUndefined();
			expect(calendarDate(2020, 0, 1)).toBeUndefined();
			expect(calendarDate(2020, 1, 0)).toBeUndefined();
			expect(calendarDate(2020.5, 1, 1)).toBeUndefined();
		});
	});

	describe("parseCalendarDate", () => {
		it("parses yyyy.mm.dd", () => {
			expect(parseCalendarDate("2020.01.31")).toEqual({ year: 2020, month: 1, day: 31 });
		});

		it("accepts single-digit month and day", () => {
			expect(parseCalendarDate("2014.1.5")).toEqual({ year: 2014, month: 1, day: 5 });
		});

		it("rejects other layouts", () => {
			expect(parseCalendarDate("2020-01-01")).toBeUndefined();
			expect(parseCalendarDate("01.01.2020")).toBeUndefined();
			expect(parseCalendarDate("2020.01")).toBeUndefined();
			expect(parseCalendarDate("")).toBeUndefined();
		});

		it("rejects impossible dates", () => {
			expect(parseCalendarDate("2020.02.30")).toBeUndefined();
		});
	});

	describe("startOfDayMs", () => {
		it("is UTC midnight", () => {
			expect(startOfDayMs({ year: 2020, month: 1, day: 1 })).toBe(Date.UTC(2020, 0, 1));
			expect(startOfDayMs({ year: 1970, month: 1, day: 1 })).toBe(0);
		});
	});

	describe("daysInclusive", () => {
		it("counts both ends", () => {
			const jan1 = { year: 2020, month: 1, day: 1 };
			expect(daysInclusive(jan1, jan1)).toBe(1);
			expect(daysInclusive(jan1, { year: 2020, month: 1, day: 31 })).toBe(31);
			expect(daysInclusive(jan1, { year: 2021, month: 1, day: 1 })).toBe(367);
		});

		it("is zero for a reversed range", () => {
			expect(daysInclusive({ year: 2020, month: 1, day: 2 }, { year: 2020, month: 1, day: 1 })).toBe(0);
		});
	});

	describe("compareDates", () => {
		it("orders dates", () => {
			const a = { year: 2020, month: 1, day: 1 };
			const b = { year: 2020, month: 1, day: 2 };
			expect(compareDates(a, b)).toBeLessThan(0);
			expect(compareDates(b, a)).toBeGreaterThan(0);
			expect(compareDates(a, { ...a })).toBe(0);
		});
	});

	describe("formatting", () => {
		it("formats dates with zero padding", () => {
			expect(formatCalendarDate({ year: 2014, month: 1, day: 5 })).toBe("2014.01.05");
		});

		it("formats timestamps to the millisecond in UTC", () => {
			expect(formatTimestamp(Date.UTC(2020, 0, 1, 0, 0, 0, 0))).toBe("2020.01.01 00:00:00.000");
			expect(formatTimestamp(Date.UTC(2020, 11, 31, 23, 59, 30, 250))).toBe(
				"2020.12.31 23:59:30.250",
			);
		});
	});
});
