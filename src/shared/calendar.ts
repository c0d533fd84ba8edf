/**
 * Calendar dates and timestamp rendering.
 *
 * All arithmetic is UTC: a CalendarDate denotes the whole day starting at
 * 00:00:00.000Z, and timestamps are epoch milliseconds.
 */

import { Duration } from "./time.js";

/** A day in the proleptic Gregorian calendar. */
export interface CalendarDate {
	readonly year: number;
	readonly month: number;
	readonly day: number;
}

const DATE_PATTERN = /^(\d{4})\.(\d{1,2})\.(\d{1,2})$/;

/** Create a CalendarDate, or undefined when the day does not exist. */
export function calendarDate(year: number, month: number, day: number): CalendarDate | undefined {
	if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
		return undefined;
	}
	if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
		return undefined;
	}
	const probe = new Date(0);
	probe.setUTCFullYear(year, month - 1, day);
	if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
		return undefined;
	}
	return { year, month, day };
}

/** Parse `yyyy.mm.dd` (one- or two-digit month and day). */
export function parseCalendarDate(text: string): CalendarDate | undefined {
	const match = DATE_PATTERN.exec(text.trim());
	if (!match) return undefined;
	const [, year, month, day] = match;
	return calendarDate(Number(year), Number(month), Number(day));
}

/** Epoch milliseconds of 00:00:00.000Z on the given day. */
export function startOfDayMs(date: CalendarDate): number {
	const d = new Date(0);
	d.setUTCFullYear(date.year, date.month - 1, date.day);
	d.setUTCHours(0, 0, 0, 0);
	return d.getTime();
}

/** Number of days in the inclusive range; 0 when `end` precedes `start`. */
export function daysInclusive(start: CalendarDate, end: CalendarDate): number {
	const days = Math.round((startOfDayMs(end) - startOfDayMs(start)) / Duration.days(1)) + 1;
	return Math.max(0, days);
}

/** Negative, zero or positive as `a` is before, equal to or after `b`. */
export function compareDates(a: CalendarDate, b: CalendarDate): number {
	return startOfDayMs(a) - startOfDayMs(b);
}

function pad(n: number, width = 2): string {
	return String(n).padStart(width, "0");
}

/** Render a date as `yyyy.mm.dd`. */
export function formatCalendarDate(date: CalendarDate): string {
	return `${pad(date.year, 4)}.${pad(date.month)}.${pad(date.day)}`;
}

/** Render epoch milliseconds as `YYYY.MM.DD HH:MM:SS.mmm` in UTC. */
export function formatTimestamp(timestampMs: number): string {
	const d = new Date(timestampMs);
	const date = `${pad(d.getUTCFullYear(), 4)}.${pad(d.getUTCMonth() + 1)}.${pad(d.getUTCDate())}`;
	const time = `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
	return `${date} ${time}.${pad(d.getUTCMilliseconds(), 3)}`;
}
