import { UsageError } from "./errors.js";
import type { CalendarDate, QueryWindow } from "./types.js";

export type RelativeRange = "today" | "tomorrow" | "week";

export type QueryRange = { kind: RelativeRange } | { kind: "date"; date: CalendarDate };

/** Weeks start on Monday (ISO 8601). */
const WEEK_START = 1;

const DATE_PATTERN = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;

/** setFullYear, since the Date constructor maps years 0-99 to 1900-1999. */
function localMidnight(date: CalendarDate, offsetDays = 0): Date {
	const midnight = new Date(2000, 0, 1);
	midnight.setFullYear(date.year, date.month - 1, date.day + offsetDays);
	return midnight;
}

export function toCalendarDate(instant: Date): CalendarDate {
	return { year: instant.getFullYear(), month: instant.getMonth() + 1, day: instant.getDate() };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
	return toCalendarDate(localMidnight(date, days));
}

/**
 * Parses YYYY-MM-DD or YYYY/MM/DD. Dates that do not exist (2026-02-30) are rejected
 * rather than rolled over.
 */
export function parseCalendarDate(input: string): CalendarDate {
	const match = DATE_PATTERN.exec(input.trim());
	if (!match) {
		throw new UsageError(`Invalid date '${input}'. Use YYYY-MM-DD or YYYY/MM/DD`);
	}
	const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
	const check = toCalendarDate(localMidnight(date));
	if (check.year !== date.year || check.month !== date.month || check.day !== date.day) {
		throw new UsageError(`Invalid date '${input}': no such day`);
	}
	return date;
}

/** [local midnight of date, local midnight of the next day) */
export function dayWindow(date: CalendarDate): QueryWindow {
	return { start: localMidnight(date), end: localMidnight(date, 1) };
}

/** [Monday 00:00, next Monday 00:00) of the week containing date. */
export function weekWindow(date: CalendarDate): QueryWindow {
	const weekday = localMidnight(date).getDay();
	const sinceStart = (weekday - WEEK_START + 7) % 7;
	return { start: localMidnight(date, -sinceStart), end: localMidnight(date, 7 - sinceStart) };
}

export function resolveWindow(range: QueryRange, now: Date): QueryWindow {
	const today = toCalendarDate(now);
	switch (range.kind) {
		case "today":
			return dayWindow(today);
		case "tomorrow":
			return dayWindow(addDays(today, 1));
		case "week":
			return weekWindow(today);
		case "date":
			return dayWindow(range.date);
	}
}
