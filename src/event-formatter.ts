import { Chalk, type ChalkInstance } from "chalk";
import type { calendar_v3 } from "googleapis";
import type { CalendarEvent } from "./types.js";

export const NO_EVENTS = "No events found.";

export type EventState = "past" | "in-progress" | "upcoming";

export interface FormatOptions {
	now: Date;
	color?: boolean;
}

interface EventTimes {
	start: Date;
	end: Date;
	allDay: boolean;
}

const chalk = new Chalk({ level: 1 });

const STATE_STYLES: Record<EventState, ChalkInstance> = {
	past: chalk.gray,
	"in-progress": chalk.bold.green,
	upcoming: chalk.white,
};

const pad = (n: number) => String(n).padStart(2, "0");

function formatDate(d: Date): string {
	return `${d.getFullYear()}/${pad(d.getMonth() + 1)}/${pad(d.getDate())}`;
}

function formatDateTime(d: Date): string {
	return `${formatDate(d)} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

/** All-day values are plain dates; read them as local midnight, not UTC. */
function parseEventTime(time: calendar_v3.Schema$EventDateTime | undefined): { at: Date; allDay: boolean } | null {
	if (time?.dateTime) {
		const at = new Date(time.dateTime);
		return Number.isNaN(at.getTime()) ? null : { at, allDay: false };
	}
	const match = time?.date ? /^(\d{4})-(\d{2})-(\d{2})$/.exec(time.date) : null;
	if (!match) return null;
	return { at: new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3])), allDay: true };
}

export function eventTimes(event: CalendarEvent): EventTimes | null {
	const start = parseEventTime(event.start);
	const end = parseEventTime(event.end);
	if (!start || !end) return null;
	return { start: start.at, end: end.at, allDay: start.allDay || end.allDay };
}

export function timeSpan({ start, end, allDay }: EventTimes): string {
	if (!allDay) return `${formatDateTime(start)} ~ ${formatDateTime(end)}`;
	// the API's all-day end date is exclusive
	const lastDay = new Date(end.getFullYear(), end.getMonth(), end.getDate() - 1);
	if (lastDay <= start) return `${formatDate(start)} (all day)`;
	return `${formatDate(start)} ~ ${formatDate(lastDay)} (all day)`;
}

export function eventState({ start, end }: EventTimes, now: Date): EventState {
	if (end <= now) return "past";
	if (start <= now) return "in-progress";
	return "upcoming";
}

export function legend(): string {
	return [
		`${STATE_STYLES.past("■")} Past`,
		`${STATE_STYLES["in-progress"]("■")} In progress`,
		`${STATE_STYLES.upcoming("■")} Upcoming`,
	].join("  ");
}

/**
 * One line per event, in the order given. Colors depend on options.now only, so the
 * result is a function of the arguments.
 */
export function formatEvents(events: readonly CalendarEvent[], options: FormatOptions): string[] {
	if (events.length === 0) return [NO_EVENTS];

	const lines = options.color ? [legend()] : [];
	for (const event of events) {
		const title = event.summary || "(no title)";
		const times = eventTimes(event);
		if (!times) {
			lines.push(`(unknown time)  ${title}`);
			continue;
		}
		const line = `${timeSpan(times)}  ${title}`;
		lines.push(options.color ? STATE_STYLES[eventState(times, options.now)](line) : line);
	}
	return lines;
}
