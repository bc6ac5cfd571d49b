/**
 * Calendar primitives: parsing chat input into dates and times, and turning a
 * date plus local times into UTC intervals in the auditorium's timezone.
 */

import { addDays, eachDayOfInterval, format, isValid, parse } from 'date-fns';
import { formatInTimeZone, fromZonedTime, toZonedTime } from 'date-fns-tz';
import type { CalendarDate, Interval, LocalTime, LocalTimeRange } from './types.js';

const MINUTES_PER_DAY = 24 * 60;
export const END_OF_DAY: LocalTime = '24:00';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const LOCAL_TIME = /^(\d{2}):(\d{2})$/;
const TIME_INPUT = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Accepted date spellings, tried in order. Year-less forms take the reference year.
 */
const DATE_INPUT_FORMATS: { pattern: RegExp; format: string }[] = [
	{ pattern: /^\d{4}-\d{2}-\d{2}$/, format: 'yyyy-MM-dd' },
	{ pattern: /^\d{1,2}\.\d{1,2}\.\d{4}$/, format: 'd.M.yyyy' },
	{ pattern: /^\d{1,2}-\d{1,2}$/, format: 'M-d' },
	{ pattern: /^\d{1,2}\.\d{1,2}$/, format: 'd.M' },
];

// ============================================================================
// Validation
// ============================================================================

function parseIsoDate(date: CalendarDate): Date | null {
	if (!ISO_DATE.test(date)) return null;
	const parsed = parse(date, 'yyyy-MM-dd', new Date(0));
	return isValid(parsed) ? parsed : null;
}

/**
 * Check that a string is a real YYYY-MM-DD date (rejects 2024-02-30).
 */
export function isCalendarDate(value: string): value is CalendarDate {
	return parseIsoDate(value) !== null;
}

/**
 * Check that a string is an HH:MM time. "24:00" passes only with `allowEndOfDay`.
 */
export function isLocalTime(value: string, options: { allowEndOfDay?: boolean } = {}): value is LocalTime {
	if (value === END_OF_DAY) return options.allowEndOfDay === true;
	const match = LOCAL_TIME.exec(value);
	if (!match) return false;
	return Number(match[1]) < 24 && Number(match[2]) < 60;
}

// ============================================================================
// Local Time Arithmetic
// ============================================================================

/**
 * Minutes since local midnight. "24:00" is 1440.
 */
export function minutesOfDay(time: LocalTime): number {
	const [hours, minutes] = time.split(':').map(Number);
	return hours * 60 + minutes;
}

/**
 * Inverse of {@link minutesOfDay}.
 */
function formatMinutes(totalMinutes: number): LocalTime {
	const hours = Math.floor(totalMinutes / 60);
	const minutes = totalMinutes % 60;
	return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Shift a local time by a number of minutes within the same day.
 * Returns null when the result would leave [00:00, 24:00].
 */
export function addMinutes(time: LocalTime, minutes: number): LocalTime | null {
	const total = minutesOfDay(time) + minutes;
	if (total < 0 || total > MINUTES_PER_DAY) return null;
	return formatMinutes(total);
}

// ============================================================================
// Chat Input Parsing
// ============================================================================

/**
 * Parse a date typed by a user.
 *
 * Accepts `YYYY-MM-DD`, `DD.MM.YYYY`, `MM-DD` and `DD.MM`. The year-less forms
 * take the year of `reference` as seen in `timezone`.
 *
 * @returns The normalized date, or null when the input is not a real date
 *
 * @example
 * ```typescript
 * parseCalendarDate('01.05', new Date('2024-03-10T12:00:00Z')); // '2024-05-01'
 * parseCalendarDate('31.02.2024'); // null
 * ```
 */
export function parseCalendarDate(
	text: string,
	reference: Date = new Date(),
	timezone = 'UTC'
): CalendarDate | null {
	const input = text.trim();
	const referenceDate = toZonedTime(reference, timezone);

	for (const candidate of DATE_INPUT_FORMATS) {
		if (!candidate.pattern.test(input)) continue;
		const parsed = parse(input, candidate.format, referenceDate);
		if (isValid(parsed)) {
			return format(parsed, 'yyyy-MM-dd');
		}
	}

	return null;
}

/**
 * Parse a time typed by a user: `H:MM`, `HH:MM` or `HH:MM:SS` with zero seconds.
 *
 * @returns The time normalized to HH:MM, or null
 */
export function parseLocalTime(text: string): LocalTime | null {
	const match = TIME_INPUT.exec(text.trim());
	if (!match) return null;

	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	const seconds = match[3] === undefined ? 0 : Number(match[3]);
	if (hours > 23 || minutes > 59 || seconds !== 0) return null;

	return formatMinutes(hours * 60 + minutes);
}

/**
 * Parse a duration typed by a user: plain minutes (`90`) or `H:MM` (`1:30`).
 *
 * @returns Whole minutes, or null for malformed or non-positive input
 */
export function parseDurationMinutes(text: string): number | null {
	const input = text.trim();

	const plain = /^\d+$/.exec(input);
	if (plain) {
		const minutes = Number(input);
		return minutes > 0 ? minutes : null;
	}

	const split = /^(\d+):(\d{2})$/.exec(input);
	if (!split) return null;
	const minutes = Number(split[1]) * 60 + Number(split[2]);
	if (Number(split[2]) > 59 || minutes === 0) return null;
	return minutes;
}

// ============================================================================
// Zoned Conversion
// ============================================================================

/**
 * The date following `date`.
 */
export function nextCalendarDate(date: CalendarDate): CalendarDate {
	const parsed = parseIsoDate(date);
	if (!parsed) {
		throw new RangeError(`Invalid calendar date: ${date}`);
	}
	return format(addDays(parsed, 1), 'yyyy-MM-dd');
}

/**
 * Every date from `from` to `to`, both inclusive. Empty when `to` precedes `from`.
 */
export function eachCalendarDate(from: CalendarDate, to: CalendarDate): CalendarDate[] {
	const start = parseIsoDate(from);
	const end = parseIsoDate(to);
	if (!start || !end) {
		throw new RangeError(`Invalid calendar range: ${from}..${to}`);
	}
	if (end < start) return [];
	return eachDayOfInterval({ start, end }).map((day) => format(day, 'yyyy-MM-dd'));
}

/**
 * Convert a local date and time in `timezone` to a UTC instant.
 * "24:00" resolves to midnight at the start of the following date.
 */
export function zonedInstant(date: CalendarDate, time: LocalTime, timezone: string): Date {
	if (time === END_OF_DAY) {
		return fromZonedTime(`${nextCalendarDate(date)}T00:00:00`, timezone);
	}
	return fromZonedTime(`${date}T${time}:00`, timezone);
}

/**
 * Convert a local time range on a date to a UTC interval.
 *
 * @example
 * ```typescript
 * toInterval('2024-05-01', { start: '10:00', end: '11:00' }, 'Europe/Moscow');
 * // { start: 2024-05-01T07:00:00Z, end: 2024-05-01T08:00:00Z }
 * ```
 */
export function toInterval(date: CalendarDate, range: LocalTimeRange, timezone: string): Interval {
	return {
		start: zonedInstant(date, range.start, timezone),
		end: zonedInstant(date, range.end, timezone),
	};
}

/**
 * Whether a wall-clock time occurs on a date in `timezone`. Times skipped by
 * a daylight-saving jump do not. "24:00" stands for the next date's midnight.
 */
export function isExistingLocalTime(date: CalendarDate, time: LocalTime, timezone: string): boolean {
	const instant = zonedInstant(date, time, timezone);
	const [expectedDate, expectedTime] = time === END_OF_DAY ? [nextCalendarDate(date), '00:00'] : [date, time];
	return localDateOf(instant, timezone) === expectedDate && localTimeOf(instant, timezone) === expectedTime;
}

/**
 * The local calendar date of an instant.
 */
export function localDateOf(instant: Date, timezone: string): CalendarDate {
	return formatInTimeZone(instant, timezone, 'yyyy-MM-dd');
}

/**
 * The local wall-clock time of an instant, truncated to the minute.
 */
export function localTimeOf(instant: Date, timezone: string): LocalTime {
	return formatInTimeZone(instant, timezone, 'HH:mm');
}

// ============================================================================
// Interval Helpers
// ============================================================================

/**
 * Check if an interval contains a point in time.
 */
export function intervalContains(interval: Interval, time: Date): boolean {
	return time >= interval.start && time < interval.end;
}

/**
 * Check if two intervals overlap.
 * Intervals sharing only an endpoint do not overlap.
 */
export function intervalsOverlap(a: Interval, b: Interval): boolean {
	return a.start < b.end && b.start < a.end;
}
