/**
 * Shared time primitives for Slotkeeper packages.
 * All intervals are half-open: [start, end)
 */

/**
 * A half-open interval [start, end).
 * All times are UTC internally.
 */
export interface Interval {
	/** The start of the interval (inclusive) */
	start: Date;
	/** The end of the interval (exclusive) */
	end: Date;
}

/**
 * A calendar date string in YYYY-MM-DD format, read in the auditorium's timezone.
 *
 * @example "2024-05-01"
 */
export type CalendarDate = string;

/**
 * A local time string in HH:MM format (24-hour).
 * "24:00" is only meaningful as the end of a day.
 *
 * @example "09:00", "17:30", "24:00"
 */
export type LocalTime = string;

/**
 * Externally assigned numeric identity of a chat user (or a group chat, when negative).
 */
export type UserId = number;

/**
 * A local-time window within a single calendar date.
 */
export interface LocalTimeRange {
	start: LocalTime;
	end: LocalTime;
}
