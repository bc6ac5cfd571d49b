/**
 * Conflict resolution: is a requested slot well formed, and is it free?
 */

import {
	isCalendarDate,
	isExistingLocalTime,
	isLocalTime,
	minutesOfDay,
	toInterval,
	type Interval,
} from '@slotkeeper/core';
import type { Booking, ConflictDecision, SlotRequest, SlotValidation, ValidationReason } from './types.js';

const VALIDATION_MESSAGES: Record<ValidationReason, string> = {
	'malformed-date': 'Date must be a real calendar date in YYYY-MM-DD form.',
	'malformed-time': 'Times must be HH:MM; only the end may be 24:00.',
	'zero-length': 'A booking must last longer than zero minutes.',
	'non-chronological': 'The end time must come after the start time.',
	'off-grid': 'Start and end must fall on the booking grid.',
	'nonexistent-time': 'That time does not exist on this date; the clocks skip it.',
	'in-past': 'That time has already passed.',
};

export interface ValidateSlotOptions {
	timezone: string;
	/** Booking grid in minutes */
	slotMinutes: number;
	/** Requests starting at or before this instant are rejected */
	now?: Date;
}

function invalid(reason: ValidationReason, detail?: string): SlotValidation {
	const message = detail ? `${VALIDATION_MESSAGES[reason]} ${detail}` : VALIDATION_MESSAGES[reason];
	return { ok: false, error: { kind: 'validation', reason, message } };
}

/**
 * Check that a slot request describes a bookable interval.
 *
 * Checks run in order: date, times, zero length, chronology, grid,
 * daylight-saving gaps, past.
 * Nothing is silently corrected. No booking state is consulted, so the
 * result reveals nothing about the schedule.
 *
 * @returns The UTC interval of the slot, or the first failed check
 */
export function validateSlot(slot: SlotRequest, options: ValidateSlotOptions): SlotValidation {
	const { timezone, slotMinutes, now } = options;

	if (!isCalendarDate(slot.date)) {
		return invalid('malformed-date');
	}
	if (!isLocalTime(slot.start) || !isLocalTime(slot.end, { allowEndOfDay: true })) {
		return invalid('malformed-time');
	}

	const start = minutesOfDay(slot.start);
	const end = minutesOfDay(slot.end);
	if (start === end) {
		return invalid('zero-length');
	}
	if (end < start) {
		return invalid('non-chronological');
	}
	if (start % slotMinutes !== 0 || end % slotMinutes !== 0) {
		return invalid('off-grid', `The grid is ${slotMinutes} minutes.`);
	}

	if (!isExistingLocalTime(slot.date, slot.start, timezone) || !isExistingLocalTime(slot.date, slot.end, timezone)) {
		return invalid('nonexistent-time', `Timezone: ${timezone}.`);
	}

	const interval = toInterval(slot.date, { start: slot.start, end: slot.end }, timezone);
	if (now && interval.start <= now) {
		return invalid('in-past');
	}

	return { ok: true, interval };
}

/**
 * Decide whether `requested` fits among a date's bookings.
 *
 * `bookings` must be sorted by start and pairwise non-overlapping, as the
 * ledger keeps them. The scan stops at the first booking that starts at or
 * after the requested end.
 *
 * @returns accept, or reject with the earliest conflicting booking
 *
 * @example
 * ```typescript
 * resolveConflict(ledger.listForDate('2024-05-01'), {
 *   start: new Date('2024-05-01T10:30:00Z'),
 *   end: new Date('2024-05-01T11:30:00Z'),
 * });
 * // { decision: 'reject', conflict: <the 10:00-11:00 booking> }
 * ```
 */
export function resolveConflict(bookings: Iterable<Booking>, requested: Interval): ConflictDecision {
	for (const booking of bookings) {
		if (booking.interval.start >= requested.end) {
			break;
		}
		if (booking.interval.end > requested.start) {
			return { decision: 'reject', conflict: booking };
		}
	}
	return { decision: 'accept' };
}
