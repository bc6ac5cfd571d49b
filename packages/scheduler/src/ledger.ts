/**
 * The slot ledger: every booking of the auditorium, grouped by date.
 */

import { randomUUID } from 'node:crypto';
import {
	intervalContains,
	isCalendarDate,
	isExistingLocalTime,
	isLocalTime,
	minutesOfDay,
	toInterval,
} from '@slotkeeper/core';
import { resolveConflict } from './resolver.js';
import type {
	AddResult,
	Booking,
	BookingId,
	BookingRecord,
	CalendarDate,
	LedgerEntry,
	LedgerSnapshot,
	RemoveResult,
	RestoreReport,
	UserId,
} from './types.js';

export interface SlotLedgerOptions {
	/** Timezone used to rebuild intervals when restoring; defaults to "UTC" */
	timezone?: string;
	generateId?: () => BookingId;
}

const NO_BOOKINGS: readonly Booking[] = Object.freeze([]);

/**
 * Index at which a booking starting at `start` keeps `bookings` sorted.
 */
function insertionIndex(bookings: readonly Booking[], start: Date): number {
	let low = 0;
	let high = bookings.length;
	while (low < high) {
		const mid = (low + high) >>> 1;
		if (bookings[mid].interval.start < start) {
			low = mid + 1;
		} else {
			high = mid;
		}
	}
	return low;
}

function freezeBooking(booking: Booking): Booking {
	return Object.freeze({
		...booking,
		interval: Object.freeze({
			start: new Date(booking.interval.start.getTime()),
			end: new Date(booking.interval.end.getTime()),
		}),
	});
}

function toRecord(booking: Booking): BookingRecord {
	return {
		bookingId: booking.id,
		userId: booking.userId,
		date: booking.date,
		start: booking.start,
		end: booking.end,
		label: booking.label,
	};
}

/**
 * Create an empty ledger.
 *
 * Per-date arrays are replaced, never mutated, so a sequence returned by
 * {@link listForDate} keeps describing the moment it was taken.
 */
export function createSlotLedger(options: SlotLedgerOptions = {}) {
	const { timezone = 'UTC', generateId = () => randomUUID() } = options;

	const byDate = new Map<CalendarDate, readonly Booking[]>();
	const byId = new Map<BookingId, Booking>();
	let dirty = false;

	function insert(booking: Booking): void {
		const current = byDate.get(booking.date) ?? NO_BOOKINGS;
		const index = insertionIndex(current, booking.interval.start);
		byDate.set(booking.date, Object.freeze([...current.slice(0, index), booking, ...current.slice(index)]));
		byId.set(booking.id, booking);
	}

	/**
	 * Bookings on a date, sorted by start time.
	 * The sequence is lazy and may be iterated any number of times.
	 */
	function listForDate(date: CalendarDate): Iterable<Booking> {
		const bookings = byDate.get(date) ?? NO_BOOKINGS;
		return {
			*[Symbol.iterator]() {
				yield* bookings;
			},
		};
	}

	/**
	 * Insert a booking unless it overlaps one already on its date.
	 */
	function add(entry: LedgerEntry): AddResult {
		if (!(entry.interval.start < entry.interval.end)) {
			throw new RangeError(`Empty or inverted interval for ${entry.date} ${entry.start}-${entry.end}`);
		}

		const decision = resolveConflict(listForDate(entry.date), entry.interval);
		if (decision.decision === 'reject') {
			return { ok: false, error: { kind: 'conflict', conflict: decision.conflict } };
		}

		const booking = freezeBooking({
			id: generateId(),
			userId: entry.userId,
			date: entry.date,
			start: entry.start,
			end: entry.end,
			label: entry.label,
			interval: entry.interval,
		});
		if (byId.has(booking.id)) {
			throw new Error(`Duplicate booking ID generated: ${booking.id}`);
		}

		insert(booking);
		dirty = true;
		return { ok: true, booking };
	}

	/**
	 * Remove a booking on behalf of its owner or an administrator.
	 */
	function remove(bookingId: BookingId, requesterId: UserId, requesterIsAdmin: boolean): RemoveResult {
		const booking = byId.get(bookingId);
		if (!booking) {
			return { ok: false, error: { kind: 'not-found' } };
		}
		if (booking.userId !== requesterId && !requesterIsAdmin) {
			return { ok: false, error: { kind: 'forbidden' } };
		}

		const remaining = (byDate.get(booking.date) ?? NO_BOOKINGS).filter((b) => b.id !== bookingId);
		if (remaining.length === 0) {
			byDate.delete(booking.date);
		} else {
			byDate.set(booking.date, Object.freeze(remaining));
		}
		byId.delete(bookingId);
		dirty = true;
		return { ok: true, booking };
	}

	function find(bookingId: BookingId): Booking | undefined {
		return byId.get(bookingId);
	}

	/**
	 * The booking on `date` whose interval contains `instant`.
	 */
	function findAt(date: CalendarDate, instant: Date): Booking | undefined {
		for (const booking of listForDate(date)) {
			if (booking.interval.start > instant) break;
			if (intervalContains(booking.interval, instant)) return booking;
		}
		return undefined;
	}

	/**
	 * Dates holding at least one booking, ascending.
	 */
	function dates(): CalendarDate[] {
		return [...byDate.keys()].sort();
	}

	/**
	 * All bookings as records, by date then start time.
	 */
	function snapshot(): LedgerSnapshot {
		return {
			bookings: dates().flatMap((date) => (byDate.get(date) ?? NO_BOOKINGS).map(toRecord)),
		};
	}

	/**
	 * Replace all bookings with a snapshot's.
	 *
	 * Records are taken in order; one that is malformed, reuses an ID, or
	 * overlaps an earlier record is skipped and reported. The ledger is clean
	 * afterwards.
	 */
	function restore(state: LedgerSnapshot): RestoreReport {
		byDate.clear();
		byId.clear();
		const report: RestoreReport = { restored: 0, rejected: [] };

		for (const record of state.bookings) {
			const reason = checkRecord(record);
			if (reason) {
				report.rejected.push({ record, reason });
				continue;
			}

			const interval = toInterval(record.date, { start: record.start, end: record.end }, timezone);
			const decision = resolveConflict(listForDate(record.date), interval);
			if (decision.decision === 'reject') {
				report.rejected.push({ record, reason: `Overlaps booking ${decision.conflict.id}` });
				continue;
			}

			insert(
				freezeBooking({
					id: record.bookingId,
					userId: record.userId,
					date: record.date,
					start: record.start,
					end: record.end,
					label: record.label,
					interval,
				})
			);
			report.restored++;
		}

		dirty = false;
		return report;
	}

	function checkRecord(record: BookingRecord): string | null {
		if (record.bookingId.length === 0) return 'Missing booking ID';
		if (byId.has(record.bookingId)) return `Duplicate booking ID ${record.bookingId}`;
		if (!Number.isSafeInteger(record.userId)) return `Invalid user ID ${record.userId}`;
		if (!isCalendarDate(record.date)) return `Invalid date ${record.date}`;
		if (!isLocalTime(record.start) || !isLocalTime(record.end, { allowEndOfDay: true })) {
			return `Invalid time range ${record.start}-${record.end}`;
		}
		if (minutesOfDay(record.end) <= minutesOfDay(record.start)) {
			return `Empty or inverted time range ${record.start}-${record.end}`;
		}
		for (const time of [record.start, record.end]) {
			if (!isExistingLocalTime(record.date, time, timezone)) {
				return `Time ${time} does not exist on ${record.date} in ${timezone}`;
			}
		}
		return null;
	}

	return {
		listForDate,
		add,
		remove,
		find,
		findAt,
		dates,
		snapshot,
		restore,
		get size() {
			return byId.size;
		},
		isDirty: () => dirty,
		markClean: () => {
			dirty = false;
		},
		markDirty: () => {
			dirty = true;
		},
	};
}

// ============================================================================
// Export type for the slot ledger
// ============================================================================

export type SlotLedger = ReturnType<typeof createSlotLedger>;
