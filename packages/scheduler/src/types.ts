/**
 * Scheduler Type Definitions
 *
 * Bookings of a single shared auditorium. A booking belongs to one calendar
 * date and covers a half-open local-time range [start, end) on it.
 * Local times are read in the auditorium's timezone and kept as UTC intervals.
 */

import type { AccessRegistry, BulkLoadReport, RoleSnapshot, UserProfile } from '@slotkeeper/access';
import type { CalendarDate, Interval, LocalTime, Logger, UserId } from '@slotkeeper/core';
import type { PersistenceError } from './errors.js';
import type { SlotLedger } from './ledger.js';

export type { CalendarDate, Interval, LocalTime, UserId };

// ============================================================================
// Bookings
// ============================================================================

/**
 * Opaque identifier of a booking.
 */
export type BookingId = string;

/**
 * An accepted reservation of the auditorium. Bookings are immutable.
 *
 * @example
 * const rehearsal: Booking = {
 *   id: 'b7c1…',
 *   userId: 1001,
 *   date: '2024-05-01',
 *   start: '10:00',
 *   end: '11:00',
 *   label: 'rehearsal',
 *   interval: { start: new Date('2024-05-01T10:00:00Z'), end: new Date('2024-05-01T11:00:00Z') },
 * };
 */
export interface Booking {
	readonly id: BookingId;
	/** Owner */
	readonly userId: UserId;
	readonly date: CalendarDate;
	/** Local start time (inclusive) */
	readonly start: LocalTime;
	/** Local end time (exclusive); "24:00" ends at midnight */
	readonly end: LocalTime;
	/** Free-text description; may be empty */
	readonly label: string;
	/** The same range as a UTC interval */
	readonly interval: Readonly<Interval>;
}

/**
 * A requested date and local-time range.
 */
export interface SlotRequest {
	date: CalendarDate;
	start: LocalTime;
	end: LocalTime;
}

/**
 * A structured booking request from the chat layer.
 */
export interface BookingRequest extends SlotRequest {
	userId: UserId;
	label?: string;
}

/**
 * A validated booking ready for insertion into the ledger.
 */
export interface LedgerEntry extends SlotRequest {
	userId: UserId;
	label: string;
	interval: Interval;
}

/**
 * A free local-time window on a date.
 */
export interface FreeSlot {
	start: LocalTime;
	end: LocalTime;
}

// ============================================================================
// Validation and Conflicts
// ============================================================================

/**
 * Why a requested slot is not a valid request (as opposed to a taken one).
 */
export type ValidationReason =
	| 'malformed-date'
	| 'malformed-time'
	| 'zero-length'
	| 'non-chronological'
	| 'off-grid'
	| 'nonexistent-time'
	| 'in-past';

export interface ValidationError {
	kind: 'validation';
	reason: ValidationReason;
	message: string;
}

/**
 * Result of validating a slot request.
 */
export type SlotValidation = { ok: true; interval: Interval } | { ok: false; error: ValidationError };

/**
 * Conflict resolver decision for a candidate interval.
 */
export type ConflictDecision = { decision: 'accept' } | { decision: 'reject'; conflict: Booking };

/**
 * Result of inserting into the ledger. Nothing changes on rejection.
 */
export type AddResult = { ok: true; booking: Booking } | { ok: false; error: { kind: 'conflict'; conflict: Booking } };

/**
 * Result of removing from the ledger.
 */
export type RemoveResult =
	| { ok: true; booking: Booking }
	| { ok: false; error: { kind: 'not-found' } | { kind: 'forbidden' } };

// ============================================================================
// Persistence
// ============================================================================

/**
 * One persisted booking.
 */
export interface BookingRecord {
	bookingId: BookingId;
	userId: UserId;
	date: CalendarDate;
	start: LocalTime;
	end: LocalTime;
	label: string;
}

/**
 * Everything the ledger needs to survive a restart.
 */
export interface LedgerSnapshot {
	bookings: BookingRecord[];
}

/**
 * Records skipped while restoring a ledger snapshot.
 */
export interface RestoreReport {
	restored: number;
	rejected: { record: BookingRecord; reason: string }[];
}

/**
 * Both snapshots, as loaded at startup.
 */
export interface StateSnapshot {
	roles: RoleSnapshot;
	ledger: LedgerSnapshot;
}

/**
 * Durable storage for registry and ledger state.
 * Implementations round-trip every record field losslessly.
 */
export interface PersistenceAdapter {
	load(): Promise<StateSnapshot>;
	saveRoles(snapshot: RoleSnapshot): Promise<void>;
	saveLedger(snapshot: LedgerSnapshot): Promise<void>;
}

/**
 * What became of the save that followed a mutation.
 * - `saved`: written before the outcome was returned
 * - `failed`: the write failed; in-memory state still holds the change
 * - `deferred`: written in the background (see `flushMode`)
 * - `unchanged`: nothing to write
 */
export type Durability =
	| { status: 'saved' }
	| { status: 'failed'; error: PersistenceError }
	| { status: 'deferred' }
	| { status: 'unchanged' };

// ============================================================================
// Service Outcomes
// ============================================================================

export type BookingOutcome =
	| { status: 'accepted'; bookingId: BookingId; booking: Booking; durability: Durability }
	| { status: 'rejected-conflict'; conflict: Booking }
	| { status: 'rejected-invalid-interval'; reason: ValidationReason; message: string }
	| { status: 'rejected-unauthorized'; message: string };

export type CancelOutcome =
	| { status: 'cancelled'; booking: Booking; durability: Durability }
	| { status: 'not-found' }
	| { status: 'forbidden'; message: string };

export type CancelAtOutcome = CancelOutcome | { status: 'invalid-input'; message: string };

export type SetRoleOutcome =
	| { status: 'updated'; userId: UserId; changed: boolean; durability: Durability }
	| { status: 'forbidden'; message: string };

export type SetRoleByUsernameOutcome = SetRoleOutcome | { status: 'user-not-found'; username: string };

export interface BulkSetRolesOutcome extends BulkLoadReport {
	durability: Durability;
}

export type ListRoleOutcome = { status: 'ok'; members: UserProfile[] } | { status: 'forbidden'; message: string };

export interface RegisterUserOutcome {
	changed: boolean;
	durability: Durability;
}

/**
 * Durability of each snapshot kind after `flush()`.
 */
export interface FlushReport {
	roles: Durability;
	ledger: Durability;
}

export interface LoadReport {
	users: number;
	bookings: number;
	rejected: RestoreReport['rejected'];
}

// ============================================================================
// Service Options
// ============================================================================

/**
 * How saves relate to the critical section of a mutation.
 * - `inline`: the mutation awaits its save and reports the result
 * - `background`: the lock is released first; failures are reported out of band
 */
export type FlushMode = 'inline' | 'background';

export interface BookingServiceOptions {
	adapter: PersistenceAdapter;
	/** IANA timezone of the auditorium; defaults to "UTC" */
	timezone?: string;
	/** Booking grid in minutes; start and end must fall on it. Defaults to 15 */
	slotMinutes?: number;
	/** Defaults to "inline" */
	flushMode?: FlushMode;
	negativeIdsAreAdmins?: boolean;
	logger?: Logger;
	now?: () => Date;
	generateId?: () => BookingId;
	/** Called for every failed save */
	onDurabilityWarning?: (error: PersistenceError) => void;
	/** Use an existing registry instead of a fresh one */
	registry?: AccessRegistry;
	/** Use an existing ledger instead of a fresh one; must share the service's timezone */
	ledger?: SlotLedger;
}
