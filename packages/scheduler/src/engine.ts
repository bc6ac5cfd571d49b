/**
 * Booking service: the operations the chat layer calls.
 *
 * Requests are validated, authorized and resolved against the ledger inside
 * per-date critical sections; role changes share one registry section. Every
 * change is followed by a save through the persistence adapter.
 */

import {
	createAccessRegistry,
	type Decision,
	type Privilege,
	type Role,
	type RoleSnapshot,
} from '@slotkeeper/access';
import {
	END_OF_DAY,
	createKeyedLock,
	createLogger,
	isCalendarDate,
	isLocalTime,
	localTimeOf,
	toInterval,
	zonedInstant,
	type SlotkeeperConfig,
} from '@slotkeeper/core';
import { createJsonFileAdapter } from './adapters.js';
import { toPersistenceError, type PersistenceError, type PersistenceOperation } from './errors.js';
import { subtractIntervals } from './intervals.js';
import { createSlotLedger } from './ledger.js';
import { validateSlot } from './resolver.js';
import type {
	Booking,
	BookingId,
	BookingOutcome,
	BookingRequest,
	BookingServiceOptions,
	BulkSetRolesOutcome,
	CalendarDate,
	CancelAtOutcome,
	CancelOutcome,
	Durability,
	FlushReport,
	FreeSlot,
	LedgerSnapshot,
	ListRoleOutcome,
	LoadReport,
	LocalTime,
	RegisterUserOutcome,
	SetRoleByUsernameOutcome,
	SetRoleOutcome,
	StateSnapshot,
	UserId,
} from './types.js';

const NOT_PERMITTED = 'Not permitted.';
const ALREADY_STARTED = 'That booking has already started; only an administrator can cancel it.';

/**
 * One persisted kind of state and how to write it.
 */
interface Store {
	operation: PersistenceOperation;
	isDirty(): boolean;
	markDirty(): void;
	/** Take a snapshot, mark the source clean, and write the snapshot */
	write(): Promise<void>;
}

export interface CancelBookingInput {
	userId: UserId;
	bookingId: BookingId;
	/** Only honoured for users the registry confirms as administrators */
	actingAsAdmin?: boolean;
}

export interface CancelBookingAtInput {
	userId: UserId;
	date: CalendarDate;
	/** Any moment inside the booking */
	time: LocalTime;
	actingAsAdmin?: boolean;
}

export interface SetRoleInput {
	userId: UserId;
	role: Role;
	present: boolean;
	/** Who asks; omitted for trusted callers such as a management CLI */
	actorId?: UserId;
}

export interface SetRoleByUsernameInput {
	username: string;
	role: Role;
	present: boolean;
	actorId?: UserId;
}

// ============================================================================
// Service
// ============================================================================

/**
 * Create a booking service. Call {@link load} once before anything else.
 *
 * @example
 * ```typescript
 * const service = createBookingService({
 *   adapter: createJsonFileAdapter({ directory: './data' }),
 *   timezone: 'Europe/Berlin',
 * });
 * await service.load();
 *
 * const outcome = await service.requestBooking({
 *   userId: 1001,
 *   date: '2024-05-01',
 *   start: '10:00',
 *   end: '11:00',
 *   label: 'rehearsal',
 * });
 * if (outcome.status === 'rejected-conflict') {
 *   console.log(`Taken from ${outcome.conflict.start} to ${outcome.conflict.end}`);
 * }
 * ```
 */
export function createBookingService(options: BookingServiceOptions) {
	const {
		adapter,
		timezone = 'UTC',
		slotMinutes = 15,
		flushMode = 'inline',
		negativeIdsAreAdmins = false,
		logger = createLogger(),
		now = () => new Date(),
		generateId,
		onDurabilityWarning,
	} = options;

	if (!Number.isInteger(slotMinutes) || slotMinutes < 1 || slotMinutes > 60) {
		throw new RangeError(`slotMinutes must be an integer from 1 to 60, got ${slotMinutes}`);
	}

	const registry = options.registry ?? createAccessRegistry({ negativeIdsAreAdmins, now });
	const ledger = options.ledger ?? createSlotLedger({ timezone, generateId });
	const locks = createKeyedLock();
	const saveQueue = createKeyedLock();
	const pending = new Set<Promise<void>>();
	let loaded = false;

	const rolesStore: Store = {
		operation: 'save-roles',
		isDirty: registry.isDirty,
		markDirty: registry.markDirty,
		write: async () => {
			const snapshot: RoleSnapshot = registry.snapshot();
			registry.markClean();
			await adapter.saveRoles(snapshot);
		},
	};

	const ledgerStore: Store = {
		operation: 'save-ledger',
		isDirty: ledger.isDirty,
		markDirty: ledger.markDirty,
		write: async () => {
			const snapshot: LedgerSnapshot = ledger.snapshot();
			ledger.markClean();
			await adapter.saveLedger(snapshot);
		},
	};

	function ensureLoaded(): void {
		if (!loaded) {
			throw new Error('Booking service used before load() completed');
		}
	}

	function reportFailure(error: PersistenceError): void {
		logger.warn('State change kept in memory but not saved', { operation: error.operation, error });
		try {
			onDurabilityWarning?.(error);
		} catch (callbackError) {
			logger.error('Durability warning callback threw', {
				operation: error.operation,
				error: callbackError instanceof Error ? callbackError : String(callbackError),
			});
		}
	}

	// ------------------------------------------------------------------------
	// Saving
	// ------------------------------------------------------------------------

	/**
	 * Save a store once earlier saves of the same kind have settled.
	 * A clean store means a later snapshot already covered the change.
	 */
	function save(store: Store): Promise<Durability> {
		return saveQueue.run(store.operation, async (): Promise<Durability> => {
			if (!store.isDirty()) {
				return { status: 'saved' };
			}
			try {
				await store.write();
				return { status: 'saved' };
			} catch (error) {
				store.markDirty();
				const failure = toPersistenceError(store.operation, error);
				reportFailure(failure);
				return { status: 'failed', error: failure };
			}
		});
	}

	async function commit(store: Store): Promise<Durability> {
		if (flushMode === 'inline') {
			return save(store);
		}

		const task: Promise<void> = save(store)
			.then(
				() => undefined,
				(error: unknown) => {
					logger.error('Background save failed unexpectedly', {
						operation: store.operation,
						error: error instanceof Error ? error : String(error),
					});
				}
			)
			.finally(() => {
				pending.delete(task);
			});
		pending.add(task);
		return { status: 'deferred' };
	}

	/**
	 * Wait for background saves, then retry anything still unsaved.
	 */
	async function flush(): Promise<FlushReport> {
		while (pending.size > 0) {
			await Promise.all([...pending]);
		}
		const [roles, bookings] = await Promise.all([save(rolesStore), save(ledgerStore)]);
		return { roles, ledger: bookings };
	}

	// ------------------------------------------------------------------------
	// Startup
	// ------------------------------------------------------------------------

	/**
	 * Read registry and ledger state through the adapter.
	 *
	 * @throws PersistenceError when the adapter cannot load
	 */
	async function load(): Promise<LoadReport> {
		let state: StateSnapshot;
		try {
			state = await adapter.load();
		} catch (error) {
			const failure = toPersistenceError('load', error);
			logger.error('Failed to load state', { operation: failure.operation, error: failure });
			throw failure;
		}

		registry.restore(state.roles);
		const restored = ledger.restore(state.ledger);
		for (const { record, reason } of restored.rejected) {
			logger.warn('Skipped stored booking', { bookingId: record.bookingId, date: record.date, reason });
		}

		loaded = true;
		const report: LoadReport = {
			users: state.roles.users.length,
			bookings: restored.restored,
			rejected: restored.rejected,
		};
		logger.info('State loaded', { users: report.users, bookings: report.bookings });
		return report;
	}

	// ------------------------------------------------------------------------
	// Bookings
	// ------------------------------------------------------------------------

	/**
	 * Reserve a slot. The interval is validated first, then the requester's
	 * booking privilege, then the date's bookings.
	 */
	async function requestBooking(request: BookingRequest): Promise<BookingOutcome> {
		ensureLoaded();
		const { userId, date, start, end } = request;
		const label = request.label?.trim() ?? '';

		const validation = validateSlot(request, { timezone, slotMinutes, now: now() });
		if (!validation.ok) {
			logger.debug('Booking rejected', { userId, date, start, end, reason: validation.error.reason });
			return {
				status: 'rejected-invalid-interval',
				reason: validation.error.reason,
				message: validation.error.message,
			};
		}

		if (!registry.can(userId, 'book')) {
			logger.debug('Booking rejected', { userId, date, start, end, reason: 'unauthorized' });
			return { status: 'rejected-unauthorized', message: NOT_PERMITTED };
		}

		const { interval } = validation;
		return locks.run(`ledger:${date}`, async (): Promise<BookingOutcome> => {
			const result = ledger.add({ userId, date, start, end, label, interval });
			if (!result.ok) {
				const { conflict } = result.error;
				logger.debug('Booking rejected', { userId, date, start, end, reason: `conflict:${conflict.id}` });
				return { status: 'rejected-conflict', conflict };
			}

			const { booking } = result;
			logger.info('Booking accepted', { userId, bookingId: booking.id, date, start, end });
			const durability = await commit(ledgerStore);
			return { status: 'accepted', bookingId: booking.id, booking, durability };
		});
	}

	/**
	 * Cancel a booking. Owners may cancel bookings that have not started;
	 * administrators acting as such may cancel any booking.
	 */
	async function cancelBooking(input: CancelBookingInput): Promise<CancelOutcome> {
		ensureLoaded();
		const { userId, bookingId, actingAsAdmin = false } = input;

		const existing = ledger.find(bookingId);
		if (!existing) {
			return { status: 'not-found' };
		}

		return locks.run(`ledger:${existing.date}`, async (): Promise<CancelOutcome> => {
			const asAdmin = actingAsAdmin && registry.isAdmin(userId);
			const booking = ledger.find(bookingId);
			if (!booking) {
				return { status: 'not-found' };
			}
			if (!asAdmin && booking.userId === userId && booking.interval.start <= now()) {
				logger.debug('Cancellation refused', { userId, bookingId, reason: 'started' });
				return { status: 'forbidden', message: ALREADY_STARTED };
			}

			const result = ledger.remove(bookingId, userId, asAdmin);
			if (!result.ok) {
				if (result.error.kind === 'not-found') {
					return { status: 'not-found' };
				}
				logger.debug('Cancellation refused', { userId, bookingId, reason: 'not-owner' });
				return { status: 'forbidden', message: NOT_PERMITTED };
			}

			logger.info('Booking cancelled', {
				userId,
				bookingId,
				date: booking.date,
				start: booking.start,
				end: booking.end,
				asAdmin,
			});
			const durability = await commit(ledgerStore);
			return { status: 'cancelled', booking: result.booking, durability };
		});
	}

	/**
	 * Cancel whichever booking covers `time` on `date`.
	 */
	async function cancelBookingAt(input: CancelBookingAtInput): Promise<CancelAtOutcome> {
		ensureLoaded();
		const { userId, date, time, actingAsAdmin } = input;

		if (!isCalendarDate(date) || !isLocalTime(time)) {
			return { status: 'invalid-input', message: 'Give a YYYY-MM-DD date and an HH:MM time.' };
		}

		const booking = ledger.findAt(date, zonedInstant(date, time, timezone));
		if (!booking) {
			return { status: 'not-found' };
		}
		return cancelBooking({ userId, bookingId: booking.id, actingAsAdmin });
	}

	/**
	 * Bookings on a date, ordered by start time. Open to everyone.
	 */
	function queryDate(date: CalendarDate): Iterable<Booking> {
		ensureLoaded();
		return ledger.listForDate(date);
	}

	/**
	 * Bookings on every date from `from` to `to` inclusive, in time order.
	 */
	function queryRange(from: CalendarDate, to: CalendarDate): Booking[] {
		ensureLoaded();
		if (!isCalendarDate(from) || !isCalendarDate(to)) {
			throw new RangeError(`Invalid date range: ${from} to ${to}`);
		}
		return ledger
			.dates()
			.filter((date) => date >= from && date <= to)
			.flatMap((date) => [...ledger.listForDate(date)]);
	}

	/**
	 * Unbooked windows of a date as local-time ranges; the last may end at "24:00".
	 */
	function freeTime(date: CalendarDate): FreeSlot[] {
		ensureLoaded();
		if (!isCalendarDate(date)) {
			throw new RangeError(`Invalid date: ${date}`);
		}

		const day = toInterval(date, { start: '00:00', end: END_OF_DAY }, timezone);
		const booked = [...ledger.listForDate(date)].map((booking) => booking.interval);

		return subtractIntervals([day], booked).map((window) => ({
			start: localTimeOf(window.start, timezone),
			end: window.end.getTime() === day.end.getTime() ? END_OF_DAY : localTimeOf(window.end, timezone),
		}));
	}

	// ------------------------------------------------------------------------
	// Roles
	// ------------------------------------------------------------------------

	/**
	 * Grant or revoke a role. With `actorId`, the actor must be an administrator.
	 */
	async function setRole(input: SetRoleInput): Promise<SetRoleOutcome> {
		ensureLoaded();
		const { userId, role, present, actorId } = input;

		return locks.run('registry', async (): Promise<SetRoleOutcome> => {
			if (actorId !== undefined && !registry.isAdmin(actorId)) {
				logger.debug('Role change refused', { actorId, userId, role, reason: 'not-admin' });
				return { status: 'forbidden', message: NOT_PERMITTED };
			}

			const changed = registry.setRole(userId, role, present);
			if (!changed) {
				return { status: 'updated', userId, changed, durability: { status: 'unchanged' } };
			}

			logger.info(present ? 'Role granted' : 'Role revoked', { userId, role, actorId });
			const durability = await commit(rolesStore);
			return { status: 'updated', userId, changed, durability };
		});
	}

	/**
	 * {@link setRole} for a user known by chat username.
	 */
	async function setRoleByUsername(input: SetRoleByUsernameInput): Promise<SetRoleByUsernameOutcome> {
		ensureLoaded();
		const { username, role, present, actorId } = input;

		if (actorId !== undefined && !registry.isAdmin(actorId)) {
			return { status: 'forbidden', message: NOT_PERMITTED };
		}

		const profile = registry.findByUsername(username);
		if (!profile) {
			return { status: 'user-not-found', username };
		}
		return setRole({ userId: profile.userId, role, present, actorId });
	}

	/**
	 * Grant a role to every user in a role-list file.
	 */
	async function bulkSetRoles(role: Role, lines: string | Iterable<string>): Promise<BulkSetRolesOutcome> {
		ensureLoaded();

		return locks.run('registry', async (): Promise<BulkSetRolesOutcome> => {
			const report = registry.bulkLoad(role, lines);
			for (const failure of report.failures) {
				logger.warn('Skipped role-list line', { role, line: failure.line, reason: failure.reason });
			}
			logger.info('Role list loaded', {
				role,
				loaded: report.loaded,
				skipped: report.skipped,
				failed: report.failures.length,
			});

			const durability: Durability = registry.isDirty() ? await commit(rolesStore) : { status: 'unchanged' };
			return { ...report, durability };
		});
	}

	/**
	 * Members of a role with their usernames. Administrators only.
	 */
	function listRole(actorId: UserId, role: Role): ListRoleOutcome {
		ensureLoaded();
		if (!registry.isAdmin(actorId)) {
			return { status: 'forbidden', message: NOT_PERMITTED };
		}
		return { status: 'ok', members: registry.listMembers(role) };
	}

	/**
	 * Record a user seen in chat. Roles are untouched.
	 */
	async function registerUser(userId: UserId, username: string | null): Promise<RegisterUserOutcome> {
		ensureLoaded();

		return locks.run('registry', async (): Promise<RegisterUserOutcome> => {
			const changed = registry.registerUser(userId, username);
			const durability: Durability = changed ? await commit(rolesStore) : { status: 'unchanged' };
			return { changed, durability };
		});
	}

	function authorize(userId: UserId, privilege: Privilege): Decision {
		return registry.authorize(userId, privilege);
	}

	return {
		load,
		requestBooking,
		cancelBooking,
		cancelBookingAt,
		queryDate,
		queryRange,
		freeTime,
		setRole,
		setRoleByUsername,
		bulkSetRoles,
		listRole,
		registerUser,
		authorize,
		flush,
	};
}

/**
 * Create a booking service backed by JSON files, configured from
 * {@link loadConfig}. `overrides` replace individual options.
 */
export function createBookingServiceFromConfig(
	config: SlotkeeperConfig,
	overrides: Partial<BookingServiceOptions> = {}
) {
	return createBookingService({
		adapter: createJsonFileAdapter({ directory: config.dataDir }),
		timezone: config.timezone,
		slotMinutes: config.slotMinutes,
		flushMode: config.flushMode,
		negativeIdsAreAdmins: config.negativeIdsAreAdmins,
		logger: createLogger({ level: config.logLevel }).child({ component: 'booking-service' }),
		...overrides,
	});
}

// ============================================================================
// Export type for the booking service
// ============================================================================

export type BookingService = ReturnType<typeof createBookingService>;
