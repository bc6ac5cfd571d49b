/**
 * @slotkeeper/scheduler
 *
 * Bookings of the auditorium: the slot ledger, conflict resolution,
 * persistence, and the booking service the chat layer talks to.
 */

// ============================================================================
// Types
// ============================================================================

export type {
	// Booking types
	BookingId,
	Booking,
	SlotRequest,
	BookingRequest,
	LedgerEntry,
	FreeSlot,
	// Validation types
	ValidationReason,
	ValidationError,
	SlotValidation,
	ConflictDecision,
	AddResult,
	RemoveResult,
	// Persistence types
	BookingRecord,
	LedgerSnapshot,
	RestoreReport,
	StateSnapshot,
	PersistenceAdapter,
	Durability,
	// Outcome types
	BookingOutcome,
	CancelOutcome,
	CancelAtOutcome,
	SetRoleOutcome,
	SetRoleByUsernameOutcome,
	BulkSetRolesOutcome,
	ListRoleOutcome,
	RegisterUserOutcome,
	FlushReport,
	LoadReport,
	// Service options
	FlushMode,
	BookingServiceOptions,
} from './types.js';

// ============================================================================
// Interval Utilities
// ============================================================================

export { mergeIntervals, subtractIntervals } from './intervals.js';

// ============================================================================
// Ledger and Resolver
// ============================================================================

export { validateSlot, resolveConflict, type ValidateSlotOptions } from './resolver.js';
export { createSlotLedger, type SlotLedger, type SlotLedgerOptions } from './ledger.js';

// ============================================================================
// Persistence
// ============================================================================

export { PersistenceError, toPersistenceError, type PersistenceOperation } from './errors.js';
export {
	BOOKINGS_FILE,
	ROLES_FILE,
	createJsonFileAdapter,
	createMemoryAdapter,
	type JsonFileAdapterOptions,
	type MemoryAdapter,
} from './adapters.js';

// ============================================================================
// Booking Service
// ============================================================================

export {
	createBookingService,
	createBookingServiceFromConfig,
	type BookingService,
	type CancelBookingAtInput,
	type CancelBookingInput,
	type SetRoleByUsernameInput,
	type SetRoleInput,
} from './engine.js';
