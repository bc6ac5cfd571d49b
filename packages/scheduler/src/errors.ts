/**
 * Errors raised by persistence adapters.
 */

export type PersistenceOperation = 'load' | 'save-roles' | 'save-ledger';

/**
 * A persistence adapter could not read or write state.
 * The service reports it as a durability warning; in-memory state is kept.
 */
export class PersistenceError extends Error {
	readonly operation: PersistenceOperation;

	constructor(operation: PersistenceOperation, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'PersistenceError';
		this.operation = operation;
	}
}

/**
 * Wrap anything thrown by an adapter call, keeping existing PersistenceErrors.
 */
export function toPersistenceError(operation: PersistenceOperation, cause: unknown): PersistenceError {
	if (cause instanceof PersistenceError) return cause;
	const detail = cause instanceof Error ? cause.message : String(cause);
	return new PersistenceError(operation, `${operation} failed: ${detail}`, { cause });
}
