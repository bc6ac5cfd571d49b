/**
 * Persistence adapters for registry and ledger snapshots.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RoleSnapshot } from '@slotkeeper/access';
import { z } from 'zod';
import { PersistenceError, toPersistenceError, type PersistenceOperation } from './errors.js';
import type { LedgerSnapshot, PersistenceAdapter, StateSnapshot } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

const roleRecordSchema = z.object({
	userId: z.number().int().safe(),
	isAdmin: z.boolean(),
	isWhitelisted: z.boolean(),
	username: z.string().nullable(),
});

const bookingRecordSchema = z.object({
	bookingId: z.string().min(1),
	userId: z.number().int().safe(),
	date: z.string(),
	start: z.string(),
	end: z.string(),
	label: z.string(),
});

const rolesFileSchema = z.object({
	version: z.literal(1),
	users: z.array(roleRecordSchema),
});

const bookingsFileSchema = z.object({
	version: z.literal(1),
	bookings: z.array(bookingRecordSchema),
});

export const ROLES_FILE = 'roles.json';
export const BOOKINGS_FILE = 'bookings.json';

function emptyState(): StateSnapshot {
	return { roles: { users: [] }, ledger: { bookings: [] } };
}

function copyRoles(snapshot: RoleSnapshot): RoleSnapshot {
	return { users: snapshot.users.map((record) => ({ ...record })) };
}

function copyLedger(snapshot: LedgerSnapshot): LedgerSnapshot {
	return { bookings: snapshot.bookings.map((record) => ({ ...record })) };
}

// ============================================================================
// Memory Adapter
// ============================================================================

/**
 * Keep snapshots in memory. Every value going in or out is copied, so callers
 * never share records with the adapter.
 *
 * @example
 * ```typescript
 * const adapter = createMemoryAdapter({
 *   roles: { users: [{ userId: 1001, isAdmin: false, isWhitelisted: true, username: 'alice' }] },
 *   ledger: { bookings: [] },
 * });
 * const service = createBookingService({ adapter });
 * ```
 */
export function createMemoryAdapter(initial: StateSnapshot = emptyState()) {
	let roles = copyRoles(initial.roles);
	let ledger = copyLedger(initial.ledger);
	let saves = 0;

	return {
		async load(): Promise<StateSnapshot> {
			return { roles: copyRoles(roles), ledger: copyLedger(ledger) };
		},
		async saveRoles(snapshot: RoleSnapshot): Promise<void> {
			roles = copyRoles(snapshot);
			saves++;
		},
		async saveLedger(snapshot: LedgerSnapshot): Promise<void> {
			ledger = copyLedger(snapshot);
			saves++;
		},
		/** What a fresh load would return right now */
		state(): StateSnapshot {
			return { roles: copyRoles(roles), ledger: copyLedger(ledger) };
		},
		get saveCount() {
			return saves;
		},
	};
}

export type MemoryAdapter = ReturnType<typeof createMemoryAdapter>;

// ============================================================================
// JSON File Adapter
// ============================================================================

export interface JsonFileAdapterOptions {
	/** Directory holding roles.json and bookings.json; created on first save */
	directory: string;
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readJson<T>(
	path: string,
	schema: z.ZodType<T>,
	operation: PersistenceOperation
): Promise<T | null> {
	let text: string;
	try {
		text = await readFile(path, 'utf8');
	} catch (error) {
		if (isMissingFile(error)) return null;
		throw toPersistenceError(operation, error);
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw new PersistenceError(operation, `${path} is not valid JSON`, { cause: error });
	}

	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
		throw new PersistenceError(operation, `${path} is malformed at ${where}: ${issue.message}`, {
			cause: parsed.error,
		});
	}
	return parsed.data;
}

/**
 * Write through a temporary file so a crash mid-write leaves the old file intact.
 */
async function writeJson(directory: string, file: string, value: unknown, operation: PersistenceOperation) {
	const target = join(directory, file);
	const temporary = `${target}.${process.pid}.tmp`;
	try {
		await mkdir(directory, { recursive: true });
		await writeFile(temporary, `${JSON.stringify(value, null, '\t')}\n`, 'utf8');
		await rename(temporary, target);
	} catch (error) {
		throw toPersistenceError(operation, error);
	}
}

/**
 * Store snapshots as two JSON documents in a directory. Missing files load as
 * empty snapshots; unreadable or malformed files raise a PersistenceError.
 */
export function createJsonFileAdapter(options: JsonFileAdapterOptions): PersistenceAdapter {
	const { directory } = options;

	return {
		async load() {
			const roles = await readJson(join(directory, ROLES_FILE), rolesFileSchema, 'load');
			const bookings = await readJson(join(directory, BOOKINGS_FILE), bookingsFileSchema, 'load');
			return {
				roles: { users: roles?.users ?? [] },
				ledger: { bookings: bookings?.bookings ?? [] },
			};
		},
		async saveRoles(snapshot) {
			await writeJson(directory, ROLES_FILE, { version: 1, users: snapshot.users }, 'save-roles');
		},
		async saveLedger(snapshot) {
			await writeJson(directory, BOOKINGS_FILE, { version: 1, bookings: snapshot.bookings }, 'save-ledger');
		},
	};
}
