/**
 * Access registry: who may book and who may administer.
 */

import { parseRoleList } from './lists.js';
import { evaluate, privilegePolicies } from './policy.js';
import type {
	BulkLoadReport,
	Decision,
	Membership,
	Privilege,
	Role,
	RoleSnapshot,
	UserId,
	UserProfile,
} from './types.js';

// ============================================================================
// Options
// ============================================================================

/**
 * Options for creating an access registry.
 */
export interface AccessRegistryOptions {
	/**
	 * Treat every negative ID as an administrator. Chat platforms give group
	 * chats negative IDs; a bot deployed into a staff group relies on this.
	 */
	negativeIdsAreAdmins?: boolean;
	now?: () => Date;
}

interface UserEntry {
	username: string | null;
	isAdmin: boolean;
	isWhitelisted: boolean;
}

function assertUserId(userId: UserId): void {
	if (!Number.isSafeInteger(userId)) {
		throw new RangeError(`Invalid user ID: ${userId}`);
	}
}

function normalizeUsername(username: string): string {
	return username.trim().replace(/^@/, '');
}

function roleFlag(role: Role): 'isAdmin' | 'isWhitelisted' {
	return role === 'admin' ? 'isAdmin' : 'isWhitelisted';
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Create an empty access registry.
 *
 * Role state is only changed through the returned operations. Every change
 * marks the registry dirty until {@link markClean} is called after a save.
 */
export function createAccessRegistry(options: AccessRegistryOptions = {}) {
	const { negativeIdsAreAdmins = false, now = () => new Date() } = options;

	const users = new Map<UserId, UserEntry>();
	let dirty = false;

	function entryFor(userId: UserId): UserEntry {
		let entry = users.get(userId);
		if (!entry) {
			entry = { username: null, isAdmin: false, isWhitelisted: false };
			users.set(userId, entry);
		}
		return entry;
	}

	function toProfile(userId: UserId, entry: UserEntry): UserProfile {
		return {
			userId,
			username: entry.username,
			isAdmin: isAdmin(userId),
			isWhitelisted: entry.isWhitelisted,
		};
	}

	// ------------------------------------------------------------------------
	// Lookups
	// ------------------------------------------------------------------------

	/**
	 * Whether the user administers. Unknown users do not.
	 */
	function isAdmin(userId: UserId): boolean {
		if (negativeIdsAreAdmins && userId < 0) return true;
		return users.get(userId)?.isAdmin ?? false;
	}

	/**
	 * Whether the user is on the whitelist. Unknown users are not.
	 */
	function isWhitelisted(userId: UserId): boolean {
		return users.get(userId)?.isWhitelisted ?? false;
	}

	function membership(userId: UserId): Membership {
		return { isAdmin: isAdmin(userId), isWhitelisted: isWhitelisted(userId) };
	}

	function profile(userId: UserId): UserProfile | undefined {
		const entry = users.get(userId);
		return entry ? toProfile(userId, entry) : undefined;
	}

	/**
	 * Find a user by chat username. A leading "@" and letter case are ignored.
	 */
	function findByUsername(username: string): UserProfile | undefined {
		const wanted = normalizeUsername(username).toLowerCase();
		if (wanted.length === 0) return undefined;

		for (const [userId, entry] of users) {
			if (entry.username?.toLowerCase() === wanted) {
				return toProfile(userId, entry);
			}
		}
		return undefined;
	}

	/**
	 * Users holding a role, ordered by user ID.
	 */
	function listMembers(role: Role): UserProfile[] {
		const flag = roleFlag(role);
		return [...users.entries()]
			.filter(([, entry]) => entry[flag])
			.sort(([a], [b]) => a - b)
			.map(([userId, entry]) => toProfile(userId, entry));
	}

	// ------------------------------------------------------------------------
	// Authorization
	// ------------------------------------------------------------------------

	/**
	 * Decide whether a user holds a privilege, with one reason per rule.
	 */
	function authorize(userId: UserId, privilege: Privilege): Decision {
		return evaluate(privilegePolicies[privilege], { userId, membership: membership(userId) }, now());
	}

	/**
	 * Shorthand for `authorize(userId, privilege).outcome.allowed`.
	 */
	function can(userId: UserId, privilege: Privilege): boolean {
		return authorize(userId, privilege).outcome.allowed;
	}

	// ------------------------------------------------------------------------
	// Mutations
	// ------------------------------------------------------------------------

	/**
	 * Give a user a role. Granting a held role changes nothing.
	 *
	 * @returns Whether the state changed
	 */
	function grant(userId: UserId, role: Role): boolean {
		assertUserId(userId);
		const entry = entryFor(userId);
		const flag = roleFlag(role);
		if (entry[flag]) return false;
		entry[flag] = true;
		dirty = true;
		return true;
	}

	/**
	 * Take a role away. Revoking an absent role changes nothing.
	 *
	 * @returns Whether the state changed
	 */
	function revoke(userId: UserId, role: Role): boolean {
		const entry = users.get(userId);
		const flag = roleFlag(role);
		if (!entry?.[flag]) return false;
		entry[flag] = false;
		dirty = true;
		return true;
	}

	function setRole(userId: UserId, role: Role, present: boolean): boolean {
		return present ? grant(userId, role) : revoke(userId, role);
	}

	/**
	 * Record a user seen in chat, creating them if new.
	 * Roles are untouched.
	 *
	 * @returns Whether anything changed
	 */
	function registerUser(userId: UserId, username: string | null): boolean {
		assertUserId(userId);
		const normalized = username === null ? null : normalizeUsername(username) || null;
		const existing = users.get(userId);
		if (existing && existing.username === normalized) return false;

		entryFor(userId).username = normalized;
		dirty = true;
		return true;
	}

	/**
	 * Grant a role to every user listed in a role file.
	 * Malformed lines are reported and ingestion continues.
	 */
	function bulkLoad(role: Role, lines: string | Iterable<string>): BulkLoadReport {
		const report: BulkLoadReport = { role, loaded: 0, skipped: 0, failures: [] };

		for (const parsed of parseRoleList(lines)) {
			switch (parsed.kind) {
				case 'ok':
					grant(parsed.userId, role);
					report.loaded++;
					break;
				case 'skip':
					report.skipped++;
					break;
				case 'malformed':
					report.failures.push({ line: parsed.line, content: parsed.content, reason: parsed.reason });
					break;
			}
		}

		return report;
	}

	// ------------------------------------------------------------------------
	// Persistence
	// ------------------------------------------------------------------------

	/**
	 * Current state as plain records ordered by user ID.
	 */
	function snapshot(): RoleSnapshot {
		return {
			users: [...users.entries()]
				.sort(([a], [b]) => a - b)
				.map(([userId, entry]) => ({
					userId,
					isAdmin: entry.isAdmin,
					isWhitelisted: entry.isWhitelisted,
					username: entry.username,
				})),
		};
	}

	/**
	 * Replace all state with a snapshot. The registry is clean afterwards.
	 */
	function restore(state: RoleSnapshot): void {
		users.clear();
		for (const record of state.users) {
			assertUserId(record.userId);
			users.set(record.userId, {
				username: record.username,
				isAdmin: record.isAdmin,
				isWhitelisted: record.isWhitelisted,
			});
		}
		dirty = false;
	}

	return {
		isAdmin,
		isWhitelisted,
		membership,
		profile,
		findByUsername,
		listMembers,
		authorize,
		can,
		grant,
		revoke,
		setRole,
		registerUser,
		bulkLoad,
		snapshot,
		restore,
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
// Export type for the access registry
// ============================================================================

export type AccessRegistry = ReturnType<typeof createAccessRegistry>;
