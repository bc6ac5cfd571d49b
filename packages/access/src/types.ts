/**
 * Core type definitions for the access registry.
 */

import type { UserId } from '@slotkeeper/core';
export type { UserId };

// ============================================================================
// Role Types
// ============================================================================

/**
 * A role flag a user may hold. Plain users hold neither.
 */
export type Role = 'admin' | 'whitelisted';

/**
 * What an action requires of its requester.
 * - `administer`: manage roles, cancel other users' bookings
 * - `book`: create bookings
 */
export type Privilege = 'book' | 'administer';

/**
 * Effective role flags of one user.
 */
export interface Membership {
	isAdmin: boolean;
	isWhitelisted: boolean;
}

/**
 * A known user with their role flags.
 */
export interface UserProfile extends Membership {
	userId: UserId;
	/** Chat username without the leading "@"; informational only */
	username: string | null;
}

// ============================================================================
// Snapshot Types
// ============================================================================

/**
 * One persisted user record.
 */
export interface RoleRecord {
	userId: UserId;
	isAdmin: boolean;
	isWhitelisted: boolean;
	username: string | null;
}

/**
 * Everything the registry needs to survive a restart.
 */
export interface RoleSnapshot {
	users: RoleRecord[];
}

// ============================================================================
// Role List Types
// ============================================================================

/**
 * Result of parsing one line of a role-list file.
 */
export type RoleListLine =
	| { kind: 'ok'; line: number; userId: UserId }
	| { kind: 'skip'; line: number }
	| { kind: 'malformed'; line: number; content: string; reason: string };

/**
 * A line that could not be ingested.
 */
export interface BulkLoadFailure {
	/** 1-based line number */
	line: number;
	content: string;
	reason: string;
}

/**
 * Outcome of ingesting a role list.
 */
export interface BulkLoadReport {
	role: Role;
	/** Lines that named a user; each such user now holds the role */
	loaded: number;
	/** Blank and comment lines */
	skipped: number;
	failures: BulkLoadFailure[];
}

// ============================================================================
// Rule Types
// ============================================================================

/**
 * Facts a rule may examine.
 */
export interface AccessFacts {
	userId: UserId;
	membership: Membership;
}

/**
 * Result of evaluating a single rule.
 */
export type RuleResult =
	| { outcome: 'allow'; explanation: string }
	| { outcome: 'deny'; explanation: string }
	| { outcome: 'skip'; explanation: string };

/**
 * A rule is a pure predicate that examines facts and returns a result.
 */
export interface Rule<TFacts = AccessFacts> {
	id: string;
	description: string;
	evaluate: (facts: TFacts) => RuleResult;
}

// ============================================================================
// Decision Types
// ============================================================================

/**
 * Captures what happened for a single rule evaluation.
 */
export interface Reason {
	rule: string;
	outcome: 'allow' | 'deny' | 'skip';
	explanation: string;
}

/**
 * Trace information for debugging and audit.
 */
export interface Trace<TFacts = AccessFacts> {
	evaluatedAt: Date;
	durationMs: number;
	facts: TFacts;
}

/**
 * The resolved output of policy evaluation.
 */
export interface Decision<T = { allowed: boolean }, TFacts = AccessFacts> {
	outcome: T;
	reasons: Reason[];
	trace: Trace<TFacts>;
}

/**
 * A policy combines rules and a resolution strategy.
 */
export interface Policy<TOutcome = { allowed: boolean }, TFacts = AccessFacts> {
	rules: Rule<TFacts>[];
	resolve: (results: RuleResult[], facts: TFacts) => TOutcome;
}
