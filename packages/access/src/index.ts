/**
 * @slotkeeper/access
 *
 * Role registry and authorization policy for the auditorium.
 * Answers the question: "May this user book, or administer?"
 */

// ============================================================================
// Types
// ============================================================================

export type {
	// Role types
	Role,
	Privilege,
	Membership,
	UserProfile,
	UserId,
	// Snapshot types
	RoleRecord,
	RoleSnapshot,
	// Role list types
	RoleListLine,
	BulkLoadFailure,
	BulkLoadReport,
	// Rule types
	AccessFacts,
	RuleResult,
	Rule,
	// Decision types
	Reason,
	Trace,
	Decision,
	Policy,
} from './types.js';

// ============================================================================
// Policy Engine
// ============================================================================

export {
	evaluate,
	resolveAnyMustAllow,
	createPolicy,
	createRule,
	allow,
	skip,
	privilegePolicies,
} from './policy.js';

// ============================================================================
// Role Lists
// ============================================================================

export { parseRoleList, parseRoleListLine } from './lists.js';

// ============================================================================
// Registry
// ============================================================================

export { createAccessRegistry, type AccessRegistry, type AccessRegistryOptions } from './registry.js';
