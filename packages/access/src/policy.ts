/**
 * Policy evaluation engine.
 */

import type { AccessFacts, Decision, Policy, Privilege, Reason, Rule, RuleResult } from './types.js';

// ============================================================================
// Policy Evaluation
// ============================================================================

/**
 * Evaluate a policy against a set of facts.
 *
 * @param policy - The policy to evaluate
 * @param facts - Facts the rules examine
 * @param at - Evaluation time recorded in the trace
 * @returns The decision with one reason per rule
 */
export function evaluate<TOutcome, TFacts>(
	policy: Policy<TOutcome, TFacts>,
	facts: TFacts,
	at: Date = new Date()
): Decision<TOutcome, TFacts> {
	const startTime = performance.now();

	const results: RuleResult[] = [];
	const reasons: Reason[] = [];
	for (const rule of policy.rules) {
		const result = rule.evaluate(facts);
		results.push(result);
		reasons.push({
			rule: rule.id,
			outcome: result.outcome,
			explanation: result.explanation,
		});
	}

	return {
		outcome: policy.resolve(results, facts),
		reasons,
		trace: {
			evaluatedAt: at,
			durationMs: performance.now() - startTime,
			facts,
		},
	};
}

// ============================================================================
// Common Resolution Strategies
// ============================================================================

/**
 * Resolution strategy: Any rule must allow, and none may deny.
 * A policy whose rules all skip is denied.
 */
export function resolveAnyMustAllow(results: RuleResult[]): { allowed: boolean } {
	const allowed = results.some((r) => r.outcome === 'allow');
	const denied = results.some((r) => r.outcome === 'deny');
	return { allowed: allowed && !denied };
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Create a policy with type inference.
 */
export function createPolicy<TOutcome, TFacts = AccessFacts>(config: {
	rules: Rule<TFacts>[];
	resolve: (results: RuleResult[], facts: TFacts) => TOutcome;
}): Policy<TOutcome, TFacts> {
	return config;
}

/**
 * Create a rule with type inference.
 */
export function createRule<TFacts = AccessFacts>(config: {
	id: string;
	description: string;
	evaluate: (facts: TFacts) => RuleResult;
}): Rule<TFacts> {
	return config;
}

/**
 * Create an allow result.
 */
export function allow(explanation: string): RuleResult {
	return { outcome: 'allow', explanation };
}

/**
 * Create a skip result.
 */
export function skip(explanation: string): RuleResult {
	return { outcome: 'skip', explanation };
}

// ============================================================================
// Auditorium Policies
// ============================================================================

const administratorRule = createRule({
	id: 'is-admin',
	description: 'Administrators hold every privilege',
	evaluate: ({ membership }) =>
		membership.isAdmin ? allow('User is an administrator') : skip('User is not an administrator'),
});

const whitelistRule = createRule({
	id: 'is-whitelisted',
	description: 'Whitelisted users may book the auditorium',
	evaluate: ({ membership }) =>
		membership.isWhitelisted ? allow('User is whitelisted') : skip('User is not whitelisted'),
});

/**
 * Built-in policies, one per privilege.
 * `administer` requires the admin flag; `book` requires admin or whitelisted.
 */
export const privilegePolicies: Record<Privilege, Policy> = {
	administer: createPolicy({
		rules: [administratorRule],
		resolve: resolveAnyMustAllow,
	}),
	book: createPolicy({
		rules: [administratorRule, whitelistRule],
		resolve: resolveAnyMustAllow,
	}),
};
