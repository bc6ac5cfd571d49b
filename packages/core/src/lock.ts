/**
 * Keyed mutual exclusion for shared in-memory state.
 */

import pLimit, { type LimitFunction } from 'p-limit';

/**
 * Runs tasks one at a time per key; tasks under different keys run freely.
 */
export interface KeyedLock {
	/**
	 * Run `task` once every earlier task for `key` has settled.
	 * The task's result or rejection is passed through.
	 */
	run<T>(key: string, task: () => T | Promise<T>): Promise<T>;
	/** Number of keys with running or queued tasks. */
	readonly activeKeys: number;
}

/**
 * Create a keyed lock. Each key gets a concurrency-1 limiter for as long as it
 * has work queued; idle keys are dropped.
 *
 * @example
 * ```typescript
 * const lock = createKeyedLock();
 * await lock.run('2024-05-01', async () => {
 *   // check-then-act on that date's bookings
 * });
 * ```
 */
export function createKeyedLock(): KeyedLock {
	const entries = new Map<string, { limiter: LimitFunction; holders: number }>();

	async function run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
		const entry = entries.get(key) ?? { limiter: pLimit(1), holders: 0 };
		entries.set(key, entry);
		entry.holders++;

		try {
			return await entry.limiter(async () => task());
		} finally {
			entry.holders--;
			if (entry.holders === 0) {
				entries.delete(key);
			}
		}
	}

	return {
		run,
		get activeKeys() {
			return entries.size;
		},
	};
}
