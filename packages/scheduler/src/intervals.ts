/**
 * Interval arithmetic for working out free time around bookings.
 * All intervals are half-open [start, end), meaning start is inclusive and end is exclusive.
 */

import { intervalsOverlap, type Interval } from '@slotkeeper/core';

export type { Interval };

function cloneInterval(interval: Interval): Interval {
	return {
		start: new Date(interval.start.getTime()),
		end: new Date(interval.end.getTime()),
	};
}

function byStartThenEnd(a: Interval, b: Interval): number {
	const startDiff = a.start.getTime() - b.start.getTime();
	if (startDiff !== 0) return startDiff;
	return a.end.getTime() - b.end.getTime();
}

/**
 * Merges overlapping or adjacent intervals into a sorted list of non-overlapping intervals.
 * Empty and inverted intervals are dropped; the input is not mutated.
 *
 * @example
 * ```typescript
 * mergeIntervals([
 *   { start: new Date('2024-05-01T10:00:00Z'), end: new Date('2024-05-01T11:00:00Z') },
 *   { start: new Date('2024-05-01T11:00:00Z'), end: new Date('2024-05-01T12:00:00Z') },
 * ]);
 * // [{ start: 2024-05-01T10:00:00Z, end: 2024-05-01T12:00:00Z }]
 * ```
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
	const valid = intervals.filter((interval) => interval.start < interval.end).map(cloneInterval);
	if (valid.length === 0) {
		return [];
	}

	valid.sort(byStartThenEnd);

	const merged: Interval[] = [valid[0]];
	for (const current of valid.slice(1)) {
		const last = merged[merged.length - 1];
		// [a, b) and [b, c) touch, so they merge
		if (current.start <= last.end) {
			if (current.end > last.end) {
				last.end = current.end;
			}
		} else {
			merged.push(current);
		}
	}

	return merged;
}

/**
 * Removes all time covered by `subtract` from `from`, splitting intervals where
 * a subtraction lands in the middle.
 *
 * @example
 * ```typescript
 * subtractIntervals(
 *   [{ start: new Date('2024-05-01T00:00:00Z'), end: new Date('2024-05-02T00:00:00Z') }],
 *   [{ start: new Date('2024-05-01T10:00:00Z'), end: new Date('2024-05-01T11:00:00Z') }],
 * );
 * // [
 * //   { start: 2024-05-01T00:00:00Z, end: 2024-05-01T10:00:00Z },
 * //   { start: 2024-05-01T11:00:00Z, end: 2024-05-02T00:00:00Z }
 * // ]
 * ```
 */
export function subtractIntervals(from: Interval[], subtract: Interval[]): Interval[] {
	const base = mergeIntervals(from);
	const holes = mergeIntervals(subtract);
	if (holes.length === 0) {
		return base;
	}

	const result: Interval[] = [];
	for (const interval of base) {
		let remaining: Interval[] = [interval];

		for (const hole of holes) {
			const next: Interval[] = [];
			for (const piece of remaining) {
				if (!intervalsOverlap(piece, hole)) {
					next.push(piece);
					continue;
				}
				if (piece.start < hole.start) {
					next.push({ start: piece.start, end: new Date(hole.start.getTime()) });
				}
				if (piece.end > hole.end) {
					next.push({ start: new Date(hole.end.getTime()), end: piece.end });
				}
			}
			remaining = next;
		}

		result.push(...remaining);
	}

	return result.sort(byStartThenEnd);
}
