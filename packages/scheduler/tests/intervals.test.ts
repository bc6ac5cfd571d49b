import { describe, expect, test } from 'vitest';
import { mergeIntervals, subtractIntervals } from '../src/intervals.js';

const d = (iso: string) => new Date(iso);

describe('mergeIntervals', () => {
	test('returns empty array for empty input', () => {
		expect(mergeIntervals([])).toEqual([]);
	});

	test('merges overlapping and touching intervals', () => {
		const merged = mergeIntervals([
			{ start: d('2024-05-01T13:00:00Z'), end: d('2024-05-01T14:00:00Z') },
			{ start: d('2024-05-01T10:00:00Z'), end: d('2024-05-01T11:30:00Z') },
			{ start: d('2024-05-01T11:00:00Z'), end: d('2024-05-01T12:00:00Z') },
			{ start: d('2024-05-01T12:00:00Z'), end: d('2024-05-01T12:15:00Z') },
		]);

		expect(merged).toEqual([
			{ start: d('2024-05-01T10:00:00Z'), end: d('2024-05-01T12:15:00Z') },
			{ start: d('2024-05-01T13:00:00Z'), end: d('2024-05-01T14:00:00Z') },
		]);
	});

	test('drops empty and inverted intervals', () => {
		const merged = mergeIntervals([
			{ start: d('2024-05-01T10:00:00Z'), end: d('2024-05-01T10:00:00Z') },
			{ start: d('2024-05-01T12:00:00Z'), end: d('2024-05-01T11:00:00Z') },
		]);
		expect(merged).toEqual([]);
	});

	test('does not mutate its input', () => {
		const first = { start: d('2024-05-01T10:00:00Z'), end: d('2024-05-01T11:00:00Z') };
		const second = { start: d('2024-05-01T10:30:00Z'), end: d('2024-05-01T12:00:00Z') };

		mergeIntervals([first, second]);

		expect(first.end).toEqual(d('2024-05-01T11:00:00Z'));
	});
});

describe('subtractIntervals', () => {
	const day = { start: d('2024-05-01T00:00:00Z'), end: d('2024-05-02T00:00:00Z') };

	test('returns the base when nothing is subtracted', () => {
		expect(subtractIntervals([day], [])).toEqual([day]);
	});

	test('splits around a booking in the middle', () => {
		const free = subtractIntervals([day], [{ start: d('2024-05-01T10:00:00Z'), end: d('2024-05-01T11:00:00Z') }]);

		expect(free).toEqual([
			{ start: d('2024-05-01T00:00:00Z'), end: d('2024-05-01T10:00:00Z') },
			{ start: d('2024-05-01T11:00:00Z'), end: d('2024-05-02T00:00:00Z') },
		]);
	});

	test('removes adjacent bookings as one block', () => {
		const free = subtractIntervals(
			[day],
			[
				{ start: d('2024-05-01T11:00:00Z'), end: d('2024-05-01T12:00:00Z') },
				{ start: d('2024-05-01T10:00:00Z'), end: d('2024-05-01T11:00:00Z') },
			]
		);

		expect(free).toEqual([
			{ start: d('2024-05-01T00:00:00Z'), end: d('2024-05-01T10:00:00Z') },
			{ start: d('2024-05-01T12:00:00Z'), end: d('2024-05-02T00:00:00Z') },
		]);
	});

	test('bookings at the edges of the day leave no slivers', () => {
		const free = subtractIntervals(
			[day],
			[
				{ start: d('2024-05-01T00:00:00Z'), end: d('2024-05-01T08:00:00Z') },
				{ start: d('2024-05-01T20:00:00Z'), end: d('2024-05-02T00:00:00Z') },
			]
		);

		expect(free).toEqual([{ start: d('2024-05-01T08:00:00Z'), end: d('2024-05-01T20:00:00Z') }]);
	});

	test('a booking covering the whole day leaves nothing', () => {
		expect(subtractIntervals([day], [day])).toEqual([]);
	});
});
