import { describe, expect, test } from 'vitest';
import { createSlotLedger } from '../src/ledger.js';
import { resolveConflict, validateSlot, type ValidateSlotOptions } from '../src/resolver.js';
import type { SlotRequest } from '../src/types.js';

const d = (iso: string) => new Date(iso);
const utc: ValidateSlotOptions = { timezone: 'UTC', slotMinutes: 15 };

function reasonFor(slot: SlotRequest, options: ValidateSlotOptions = utc) {
	const result = validateSlot(slot, options);
	return result.ok ? null : result.error.reason;
}

describe('validateSlot', () => {
	test('accepts a well-formed slot and returns its UTC interval', () => {
		const result = validateSlot({ date: '2024-05-01', start: '10:00', end: '11:00' }, utc);

		expect(result).toEqual({
			ok: true,
			interval: { start: d('2024-05-01T10:00:00Z'), end: d('2024-05-01T11:00:00Z') },
		});
	});

	test('reads local times in the configured timezone', () => {
		const result = validateSlot(
			{ date: '2024-05-01', start: '10:00', end: '11:00' },
			{ timezone: 'Europe/Moscow', slotMinutes: 15 }
		);

		expect(result).toEqual({
			ok: true,
			interval: { start: d('2024-05-01T07:00:00Z'), end: d('2024-05-01T08:00:00Z') },
		});
	});

	test('accepts 24:00 as the end of the day', () => {
		const result = validateSlot({ date: '2024-05-01', start: '23:00', end: '24:00' }, utc);

		expect(result).toEqual({
			ok: true,
			interval: { start: d('2024-05-01T23:00:00Z'), end: d('2024-05-02T00:00:00Z') },
		});
	});

	test('rejects malformed and impossible dates', () => {
		expect(reasonFor({ date: '2024-5-1', start: '10:00', end: '11:00' })).toBe('malformed-date');
		expect(reasonFor({ date: '2023-02-29', start: '10:00', end: '11:00' })).toBe('malformed-date');
	});

	test('rejects malformed times and 24:00 as a start', () => {
		expect(reasonFor({ date: '2024-05-01', start: '9:00', end: '11:00' })).toBe('malformed-time');
		expect(reasonFor({ date: '2024-05-01', start: '10:00', end: '25:00' })).toBe('malformed-time');
		expect(reasonFor({ date: '2024-05-01', start: '24:00', end: '24:00' })).toBe('malformed-time');
	});

	test('rejects zero-length before anything about order', () => {
		expect(reasonFor({ date: '2024-05-01', start: '12:00', end: '12:00' })).toBe('zero-length');
	});

	test('rejects an end before the start', () => {
		expect(reasonFor({ date: '2024-05-01', start: '12:00', end: '11:00' })).toBe('non-chronological');
	});

	test('rejects times off the grid instead of rounding them', () => {
		const result = validateSlot({ date: '2024-05-01', start: '10:05', end: '11:00' }, utc);

		expect(result).toEqual({
			ok: false,
			error: {
				kind: 'validation',
				reason: 'off-grid',
				message: 'Start and end must fall on the booking grid. The grid is 15 minutes.',
			},
		});
	});

	test('a one-minute grid accepts any minute', () => {
		expect(reasonFor({ date: '2024-05-01', start: '10:05', end: '10:07' }, { timezone: 'UTC', slotMinutes: 1 })).toBe(
			null
		);
	});

	test('rejects times skipped by a daylight-saving jump instead of shifting them', () => {
		const newYork: ValidateSlotOptions = { timezone: 'America/New_York', slotMinutes: 15 };

		expect(validateSlot({ date: '2024-03-10', start: '01:45', end: '02:15' }, newYork)).toEqual({
			ok: false,
			error: {
				kind: 'validation',
				reason: 'nonexistent-time',
				message: 'That time does not exist on this date; the clocks skip it. Timezone: America/New_York.',
			},
		});
		expect(reasonFor({ date: '2024-03-10', start: '02:00', end: '02:15' }, newYork)).toBe('nonexistent-time');
		expect(reasonFor({ date: '2024-03-10', start: '02:30', end: '04:00' }, newYork)).toBe('nonexistent-time');
	});

	test('a range spanning a daylight-saving jump covers only the real time', () => {
		const result = validateSlot(
			{ date: '2024-03-10', start: '01:45', end: '03:00' },
			{ timezone: 'America/New_York', slotMinutes: 15 }
		);

		expect(result).toEqual({
			ok: true,
			interval: { start: d('2024-03-10T06:45:00Z'), end: d('2024-03-10T07:00:00Z') },
		});
	});

	test('rejects slots starting at or before now', () => {
		const options = { ...utc, now: d('2024-05-01T10:00:00Z') };

		expect(reasonFor({ date: '2024-05-01', start: '10:00', end: '11:00' }, options)).toBe('in-past');
		expect(reasonFor({ date: '2024-04-30', start: '10:00', end: '11:00' }, options)).toBe('in-past');
		expect(reasonFor({ date: '2024-05-01', start: '10:15', end: '11:00' }, options)).toBe(null);
	});
});

describe('resolveConflict', () => {
	function ledgerWith(...ranges: [string, string][]) {
		const ledger = createSlotLedger();
		let n = 0;
		for (const [start, end] of ranges) {
			const result = ledger.add({
				userId: 1,
				date: '2024-05-01',
				start,
				end,
				label: `booking ${++n}`,
				interval: { start: d(`2024-05-01T${start}:00Z`), end: d(`2024-05-01T${end}:00Z`) },
			});
			if (!result.ok) throw new Error('fixture overlaps');
		}
		return ledger;
	}

	test('accepts on an empty date', () => {
		expect(resolveConflict([], { start: d('2024-05-01T10:00:00Z'), end: d('2024-05-01T11:00:00Z') })).toEqual({
			decision: 'accept',
		});
	});

	test('rejects with the overlapping booking', () => {
		const ledger = ledgerWith(['10:00', '11:00']);

		const decision = resolveConflict(ledger.listForDate('2024-05-01'), {
			start: d('2024-05-01T10:30:00Z'),
			end: d('2024-05-01T11:30:00Z'),
		});

		expect(decision.decision).toBe('reject');
		expect(decision.decision === 'reject' && decision.conflict.label).toBe('booking 1');
	});

	test('bookings may share a boundary', () => {
		const ledger = ledgerWith(['10:00', '11:00'], ['12:00', '13:00']);

		const decision = resolveConflict(ledger.listForDate('2024-05-01'), {
			start: d('2024-05-01T11:00:00Z'),
			end: d('2024-05-01T12:00:00Z'),
		});

		expect(decision).toEqual({ decision: 'accept' });
	});

	test('names the earliest of several conflicts', () => {
		const ledger = ledgerWith(['09:00', '10:00'], ['10:00', '11:00'], ['11:00', '12:00']);

		const decision = resolveConflict(ledger.listForDate('2024-05-01'), {
			start: d('2024-05-01T09:30:00Z'),
			end: d('2024-05-01T11:30:00Z'),
		});

		expect(decision.decision === 'reject' && decision.conflict.start).toBe('09:00');
	});

	test('a request enclosing a booking conflicts with it', () => {
		const ledger = ledgerWith(['10:15', '10:30']);

		const decision = resolveConflict(ledger.listForDate('2024-05-01'), {
			start: d('2024-05-01T10:00:00Z'),
			end: d('2024-05-01T11:00:00Z'),
		});

		expect(decision.decision === 'reject' && decision.conflict.start).toBe('10:15');
	});
});
