import { describe, expect, test } from 'vitest';
import {
	addMinutes,
	eachCalendarDate,
	isCalendarDate,
	isExistingLocalTime,
	isLocalTime,
	localDateOf,
	localTimeOf,
	minutesOfDay,
	nextCalendarDate,
	parseCalendarDate,
	parseDurationMinutes,
	parseLocalTime,
	toInterval,
} from '../src/calendar.js';

const d = (iso: string) => new Date(iso);

describe('parseCalendarDate', () => {
	const reference = d('2024-03-10T12:00:00Z');

	test('accepts ISO dates', () => {
		expect(parseCalendarDate('2024-05-01', reference)).toBe('2024-05-01');
	});

	test('accepts day.month.year', () => {
		expect(parseCalendarDate('01.05.2024', reference)).toBe('2024-05-01');
		expect(parseCalendarDate('1.5.2025', reference)).toBe('2025-05-01');
	});

	test('takes the reference year for year-less input', () => {
		expect(parseCalendarDate('05-01', reference)).toBe('2024-05-01');
		expect(parseCalendarDate('01.05', d('2025-03-10T12:00:00Z'))).toBe('2025-05-01');
	});

	test('reads the reference year in the given timezone', () => {
		const newYearInTokyo = d('2024-12-31T22:00:00Z');
		expect(parseCalendarDate('02.01', newYearInTokyo, 'Asia/Tokyo')).toBe('2025-01-02');
		expect(parseCalendarDate('02.01', newYearInTokyo, 'UTC')).toBe('2024-01-02');
	});

	test('trims surrounding whitespace', () => {
		expect(parseCalendarDate('  2024-05-01 ', reference)).toBe('2024-05-01');
	});

	test('returns null for impossible or unknown input', () => {
		expect(parseCalendarDate('31.02.2024', reference)).toBeNull();
		expect(parseCalendarDate('2024-13-01', reference)).toBeNull();
		expect(parseCalendarDate('tomorrow', reference)).toBeNull();
		expect(parseCalendarDate('', reference)).toBeNull();
	});
});

describe('parseLocalTime', () => {
	test('normalizes to HH:MM', () => {
		expect(parseLocalTime('9:05')).toBe('09:05');
		expect(parseLocalTime('10:00:00')).toBe('10:00');
	});

	test('rejects non-zero seconds and out-of-range values', () => {
		expect(parseLocalTime('10:00:30')).toBeNull();
		expect(parseLocalTime('24:00')).toBeNull();
		expect(parseLocalTime('12:60')).toBeNull();
		expect(parseLocalTime('noon')).toBeNull();
	});
});

describe('parseDurationMinutes', () => {
	test('accepts plain minutes and H:MM', () => {
		expect(parseDurationMinutes('90')).toBe(90);
		expect(parseDurationMinutes('1:30')).toBe(90);
		expect(parseDurationMinutes('0:45')).toBe(45);
	});

	test('rejects zero, malformed and out-of-range values', () => {
		expect(parseDurationMinutes('0')).toBeNull();
		expect(parseDurationMinutes('0:00')).toBeNull();
		expect(parseDurationMinutes('1:75')).toBeNull();
		expect(parseDurationMinutes('-15')).toBeNull();
		expect(parseDurationMinutes('an hour')).toBeNull();
	});
});

describe('local time arithmetic', () => {
	test('minutesOfDay counts 24:00 as the end of the day', () => {
		expect(minutesOfDay('00:00')).toBe(0);
		expect(minutesOfDay('10:30')).toBe(630);
		expect(minutesOfDay('24:00')).toBe(1440);
	});

	test('addMinutes stays within the day', () => {
		expect(addMinutes('10:00', 90)).toBe('11:30');
		expect(addMinutes('23:30', 30)).toBe('24:00');
		expect(addMinutes('23:30', 45)).toBeNull();
		expect(addMinutes('00:10', -15)).toBeNull();
	});
});

describe('validation', () => {
	test('isCalendarDate rejects impossible dates and loose formats', () => {
		expect(isCalendarDate('2024-02-29')).toBe(true);
		expect(isCalendarDate('2023-02-29')).toBe(false);
		expect(isCalendarDate('2024-5-1')).toBe(false);
	});

	test('isLocalTime only admits 24:00 when asked', () => {
		expect(isLocalTime('23:59')).toBe(true);
		expect(isLocalTime('24:00')).toBe(false);
		expect(isLocalTime('24:00', { allowEndOfDay: true })).toBe(true);
		expect(isLocalTime('9:00')).toBe(false);
	});
});

describe('zoned conversion', () => {
	test('toInterval reads local times in the given timezone', () => {
		expect(toInterval('2024-05-01', { start: '10:00', end: '11:00' }, 'Europe/Moscow')).toEqual({
			start: d('2024-05-01T07:00:00Z'),
			end: d('2024-05-01T08:00:00Z'),
		});
	});

	test('toInterval maps 24:00 to the next midnight', () => {
		expect(toInterval('2024-05-01', { start: '23:00', end: '24:00' }, 'UTC')).toEqual({
			start: d('2024-05-01T23:00:00Z'),
			end: d('2024-05-02T00:00:00Z'),
		});
	});

	test('localDateOf and localTimeOf read the wall clock', () => {
		const instant = d('2024-05-01T22:30:00Z');
		expect(localDateOf(instant, 'Europe/Moscow')).toBe('2024-05-02');
		expect(localTimeOf(instant, 'Europe/Moscow')).toBe('01:30');
		expect(localDateOf(instant, 'UTC')).toBe('2024-05-01');
	});

	test('isExistingLocalTime rejects wall-clock times skipped by a spring-forward jump', () => {
		expect(isExistingLocalTime('2024-03-10', '01:45', 'America/New_York')).toBe(true);
		expect(isExistingLocalTime('2024-03-10', '02:00', 'America/New_York')).toBe(false);
		expect(isExistingLocalTime('2024-03-10', '02:30', 'America/New_York')).toBe(false);
		expect(isExistingLocalTime('2024-03-10', '03:00', 'America/New_York')).toBe(true);
		expect(isExistingLocalTime('2024-03-11', '02:30', 'America/New_York')).toBe(true);
	});

	test('isExistingLocalTime treats 24:00 as the next midnight', () => {
		expect(isExistingLocalTime('2024-05-01', '24:00', 'UTC')).toBe(true);
		expect(isExistingLocalTime('2024-05-01', '24:00', 'Europe/Moscow')).toBe(true);
	});

	test('nextCalendarDate crosses month and leap-day boundaries', () => {
		expect(nextCalendarDate('2024-02-28')).toBe('2024-02-29');
		expect(nextCalendarDate('2024-12-31')).toBe('2025-01-01');
		expect(() => nextCalendarDate('2024-02-30')).toThrow(RangeError);
	});

	test('eachCalendarDate is inclusive', () => {
		expect(eachCalendarDate('2024-02-28', '2024-03-01')).toEqual(['2024-02-28', '2024-02-29', '2024-03-01']);
		expect(eachCalendarDate('2024-03-01', '2024-02-28')).toEqual([]);
	});
});
