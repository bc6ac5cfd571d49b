/**
 * Slotkeeper Core
 *
 * Shared time primitives, calendar parsing, locks, logging and configuration
 * for Slotkeeper packages. All intervals are half-open: [start, end)
 */

export type { CalendarDate, Interval, LocalTime, LocalTimeRange, UserId } from './types.js';

export {
	END_OF_DAY,
	addMinutes,
	eachCalendarDate,
	intervalContains,
	intervalsOverlap,
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
	zonedInstant,
} from './calendar.js';

export { createKeyedLock, type KeyedLock } from './lock.js';

export {
	consoleSink,
	createLogger,
	silentLogger,
	type LogContext,
	type LogLevel,
	type LogRecord,
	type LogSink,
	type Logger,
	type LoggerOptions,
} from './logger.js';

export { ConfigError, loadConfig, type SlotkeeperConfig } from './config.js';
