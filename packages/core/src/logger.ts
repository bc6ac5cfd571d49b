/**
 * Structured JSON-line logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'authorization', 'apikey', 'api_key'];

export interface LogContext {
	userId?: number;
	actorId?: number;
	bookingId?: string;
	date?: string;
	start?: string;
	end?: string;
	role?: string;
	reason?: string;
	durationMs?: number;
	error?: Error | string;
	[key: string]: unknown;
}

/**
 * A fully formed log record, as handed to a sink.
 */
export interface LogRecord {
	level: LogLevel;
	timestamp: string;
	message: string;
	[key: string]: unknown;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
	/** A logger that adds `bindings` to every record. */
	child(bindings: LogContext): Logger;
}

export interface LoggerOptions {
	level?: LogLevel;
	sink?: LogSink;
	now?: () => Date;
}

function sanitize(context: LogContext): Record<string, unknown> {
	const sanitized: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(context)) {
		if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk))) {
			sanitized[key] = '[REDACTED]';
		} else if (value instanceof Error) {
			sanitized[key] = value.message;
			if (value.stack) sanitized.stack = value.stack;
		} else {
			sanitized[key] = value;
		}
	}
	return sanitized;
}

/**
 * Writes each record as one JSON line; warnings and errors go to stderr.
 */
export const consoleSink: LogSink = (record) => {
	const line = JSON.stringify(record);
	if (record.level === 'error') {
		console.error(line);
	} else if (record.level === 'warn') {
		console.warn(line);
	} else {
		console.log(line);
	}
};

/**
 * Create a logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * logger.info('Booking accepted', { userId: 42, date: '2024-05-01' });
 * // {"level":"info","timestamp":"...","message":"Booking accepted","userId":42,"date":"2024-05-01"}
 * ```
 */
export function createLogger(options: LoggerOptions = {}, bindings: LogContext = {}): Logger {
	const { level = 'info', sink = consoleSink, now = () => new Date() } = options;
	const threshold = LEVEL_ORDER[level];

	function write(recordLevel: LogLevel, message: string, context?: LogContext): void {
		if (LEVEL_ORDER[recordLevel] < threshold) return;
		sink({
			...sanitize({ ...bindings, ...context }),
			level: recordLevel,
			timestamp: now().toISOString(),
			message,
		});
	}

	return {
		debug: (message, context) => write('debug', message, context),
		info: (message, context) => write('info', message, context),
		warn: (message, context) => write('warn', message, context),
		error: (message, context) => write('error', message, context),
		child: (extra) => createLogger(options, { ...bindings, ...extra }),
	};
}

/**
 * A logger that drops everything.
 */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
	child: () => silentLogger,
};
