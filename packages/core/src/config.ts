/**
 * Environment-driven configuration.
 */

import { z } from 'zod';

function isTimezone(value: string): boolean {
	try {
		new Intl.DateTimeFormat('en-US', { timeZone: value });
		return true;
	} catch {
		return false;
	}
}

const booleanFlag = z
	.enum(['true', 'false', '1', '0', 'yes', 'no'])
	.transform((value) => value === 'true' || value === '1' || value === 'yes');

const configSchema = z.object({
	SLOTKEEPER_DATA_DIR: z.string().min(1).default('./data'),
	SLOTKEEPER_TIMEZONE: z.string().refine(isTimezone, 'must be an IANA timezone').default('UTC'),
	SLOTKEEPER_SLOT_MINUTES: z.coerce.number().int().min(1).max(60).default(15),
	SLOTKEEPER_FLUSH_MODE: z.enum(['inline', 'background']).default('inline'),
	SLOTKEEPER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	SLOTKEEPER_NEGATIVE_IDS_ARE_ADMINS: booleanFlag.default('false'),
});

export interface SlotkeeperConfig {
	dataDir: string;
	timezone: string;
	slotMinutes: number;
	flushMode: 'inline' | 'background';
	logLevel: 'debug' | 'info' | 'warn' | 'error';
	negativeIdsAreAdmins: boolean;
}

/**
 * Raised when one or more environment variables fail validation.
 */
export class ConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join('; ')}`);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

/**
 * Read configuration from environment variables.
 * Unset or empty variables take their defaults.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): SlotkeeperConfig {
	const present: Record<string, string> = {};
	for (const key of Object.keys(configSchema.shape)) {
		const value = env[key]?.trim();
		if (value) present[key] = value;
	}

	const result = configSchema.safeParse(present);
	if (!result.success) {
		throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
	}

	const parsed = result.data;
	return {
		dataDir: parsed.SLOTKEEPER_DATA_DIR,
		timezone: parsed.SLOTKEEPER_TIMEZONE,
		slotMinutes: parsed.SLOTKEEPER_SLOT_MINUTES,
		flushMode: parsed.SLOTKEEPER_FLUSH_MODE,
		logLevel: parsed.SLOTKEEPER_LOG_LEVEL,
		negativeIdsAreAdmins: parsed.SLOTKEEPER_NEGATIVE_IDS_ARE_ADMINS,
	};
}
