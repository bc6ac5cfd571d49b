/**
 * Parsing of role-list files: one numeric user ID per line, `#` comments.
 */

import type { RoleListLine } from './types.js';

const COMMENT_MARKER = '#';
const USER_ID = /^-?\d+$/;

/**
 * Parse one line of a role list.
 *
 * Blank lines and lines starting with `#` are skipped. An ID may be followed by
 * a `# comment`. Anything else that is not a safe integer is malformed.
 *
 * @param text - Raw line content
 * @param line - 1-based line number, carried into the result
 *
 * @example
 * ```typescript
 * parseRoleListLine('123456789  # stage manager', 3);
 * // { kind: 'ok', line: 3, userId: 123456789 }
 * ```
 */
export function parseRoleListLine(text: string, line: number): RoleListLine {
	const trimmed = text.trim();
	if (trimmed.length === 0 || trimmed.startsWith(COMMENT_MARKER)) {
		return { kind: 'skip', line };
	}

	const commentAt = trimmed.indexOf(COMMENT_MARKER);
	const value = (commentAt === -1 ? trimmed : trimmed.slice(0, commentAt)).trim();

	if (!USER_ID.test(value)) {
		return { kind: 'malformed', line, content: text, reason: `Not a numeric user ID: "${value}"` };
	}

	const userId = Number(value);
	if (!Number.isSafeInteger(userId)) {
		return { kind: 'malformed', line, content: text, reason: `User ID out of range: ${value}` };
	}

	return { kind: 'ok', line, userId };
}

/**
 * Parse every line of a role list. Accepts a whole file's text or its lines.
 */
export function parseRoleList(input: string | Iterable<string>): RoleListLine[] {
	const lines = typeof input === 'string' ? input.split(/\r?\n/) : input;
	const parsed: RoleListLine[] = [];
	let lineNumber = 0;
	for (const text of lines) {
		lineNumber++;
		parsed.push(parseRoleListLine(text, lineNumber));
	}
	return parsed;
}
