/**
 * Line Formatter
 *
 * Default text layout for sink lines and the level gate in front of it.
 */
import { LOG_LEVEL_PRIORITY, type LineFormatter, type LogLevel } from './types.js';


/**
 * Format a line as `[timestamp] [LEVEL] message`.
 *
 * @example
 * ```typescript
 * formatLine('warn', 'disk almost full', new Date('2024-01-15T10:30:45.000Z'))
 * // '[2024-01-15T10:30:45.000Z] [WARN ] disk almost full\n'
 * ```
 */
export const formatLine: LineFormatter = (level, message, timestamp) => {

    const levelLabel = level.toUpperCase().padEnd(5);

    return `[${timestamp.toISOString()}] [${levelLabel}] ${message}\n`;

};


/**
 * Write the message untouched, adding a newline when missing.
 *
 * Used when the input is already formatted, e.g. piped from another program.
 */
export const rawLine: LineFormatter = (_level, message) => {

    return message.endsWith('\n') ? message : `${message}\n`;

};


/**
 * Check if a level passes the configured minimum.
 */
export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {

    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minimum];

}
