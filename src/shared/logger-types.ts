/**
 * Shared logger types used by the harness core and the CLI
 */

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Priority mapping for log levels used in filtering.
 * Lower numbers = more verbose, higher numbers = more severe.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Default maximum log buffer size (number of entries to keep)
 */
export const DEFAULT_MAX_LOGS = 1000;

/**
 * System log entry
 */
export interface SystemLogEntry {
	/** Unix timestamp in milliseconds */
	timestamp: number;
	/** Log level */
	level: LogLevel;
	/** Log message */
	message: string;
	/** Optional context identifier (e.g., component name) */
	context?: string;
	/** Optional additional data */
	data?: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Check if a log level should be logged given the minimum level.
 */
export function shouldLogLevel(level: LogLevel, minLevel: LogLevel): boolean {
	return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}
