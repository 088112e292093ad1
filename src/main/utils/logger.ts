/**
 * Structured logging utility for the harness
 * Logs are kept in memory, streamed to the console and optionally appended to a file.
 *
 * File logging writes to:
 * ~/.config/fwtest/logs/fwtest-debug.log (or $XDG_CONFIG_HOME/fwtest/logs)
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
	type LogLevel,
	type SystemLogEntry,
	DEFAULT_MAX_LOGS,
	shouldLogLevel,
} from '../../shared/logger-types';

export type { LogLevel, SystemLogEntry as LogEntry };

/**
 * Get the default path of the debug log file.
 */
function getLogFilePath(): string {
	const configDir = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
	return path.join(configDir, 'fwtest', 'logs', 'fwtest-debug.log');
}

export class Logger extends EventEmitter {
	private logs: SystemLogEntry[] = [];
	private maxLogs = DEFAULT_MAX_LOGS;
	private minLevel: LogLevel = 'info';
	private consoleEnabled = true;
	private fileLogEnabled = false;
	private logFilePath: string;
	private logFileStream: fs.WriteStream | null = null;

	constructor() {
		super();
		this.logFilePath = getLogFilePath();
	}

	/**
	 * Enable logging to a file (append mode).
	 *
	 * @param filePath - Overrides the default log file location
	 */
	enableFileLogging(filePath?: string): void {
		if (this.fileLogEnabled) return;
		if (filePath) {
			this.logFilePath = filePath;
		}

		try {
			fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
			this.logFileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
			this.fileLogEnabled = true;

			const startupMsg = `\n${'='.repeat(80)}\n[${new Date().toISOString()}] fwtest started - File logging enabled\nPlatform: ${process.platform}, Node: ${process.version}\nLog file: ${this.logFilePath}\n${'='.repeat(80)}\n`;
			this.logFileStream.write(startupMsg);
		} catch (error) {
			console.error(`[Logger] Failed to enable file logging:`, error);
		}
	}

	disableFileLogging(): void {
		if (!this.fileLogEnabled) return;

		if (this.logFileStream) {
			this.logFileStream.end();
			this.logFileStream = null;
		}
		this.fileLogEnabled = false;
	}

	getLogFilePath(): string {
		return this.logFilePath;
	}

	isFileLoggingEnabled(): boolean {
		return this.fileLogEnabled;
	}

	/**
	 * Turn console mirroring on or off. The CLI turns it off in JSON mode
	 * so that stdout carries only JSON lines.
	 */
	setConsoleOutput(enabled: boolean): void {
		this.consoleEnabled = enabled;
	}

	setLogLevel(level: LogLevel): void {
		this.minLevel = level;
	}

	getLogLevel(): LogLevel {
		return this.minLevel;
	}

	setMaxLogBuffer(max: number): void {
		this.maxLogs = max;
		if (this.logs.length > this.maxLogs) {
			this.logs = this.logs.slice(-this.maxLogs);
		}
	}

	getMaxLogBuffer(): number {
		return this.maxLogs;
	}

	private addLog(entry: SystemLogEntry): void {
		this.logs.push(entry);

		// Keep only the last maxLogs entries
		if (this.logs.length > this.maxLogs) {
			this.logs = this.logs.slice(-this.maxLogs);
		}

		this.emit('newLog', entry);

		const timestamp = new Date(entry.timestamp).toISOString();
		const prefix = `[${timestamp}] [${entry.level.toUpperCase()}]${entry.context ? ` [${entry.context}]` : ''}`;
		const message = `${prefix} ${entry.message}`;

		if (this.fileLogEnabled && this.logFileStream) {
			const dataStr = entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : '';
			this.logFileStream.write(`${message}${dataStr}\n`);
		}

		if (!this.consoleEnabled) return;

		// Diagnostics go to stderr so that stdout stays with command output
		switch (entry.level) {
			case 'error':
				console.error(message, entry.data ?? '');
				break;
			case 'warn':
				console.warn(message, entry.data ?? '');
				break;
			case 'info':
			case 'debug':
				console.error(message, entry.data ?? '');
				break;
		}
	}

	private log(level: LogLevel, message: string, context?: string, data?: unknown): void {
		if (!shouldLogLevel(level, this.minLevel)) return;
		this.addLog({
			timestamp: Date.now(),
			level,
			message,
			context,
			data,
		});
	}

	debug(message: string, context?: string, data?: unknown): void {
		this.log('debug', message, context, data);
	}

	info(message: string, context?: string, data?: unknown): void {
		this.log('info', message, context, data);
	}

	warn(message: string, context?: string, data?: unknown): void {
		this.log('warn', message, context, data);
	}

	error(message: string, context?: string, data?: unknown): void {
		this.log('error', message, context, data);
	}

	getLogs(filter?: { level?: LogLevel; context?: string; limit?: number }): SystemLogEntry[] {
		let filtered = [...this.logs];

		if (filter?.level) {
			const minLevel = filter.level;
			filtered = filtered.filter((log) => shouldLogLevel(log.level, minLevel));
		}

		if (filter?.context) {
			filtered = filtered.filter((log) => log.context === filter.context);
		}

		if (filter?.limit) {
			filtered = filtered.slice(-filter.limit);
		}

		return filtered;
	}

	clearLogs(): void {
		this.logs = [];
	}
}

// Export singleton instance
export const logger = new Logger();
