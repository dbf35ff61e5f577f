/**
 * Structured Logging Module
 *
 * Writes structured log entries in JSON Lines (.jsonl) format, one file per
 * log type, and mirrors entries at or above a threshold to the console.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Rebuild outcome log entry
 */
export interface RebuildLog extends BaseLogEntry {
	type: 'rebuild';
	source_url: string;
	outcome: 'success' | 'failure';
	chunk_count?: number;
	duration_ms: number;
	persisted?: boolean;
	error_code?: string;
	error_message?: string;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Union type for all log entries
 */
export type LogEntry = RebuildLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files; file output is disabled when omitted */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

/**
 * Structured logger
 */
export class Logger {
	private logDir?: string;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';

		this.ensureLogDirectory();
	}

	private ensureLogDirectory(): void {
		if (this.logDir && !fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true });
		}
	}

	private writeLogEntry(logType: string, entry: LogEntry): void {
		if (!this.logDir) {
			return;
		}

		const logFile = path.join(this.logDir, `${logType}.jsonl`);
		const logLine = JSON.stringify(entry) + '\n';

		try {
			fs.appendFileSync(logFile, logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[DROPPED LOG]', logLine);
		}
	}

	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LEVELS.indexOf(entry.level) < LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;
		const body = entry.type === 'general' ? entry.message : JSON.stringify(entry);
		const context = entry.type === 'general' && entry.context ? entry.context : '';

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, body, context);
				break;
			case 'warn':
				console.warn(prefix, body, context);
				break;
			default:
				console.log(prefix, body, context);
		}
	}

	/**
	 * Log the outcome of a rebuild
	 */
	logRebuild(
		sourceUrl: string,
		durationMs: number,
		details:
			| { outcome: 'success'; chunkCount: number; persisted: boolean }
			| { outcome: 'failure'; error: { code?: string; message: string } }
	): void {
		const base = {
			timestamp: new Date().toISOString(),
			type: 'rebuild' as const,
			source_url: sourceUrl,
			duration_ms: Math.round(durationMs),
		};

		const entry: RebuildLog =
			details.outcome === 'success'
				? {
						...base,
						level: details.persisted ? 'info' : 'warn',
						outcome: 'success',
						chunk_count: details.chunkCount,
						persisted: details.persisted,
					}
				: {
						...base,
						level: 'error',
						outcome: 'failure',
						error_code: details.error.code ?? 'UNKNOWN',
						error_message: details.error.message,
					};

		this.writeLogEntry('rebuilds', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: GeneralLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		};

		this.writeLogEntry('general', entry);
		this.outputToConsole(entry);
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log('fatal', message, context);
	}
}
