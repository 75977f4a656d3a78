/**
 * Structured Logging Module
 *
 * Provides structured logging for ranking decisions and general events.
 * Entries go to the console above a threshold level and, when a log
 * directory is configured, to JSON Lines (.jsonl) files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { MovieId } from '../models/movie.js';
import type { RankingMode } from '../models/ranking-result.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Narrow an arbitrary string (e.g. an env var) to a log level
 */
export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Ranking decision log entry
 */
export interface RankingDecisionLog extends BaseLogEntry {
	type: 'ranking_decision';
	level: 'info';
	matched_by: RankingMode | 'title-year';
	query: string;
	candidate_count: number;
	selected_index: number;
	movie_id: MovieId;
	iterations?: number;
	tunneled?: boolean;
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
export type LogEntry = RankingDecisionLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files (default: none, console only) */
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

		if (this.logDir) {
			this.ensureLogDirectory(this.logDir);
		}
	}

	/**
	 * Ensure log directory exists
	 */
	private ensureLogDirectory(logDir: string): void {
		if (!fs.existsSync(logDir)) {
			fs.mkdirSync(logDir, { recursive: true });
		}
	}

	/**
	 * Write log entry to file
	 */
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
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	/**
	 * Output to console if enabled
	 */
	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;

		switch (entry.level) {
			case 'error':
				console.error(prefix, JSON.stringify(entry, null, 2));
				break;
			case 'warn':
				console.warn(prefix, JSON.stringify(entry, null, 2));
				break;
			default:
				console.log(prefix, JSON.stringify(entry, null, 2));
		}
	}

	/**
	 * Log which candidate a search selected and how
	 */
	logRankingDecision(decision: Omit<RankingDecisionLog, 'timestamp' | 'level' | 'type'>): void {
		const entry: RankingDecisionLog = {
			timestamp: new Date().toISOString(),
			level: 'info',
			type: 'ranking_decision',
			...decision,
		};

		this.writeLogEntry('rankings', entry);
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

	/**
	 * Convenience methods for different log levels
	 */
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
}

/**
 * Default logger instance (console only, warn and above)
 */
export const logger = new Logger();
