/**
 * @file Leveled logger shared by the connection provider and query builders.
 */

/**
 * Available log levels in order of priority (from lowest to highest).
 */
export enum LogLevel {
	/** Log all messages (debug, info, warn, error) */
	ALL = 0,
	/** Log debug, info, warn and error messages */
	DEBUG = 10,
	/** Log info, warn and error messages */
	INFO = 20,
	/** Log warn and error messages only */
	WARN = 30,
	/** Log error messages only */
	ERROR = 40,
	/** Disable all logging */
	OFF = 50
}

/**
 * Log entry structure.
 */
export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	context?: string;
	data?: unknown;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
	/** The minimum log level to output (default: INFO) */
	level?: LogLevel;
	/** Whether to output logs to console (default: true) */
	console?: boolean;
	/** Custom log formatter function */
	formatter?: (entry: LogEntry) => string;
	/** Custom log handler function */
	handler?: (entry: LogEntry) => void;
}

/**
 * A logger bound to a fixed context.
 */
export interface ContextLogger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
}

// JSON.stringify throws on bigint, and bound parameters may hold them.
const jsonReplacer = (_key: string, value: unknown): unknown =>
	typeof value === 'bigint' ? value.toString() : value;

const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data !== undefined ? ` ${JSON.stringify(entry.data, jsonReplacer)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

/**
 * Logger with configurable level and output.
 */
export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? this.defaultHandler.bind(this)
		};
	}

	/**
	 * Updates the logger configuration.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			...this.config,
			...config,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	/**
	 * Current minimum level.
	 */
	getLevel(): LogLevel {
		return this.config.level;
	}

	/**
	 * Changes the minimum level; entries below it are dropped.
	 */
	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	/**
	 * Whether an entry at `level` passes the configured threshold.
	 */
	private shouldLog(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	/**
	 * Writes the formatted entry to the console stream matching its level.
	 */
	private defaultHandler(entry: LogEntry): void {
		if (!this.config.console) return;

		const formatted = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(formatted);
				break;
			case LogLevel.WARN:
				console.warn(formatted);
				break;
			case LogLevel.DEBUG:
				console.debug(formatted);
				break;
			default:
				console.log(formatted);
				break;
		}
	}

	/**
	 * Builds an entry and hands it to the configured handler.
	 */
	private log(level: LogLevel, message: string, context?: string, data?: unknown): void {
		if (!this.shouldLog(level)) return;

		this.config.handler({
			timestamp: new Date(),
			level,
			message,
			context,
			data
		});
	}

	/**
	 * Logs at DEBUG, e.g. each compiled statement.
	 */
	debug(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	/**
	 * Logs at INFO.
	 */
	info(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	/**
	 * Logs at WARN.
	 */
	warn(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	/**
	 * Logs at ERROR.
	 */
	error(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Process-wide logger every component writes through.
 */
export const globalLogger = new Logger();

/**
 * Returns a facade over the global logger that tags every entry with `context`.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		debug: (message, data) => globalLogger.debug(message, context, data),
		info: (message, data) => globalLogger.info(message, context, data),
		warn: (message, data) => globalLogger.warn(message, context, data),
		error: (message, data) => globalLogger.error(message, context, data)
	};
}
