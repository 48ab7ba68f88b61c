/**
 * @file Logger used by the dispatcher, stages, storage engine and query engine.
 */

/**
 * Log levels ordered from most to least verbose.
 */
export enum LogLevel {
	/** Emit everything */
	ALL = 0,
	/** Per-unit dispatch traces, parse results */
	DEBUG = 10,
	/** Statement outcomes, persistence operations */
	INFO = 20,
	/** Unprocessable units, rejected statements */
	WARN = 30,
	/** Iteration budget exceeded, storage failures */
	ERROR = 40,
	/** Silence the logger */
	OFF = 50
}

/**
 * One log record as handed to formatters and handlers.
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
	/** Minimum level that is emitted (default: INFO) */
	level?: LogLevel;
	/** Write formatted entries to the console (default: true) */
	console?: boolean;
	/** Turns an entry into a single line */
	formatter?: (entry: LogEntry) => string;
	/** Receives every entry that passes the level filter; replaces console output */
	handler?: (entry: LogEntry) => void;
}

/**
 * Logger bound to a fixed context label.
 */
export interface ContextLogger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
}

const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

/**
 * Level-filtered logger with pluggable formatting and output.
 */
export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? this.writeToConsole.bind(this)
		};
	}

	/**
	 * Merges new settings into the current configuration.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	/**
	 * Returns a logger that prefixes every entry with the given context.
	 */
	forContext(context: string): ContextLogger {
		return {
			debug: (message, data) => this.debug(message, context, data),
			info: (message, data) => this.info(message, context, data),
			warn: (message, data) => this.warn(message, context, data),
			error: (message, data) => this.error(message, context, data)
		};
	}

	private shouldLog(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	private writeToConsole(entry: LogEntry): void {
		if (!this.config.console) return;

		const line = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(line);
				break;
			case LogLevel.WARN:
				console.warn(line);
				break;
			case LogLevel.DEBUG:
				console.debug(line);
				break;
			default:
				console.log(line);
				break;
		}
	}

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

	debug(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Process-wide logger shared by every engine instance.
 */
export const globalLogger = new Logger();

/**
 * Shorthand for `globalLogger.forContext(context)`.
 */
export function getLogger(context: string): ContextLogger {
	return globalLogger.forContext(context);
}
