/**
 * Structured, pluggable logging for webpuppet.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. The MCP server speaks its protocol on stdout, so every transport
 * here writes to stderr or a file and never to stdout.
 */

import { appendFileSync, renameSync, statSync, writeFileSync } from "node:fs";

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.FATAL]: "FATAL",
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	fatal: LogLevel.FATAL,
};

/**
 * Parse a level name (`"debug"`, `"INFO"`, ...). Returns undefined for
 * anything unrecognised.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (!name) return undefined;
	return LEVELS_BY_NAME[name.trim().toLowerCase()];
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	/** JSON-RPC request id the entry relates to, when known */
	requestId?: string;
	error?: { name: string; message: string; stack?: string };
	/** Logger name (e.g. "mcp:server") */
	logger: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. */
	level?: LogLevel;
	/** Output transports. Defaults to a single {@link StderrTransport}. */
	transports?: LogTransport[];
	/** Context merged into every entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Set process-wide logging defaults. Loggers created afterwards pick them up.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

/** Reset global config to defaults. Used by tests. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── Transports ──────────────────────────────────────────────────────────────

function serializeEntry(entry: LogEntry): string {
	return JSON.stringify({
		timestamp: entry.timestamp,
		level: entry.levelName,
		logger: entry.logger,
		message: entry.message,
		...(Object.keys(entry.context).length > 0 ? { context: entry.context } : {}),
		...(entry.requestId !== undefined ? { requestId: entry.requestId } : {}),
		...(entry.error ? { error: entry.error } : {}),
	});
}

/**
 * Human-readable single-line output on stderr.
 */
export class StderrTransport implements LogTransport {
	private readonly out: NodeJS.WritableStream;

	constructor(out: NodeJS.WritableStream = process.stderr) {
		this.out = out;
	}

	write(entry: LogEntry): void {
		const ts = entry.timestamp.slice(11, 23);
		let line = `${ts} ${entry.levelName.padEnd(5)} [${entry.logger}] ${entry.message}`;

		const keys = Object.keys(entry.context);
		if (keys.length > 0) {
			line += " " + keys.map((k) => `${k}=${JSON.stringify(entry.context[k])}`).join(" ");
		}
		if (entry.requestId !== undefined) {
			line += ` req=${entry.requestId}`;
		}
		if (entry.error) {
			line += `\n  ${entry.error.name}: ${entry.error.message}`;
		}

		this.out.write(line + "\n");
	}
}

/**
 * Appends JSON lines to a file, rotating it once it exceeds `maxSizeBytes`.
 * Rotated files are kept as `<file>.1` … `<file>.<maxFiles>`.
 */
export class FileTransport implements LogTransport {
	private readonly filePath: string;
	private readonly maxSizeBytes: number;
	private readonly maxFiles: number;
	private currentSize: number;
	private failed = false;

	constructor(opts: { filePath: string; maxSizeBytes?: number; maxFiles?: number }) {
		this.filePath = opts.filePath;
		this.maxSizeBytes = opts.maxSizeBytes ?? 10 * 1024 * 1024;
		this.maxFiles = opts.maxFiles ?? 5;
		this.currentSize = FileTransport.sizeOf(this.filePath);
	}

	write(entry: LogEntry): void {
		const line = serializeEntry(entry) + "\n";
		const bytes = Buffer.byteLength(line, "utf-8");

		if (this.currentSize > 0 && this.currentSize + bytes > this.maxSizeBytes) {
			this.rotate();
		}

		try {
			appendFileSync(this.filePath, line, "utf-8");
			this.currentSize += bytes;
			this.failed = false;
		} catch (err) {
			// Report the first failure of a streak on stderr, then stay quiet.
			if (!this.failed) {
				this.failed = true;
				process.stderr.write(`log file ${this.filePath} is not writable: ${String(err)}\n`);
			}
		}
	}

	private rotate(): void {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			const from = `${this.filePath}.${i}`;
			if (FileTransport.exists(from)) {
				renameSync(from, `${this.filePath}.${i + 1}`);
			}
		}
		renameSync(this.filePath, `${this.filePath}.1`);
		writeFileSync(this.filePath, "", "utf-8");
		this.currentSize = 0;
	}

	private static exists(file: string): boolean {
		try {
			statSync(file);
			return true;
		} catch {
			return false;
		}
	}

	private static sizeOf(file: string): number {
		try {
			return statSync(file).size;
		} catch {
			return 0;
		}
	}
}

const defaultTransport = new StderrTransport();

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Effective level: `LOG_LEVEL` env, then explicit config, then global
 * config, then INFO.
 */
function resolveLevel(configLevel?: LogLevel): LogLevel {
	const fromEnv = parseLogLevel(process.env.LOG_LEVEL);
	if (fromEnv !== undefined) return fromEnv;
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return LogLevel.INFO;
}

/**
 * Named logger. Level and transports not given explicitly follow the global
 * config at the time of each call, so module-level loggers pick up
 * {@link configureLogging} made after they were created.
 */
export class Logger {
	private readonly name: string;
	private readonly level: LogLevel | undefined;
	private readonly transports: LogTransport[] | undefined;
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = config?.level;
		this.transports = config?.transports;
		this.context = {
			...(globalConfig.defaultContext ?? {}),
			...(config?.defaultContext ?? {}),
		};
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	fatal(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, error, ctx);
	}

	/**
	 * Child logger named `<parent>:<child>` sharing level, transports and
	 * context.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	getLevel(): LogLevel {
		return resolveLevel(this.level);
	}

	private emit(level: LogLevel, message: string, error: unknown, ctx?: Record<string, unknown>): void {
		if (level < this.getLevel()) return;

		const context: Record<string, unknown> = { ...this.context, ...(ctx ?? {}) };
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LEVEL_NAMES[level],
			message,
			context,
			logger: this.name,
		};

		if (context.requestId !== undefined && context.requestId !== null) {
			entry.requestId = String(context.requestId);
			delete context.requestId;
		}

		if (error instanceof Error) {
			entry.error = { name: error.name, message: error.message, stack: error.stack };
		} else if (error !== undefined) {
			entry.error = { name: "Error", message: String(error) };
		}

		for (const transport of this.transports ?? globalConfig.transports ?? [defaultTransport]) {
			transport.write(entry);
		}
	}
}

/**
 * Create a named logger with the global defaults.
 *
 * @param name - Module identifier, e.g. `"mcp:server"`.
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
