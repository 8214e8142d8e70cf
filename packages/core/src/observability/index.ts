/**
 * Observability — structured logging for webpuppet.
 */

export {
	LogLevel,
	Logger,
	StderrTransport,
	FileTransport,
	createLogger,
	configureLogging,
	resetLoggingConfig,
	parseLogLevel,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
} from "./logger.js";
