import type { DestinationStream, LevelWithSilent, LoggerOptions } from "pino";

export type LogLevel = LevelWithSilent;

export interface NodeLoggerOptions {
	/** Service name stamped on every line */
	service: string;
	/** Minimum level (default: info) */
	level?: LogLevel;
	environment?: string;
	version?: string;
	/** Pretty-print through pino-pretty (default: NODE_ENV === "development") */
	pretty?: boolean;
	/** Extra paths to censor, merged with the defaults */
	redactPaths?: string[];
	/** Extra fields bound to every line */
	base?: Record<string, unknown>;
	/** Write to this stream instead of stdout; disables pretty printing */
	destination?: DestinationStream;
	pinoOptions?: Partial<LoggerOptions>;
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve a level from an environment value, falling back when unset or unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
	if (value === undefined) {
		return fallback;
	}
	const normalized = value.trim().toLowerCase();
	return isLogLevel(normalized) ? normalized : fallback;
}
