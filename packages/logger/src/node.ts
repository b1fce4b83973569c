import { type Logger, type LoggerOptions, pino, transport } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { NodeLoggerOptions } from "./types.js";

export function createNodeLogger(options: NodeLoggerOptions): Logger {
	const {
		service,
		level = "info",
		environment,
		version,
		pretty,
		redactPaths,
		base = {},
		destination,
		pinoOptions = {},
	} = options;

	const isPretty = destination === undefined && (pretty ?? process.env.NODE_ENV === "development");

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
			bindings: () => ({}), // Remove pid, hostname
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		redact: {
			paths: mergeRedactPaths(redactPaths),
			censor: "[REDACTED]",
		},
		base: {
			service,
			environment,
			version,
			...base,
		},
		...pinoOptions,
	};

	if (destination) {
		return pino(loggerOptions, destination);
	}

	if (isPretty) {
		return pino(
			loggerOptions,
			transport({
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:HH:MM:ss",
					ignore: "pid,hostname,service,environment,version",
					// Color by severity: grey for info, yellow for warn, red for error
					customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
					singleLine: true,
				},
			})
		);
	}

	return pino(loggerOptions);
}

/**
 * Scope a logger to one component of a service, e.g. `withComponent(log, "dispatch")`.
 */
export function withComponent(logger: Logger, component: string): Logger {
	return logger.child({ component });
}

/**
 * Normalize an unknown thrown value into loggable fields.
 */
export function errorFields(error: unknown): { error: string; errorName?: string } {
	if (error instanceof Error) {
		return { error: error.message, errorName: error.name };
	}
	return { error: String(error) };
}
