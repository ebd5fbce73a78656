/**
 * @title Logging Module
 * @description Leveled logging shared by every module.
 *
 * Modules accept an optional `logger`; when none is given they fall back to a
 * console logger whose level is read from the environment.
 *
 * @module logging
 *
 * @envvar GHFETCH_LOG_LEVEL - One of "error", "warn", "info", "debug".
 * @envvar RUNNER_DEBUG - Set to "1" by the Actions runner when step debug logging is on.
 */

/** Log levels, most severe first. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Minimal logger contract.
 */
export interface Logger {
	error(message: string): void;
	warn(message: string): void;
	info(message: string): void;
	debug(message: string): void;
}

function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the log level from the environment.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
	const configured = env["GHFETCH_LOG_LEVEL"]?.trim().toLowerCase();
	if (configured && isLogLevel(configured)) {
		return configured;
	}
	return env["RUNNER_DEBUG"] === "1" ? "debug" : "info";
}

/**
 * Create a logger that writes to the console when a message's level is at or
 * below the configured level.
 *
 * @param level - Most verbose level to emit (default: from the environment)
 * @returns Logger
 */
export function createConsoleLogger(level: LogLevel = resolveLogLevel()): Logger {
	const threshold = LOG_LEVELS.indexOf(level);
	const enabled = (type: LogLevel) => LOG_LEVELS.indexOf(type) <= threshold;

	return {
		error: (message) => {
			if (enabled("error")) console.error(message);
		},
		warn: (message) => {
			if (enabled("warn")) console.warn(message);
		},
		info: (message) => {
			if (enabled("info")) console.info(message);
		},
		debug: (message) => {
			if (enabled("debug")) console.debug(message);
		},
	};
}

/**
 * Logger that discards every message.
 */
export const silentLogger: Logger = {
	error: () => undefined,
	warn: () => undefined,
	info: () => undefined,
	debug: () => undefined,
};

let defaultLogger: Logger | undefined;

/**
 * Shared console logger used when a caller passes none.
 */
export function getDefaultLogger(): Logger {
	defaultLogger ??= createConsoleLogger();
	return defaultLogger;
}
