import type { Logger } from "../../src/logging.js";

export interface RecordingLogger extends Logger {
	warnings: string[];
	debugs: string[];
}

/**
 * Logger that keeps warnings and debug lines for assertions.
 */
export function createRecordingLogger(): RecordingLogger {
	const warnings: string[] = [];
	const debugs: string[] = [];

	return {
		warnings,
		debugs,
		error: () => undefined,
		info: () => undefined,
		warn: (message) => {
			warnings.push(message);
		},
		debug: (message) => {
			debugs.push(message);
		},
	};
}
