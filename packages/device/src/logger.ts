import type { Logger, LogLevel } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

/**
 * Build a logger that forwards to `sink` (the console by default) and drops
 * anything below `level`.
 *
 * @example
 * const logger = createLogger("debug");
 * const session = createTp8236Session({ logger });
 */
export function createLogger(level: LogLevel, sink: Logger = console): Logger {
	const threshold = LEVEL_RANK[level];
	const enabled = (candidate: Exclude<LogLevel, "silent">) =>
		LEVEL_RANK[candidate] >= threshold;

	return {
		debug(message, ...details) {
			if (enabled("debug")) sink.debug(message, ...details);
		},
		info(message, ...details) {
			if (enabled("info")) sink.info(message, ...details);
		},
		warn(message, ...details) {
			if (enabled("warn")) sink.warn(message, ...details);
		},
		error(message, ...details) {
			if (enabled("error")) sink.error(message, ...details);
		},
	};
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger("silent");
