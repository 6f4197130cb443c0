/**
 * Logging
 *
 * Thin wrapper around pino so every package logs through the same factory.
 */

import pino, { type LevelWithSilent, type Logger } from "pino";

export type { LevelWithSilent, Logger };

export interface LoggerOptions {
	/** Minimum level to emit (default "info") */
	level?: LevelWithSilent;

	/** Logger name attached to every record (default "sumwire") */
	name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	return pino({
		name: options.name ?? "sumwire",
		level: options.level ?? "info",
	});
}

/**
 * Logger that drops everything. Used where output is noise, e.g. tests.
 */
export function createSilentLogger(): Logger {
	return createLogger({ level: "silent" });
}
