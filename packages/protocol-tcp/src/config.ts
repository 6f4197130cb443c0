/**
 * TCP Transport Configuration
 *
 * Server and client settings with defaults, plus loading server settings
 * from environment variables.
 */

import type { LevelWithSilent } from "sumwire";
import { DRAIN_MODES, type DrainMode, LENGTH_FIELD_LENGTHS, type LengthFieldLength } from "./types";

export interface TcpServerConfig {
	host?: string; // Listen address
	port?: number; // Listen port, 0 picks a free one
	lengthFieldLength?: LengthFieldLength; // Frame header size in bytes
	maxFrameSize?: number; // Largest accepted request frame
	drainMode?: DrainMode; // What to discard before each read
	logLevel?: LevelWithSilent; // Used when no logger is injected
}

export interface TcpClientConfig {
	timeout?: number; // Connect and receive timeout in milliseconds
	lengthFieldLength?: LengthFieldLength; // Must match the server
	maxFrameSize?: number; // Largest accepted response frame
}

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 7878;
export const DEFAULT_LENGTH_FIELD_LENGTH: LengthFieldLength = 4;
/** Largest request a single read is expected to carry */
export const DEFAULT_MAX_FRAME_SIZE = 512;

export function resolveServerConfig(cfg: TcpServerConfig = {}): Required<TcpServerConfig> {
	return {
		host: cfg.host ?? DEFAULT_HOST,
		port: cfg.port ?? DEFAULT_PORT,
		lengthFieldLength: cfg.lengthFieldLength ?? DEFAULT_LENGTH_FIELD_LENGTH,
		maxFrameSize: cfg.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE,
		drainMode: cfg.drainMode ?? "stale",
		logLevel: cfg.logLevel ?? "info",
	};
}

export function resolveClientConfig(cfg: TcpClientConfig = {}): Required<TcpClientConfig> {
	return {
		timeout: cfg.timeout ?? 5000,
		lengthFieldLength: cfg.lengthFieldLength ?? DEFAULT_LENGTH_FIELD_LENGTH,
		maxFrameSize: cfg.maxFrameSize ?? 64 * 1024,
	};
}

// =============================================================================
// Environment
// =============================================================================

const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function parseInteger(name: string, value: string, min: number, max: number): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
		throw new Error(`invalid ${name}: ${value} (expected an integer from ${min} to ${max})`);
	}
	return parsed;
}

function parseChoice<T extends string | number>(name: string, value: string, choices: readonly T[]): T {
	const match = choices.find((choice) => String(choice) === value);
	if (match === undefined) {
		throw new Error(`invalid ${name}: ${value} (expected one of ${choices.join(", ")})`);
	}
	return match;
}

/**
 * Read server settings from `SUMWIRE_*` variables. Unset or empty variables
 * are left out so `resolveServerConfig` applies its defaults.
 *
 * @throws Error naming the variable when a value does not parse
 */
export function loadServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TcpServerConfig {
	const config: TcpServerConfig = {};

	if (env.SUMWIRE_HOST) config.host = env.SUMWIRE_HOST;
	if (env.SUMWIRE_PORT) config.port = parseInteger("SUMWIRE_PORT", env.SUMWIRE_PORT, 0, 65535);
	if (env.SUMWIRE_LENGTH_FIELD) {
		config.lengthFieldLength = parseChoice("SUMWIRE_LENGTH_FIELD", env.SUMWIRE_LENGTH_FIELD, LENGTH_FIELD_LENGTHS);
	}
	if (env.SUMWIRE_MAX_FRAME_SIZE) {
		config.maxFrameSize = parseInteger("SUMWIRE_MAX_FRAME_SIZE", env.SUMWIRE_MAX_FRAME_SIZE, 0, 2 ** 32 - 1);
	}
	if (env.SUMWIRE_DRAIN_MODE) config.drainMode = parseChoice("SUMWIRE_DRAIN_MODE", env.SUMWIRE_DRAIN_MODE, DRAIN_MODES);
	if (env.SUMWIRE_LOG_LEVEL) config.logLevel = parseChoice("SUMWIRE_LOG_LEVEL", env.SUMWIRE_LOG_LEVEL, LOG_LEVELS);

	return config;
}
