/**
 * Add Server
 *
 * Runs the add/echo server with settings from `SUMWIRE_*` environment
 * variables. SIGINT or SIGTERM stops accepting and ends the process once
 * the listener has closed.
 *
 * Usage:
 *   SUMWIRE_PORT=7878 npm start
 */

import { createLogger } from "sumwire";
import { TcpServer, loadServerConfigFromEnv, resolveServerConfig } from "@sumwire/protocol-tcp";

// =============================================================================
// Setup
// =============================================================================

const config = resolveServerConfig(loadServerConfigFromEnv());
const logger = createLogger({ level: config.logLevel });
const server = new TcpServer({ ...config, logger });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.once(signal, () => server.stop());
}

// =============================================================================
// Run
// =============================================================================

try {
	await server.run();
} catch (error) {
	logger.fatal({ err: error }, "Failed to start server");
	process.exitCode = 1;
}

// Idle clients would otherwise keep the process alive
process.exit();
