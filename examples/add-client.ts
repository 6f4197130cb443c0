/**
 * Add Client
 *
 * Connects to a running add server, sends one add request and one echo,
 * and logs both responses.
 *
 * Usage:
 *   npm run client -- 2 3
 */

import { addRequest, createLogger, echoRequest } from "sumwire";
import { DEFAULT_HOST, DEFAULT_PORT, TcpClient } from "@sumwire/protocol-tcp";

const logger = createLogger({ name: "sumwire-client" });

const host = process.env.SUMWIRE_HOST || DEFAULT_HOST;
const port = Number(process.env.SUMWIRE_PORT || DEFAULT_PORT);
const [a = 2, b = 3] = process.argv.slice(2).map(Number);

const client = new TcpClient();

try {
	await client.connect(host, port);

	const sum = await client.request(addRequest(a, b));
	logger.info({ response: sum }, `${a} + ${b}`);

	const echo = await client.request(echoRequest(`hello from ${host}:${port}`));
	logger.info({ response: echo }, "echo");
} catch (error) {
	logger.error({ err: error }, "Request failed");
	process.exitCode = 1;
} finally {
	client.close();
}
