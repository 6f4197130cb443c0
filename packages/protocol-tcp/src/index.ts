/**
 * TCP transport for sumwire
 *
 * Length-prefixed framing, the per-connection request loop, the server
 * accept loop and a client.
 *
 * @example
 * ```typescript
 * import { addRequest } from 'sumwire';
 * import { TcpClient, TcpServer } from '@sumwire/protocol-tcp';
 *
 * const server = new TcpServer({ port: 0 });
 * const { port } = await server.listen();
 * const done = server.run();
 *
 * const client = new TcpClient();
 * await client.connect('127.0.0.1', port);
 * await client.request(addRequest(2, 3)); // { type: 'addResponse', payload: { result: 5 } }
 *
 * client.close();
 * server.stop();
 * await done;
 * ```
 */

export { TcpServer, type TcpServerOptions } from "./tcp.server";
export { TcpClient } from "./tcp.client";
export { ConnectionHandler, type ConnectionHandlerOptions } from "./connection-handler";
export { FrameReader, type FrameReaderConfig, defaultHighWaterMark } from "./frame-reader";
export * from "./framing";
export * from "./config";
export { ConnectionError, isConnectionClosed, type ConnectionErrorKind } from "./errors";

export type { DrainMode, LengthFieldLength, ReadFrame } from "./types";
export { DRAIN_MODES, LENGTH_FIELD_LENGTHS } from "./types";
