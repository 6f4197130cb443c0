import type net from "node:net";
import { type ClientMessage, CodecError, type Logger, type MessageCodecs, type RequestDispatcher } from "sumwire";
import { ConnectionError } from "./errors";
import { FrameReader } from "./frame-reader";
import { frameMessage } from "./framing";
import type { DrainMode, LengthFieldLength } from "./types";

export interface ConnectionHandlerOptions {
	codecs: MessageCodecs;
	dispatch: RequestDispatcher;
	logger: Logger;
	lengthFieldLength: LengthFieldLength;
	maxFrameSize: number;
	drainMode: DrainMode;
}

/**
 * Serves one accepted socket.
 *
 * Each `handle()` call runs one request/response cycle:
 * drain -> read -> decode -> dispatch -> respond.
 * Malformed or unsupported requests get no response and leave the
 * connection open; socket failures reject with `ConnectionError`.
 */
export class ConnectionHandler {
	private readonly socket: net.Socket;
	private readonly reader: FrameReader;
	private readonly options: ConnectionHandlerOptions;
	private readonly logger: Logger;

	constructor(socket: net.Socket, options: ConnectionHandlerOptions) {
		this.socket = socket;
		this.options = options;
		this.logger = options.logger;
		this.reader = new FrameReader(socket, {
			lengthFieldLength: options.lengthFieldLength,
			maxFrameSize: options.maxFrameSize,
		});
	}

	/**
	 * Run one request/response cycle.
	 *
	 * @throws ConnectionError when the peer closes the connection, the socket
	 *   errors, or the response cannot be written
	 */
	async handle(): Promise<void> {
		const discarded = this.reader.drain(this.options.drainMode);
		if (discarded > 0) {
			this.logger.debug({ discarded }, "Discarded stale bytes");
		}

		const frame = await this.reader.read();
		if (frame.type === "oversized") {
			this.logger.warn(
				{ length: frame.length, maxFrameSize: this.options.maxFrameSize },
				"Dropping oversized message",
			);
			return;
		}

		const request = this.decode(frame.payload);
		if (!request) return;

		if (request.type === "echo") {
			this.logger.info(`Received: ${request.payload.content}`);
		}

		const response = this.options.dispatch(request);
		if (!response) {
			this.logger.debug({ type: request.type }, "No response for message");
			return;
		}

		await this.write(frameMessage(this.options.codecs.server.encode(response), this.options.lengthFieldLength));
	}

	/** Destroy the socket. Safe to call more than once. */
	close(): void {
		this.socket.destroy();
	}

	private decode(payload: Uint8Array): ClientMessage | null {
		try {
			return this.options.codecs.client.decode(payload);
		} catch (error) {
			if (error instanceof CodecError) {
				this.logger.warn({ err: error, bytes: payload.length }, "Failed to decode message");
				return null;
			}
			throw error;
		}
	}

	private write(buf: Buffer): Promise<void> {
		return new Promise((resolve, reject) => {
			if (this.socket.destroyed || !this.socket.writable) {
				reject(ConnectionError.io(new Error("socket not writable")));
				return;
			}
			this.socket.write(buf, (err?: Error | null) => {
				if (err) return reject(ConnectionError.io(err));
				resolve();
			});
		});
	}
}
