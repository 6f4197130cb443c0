import net from "node:net";
import { type ClientMessage, type MessageCodecs, type ServerMessage, createMessageCodecs } from "sumwire";
import { type TcpClientConfig, resolveClientConfig } from "./config";
import { ConnectionError } from "./errors";
import { FrameReader } from "./frame-reader";
import { frameMessage } from "./framing";
import type { ReadFrame } from "./types";

/**
 * Client for the add/echo server.
 *
 * @example
 * ```typescript
 * const client = new TcpClient();
 * await client.connect('127.0.0.1', 7878);
 * const response = await client.request(addRequest(2, 3));
 * // { type: 'addResponse', payload: { result: 5 } }
 * client.close();
 * ```
 */
export class TcpClient {
	private config: Required<TcpClientConfig> = resolveClientConfig();
	private socket: net.Socket | null = null;
	private reader: FrameReader | null = null;
	private _connected = false;
	private readonly codecs: MessageCodecs;

	/** Resolves when the socket has closed, for whatever reason */
	closed: Promise<void> = Promise.resolve();

	constructor(codecs: MessageCodecs = createMessageCodecs()) {
		this.codecs = codecs;
	}

	get connected(): boolean {
		return this._connected;
	}

	connect(host: string, port: number, cfg: TcpClientConfig = {}): Promise<void> {
		if (this._connected) throw new Error("socket is already connected");
		if (!host || !Number.isFinite(port)) throw new Error(`invalid address: ${host}:${port}`);

		this.config = resolveClientConfig(cfg);
		const { timeout } = this.config;

		const sock = net.connect({ host, port, timeout });
		this.socket = sock;
		this.reader = new FrameReader(sock, {
			lengthFieldLength: this.config.lengthFieldLength,
			maxFrameSize: this.config.maxFrameSize,
		});
		this.closed = new Promise<void>((resolve) => {
			sock.once("close", () => {
				this._connected = false;
				resolve();
			});
		});

		return new Promise<void>((resolve, reject) => {
			const onError = (err: Error) => reject(err);
			const onTimeout = () => {
				sock.destroy();
				reject(new Error(`connect to ${host}:${port} timed out after ${timeout}ms`));
			};
			sock.once("error", onError);
			sock.once("timeout", onTimeout);

			sock.once("connect", () => {
				sock.off("error", onError);
				sock.off("timeout", onTimeout);
				sock.setTimeout(0);
				this._connected = true;
				resolve();
			});
		});
	}

	/**
	 * Encode, frame and send one request
	 */
	async send(message: ClientMessage): Promise<void> {
		const payload = this.codecs.client.encode(message);
		await this.writeAll(frameMessage(payload, this.config.lengthFieldLength));
	}

	/**
	 * Write raw bytes as-is, without framing
	 */
	async write(data: Uint8Array): Promise<void> {
		await this.writeAll(Buffer.from(data));
	}

	/**
	 * Wait for the next response.
	 *
	 * @throws ConnectionError "timeout" when nothing arrives within `timeoutMs`,
	 *   "closed" when the server hangs up, "protocol" on an oversized frame
	 * @throws CodecError when the frame is not a server envelope
	 */
	async receive(timeoutMs: number = this.config.timeout): Promise<ServerMessage> {
		if (!this.reader) throw new Error("socket not connected");

		const signal = AbortSignal.timeout(timeoutMs);
		let frame: ReadFrame;
		try {
			frame = await this.reader.read(signal);
		} catch (error) {
			if (signal.aborted && !(error instanceof ConnectionError)) {
				throw ConnectionError.timeout(timeoutMs);
			}
			throw error;
		}

		if (frame.type === "oversized") {
			throw ConnectionError.frameTooLarge(frame.length, this.config.maxFrameSize);
		}
		return this.codecs.server.decode(frame.payload);
	}

	/**
	 * Send a request and wait for its response
	 */
	async request(message: ClientMessage, timeoutMs?: number): Promise<ServerMessage> {
		await this.send(message);
		return this.receive(timeoutMs);
	}

	close(): void {
		if (!this.socket) return;
		this._connected = false;
		this.socket.destroy();
	}

	private writeAll(buf: Buffer): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const socket = this.socket;
			if (!socket || !this._connected) return reject(new Error("socket not connected"));
			socket.write(buf, (err?: Error | null) => {
				if (err) return reject(err);
				resolve();
			});
		});
	}
}
