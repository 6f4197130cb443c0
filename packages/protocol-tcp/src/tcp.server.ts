import net, { type AddressInfo } from "node:net";
import {
	type Logger,
	type MessageCodecs,
	type RequestDispatcher,
	RunningFlag,
	createLogger,
	createMessageCodecs,
	dispatch,
} from "sumwire";
import { type TcpServerConfig, resolveServerConfig } from "./config";
import { ConnectionHandler } from "./connection-handler";
import { isConnectionClosed } from "./errors";

interface HeldSocket {
	socket: net.Socket;
	release(): void;
}

export interface TcpServerOptions extends TcpServerConfig {
	/** Log sink; defaults to a pino logger at `logLevel` */
	logger?: Logger;
	/** Envelope codecs; defaults to the bundled protobuf schema */
	codecs?: MessageCodecs;
	/** Request dispatcher; defaults to add/echo */
	dispatch?: RequestDispatcher;
	/** Shared shutdown signal; a fresh flag when omitted */
	running?: RunningFlag;
}

/**
 * TCP server loop.
 *
 * Every accepted socket gets its own connection context: a detached async
 * loop that calls `ConnectionHandler.handle()` while the running flag is set.
 * A context's outcome is only logged; it never reaches the accept path or
 * another connection.
 *
 * Sockets the OS hands over between `listen()` and `run()` are held unread
 * and start their contexts once `run()` sets the flag.
 *
 * Shutdown is cooperative. `stop()` clears the flag and stops accepting, and
 * `run()` returns right away. Each context exits after its current cycle; a
 * context suspended in a read keeps its connection until the peer sends or
 * disconnects. `drained()` waits for all of them.
 *
 * @example
 * ```typescript
 * const server = new TcpServer({ host: '127.0.0.1', port: 7878 });
 * process.once('SIGINT', () => server.stop());
 * await server.run();
 * ```
 */
export class TcpServer {
	private server: net.Server | null = null;
	private stopped: Promise<void> | null = null;
	private signalStopped: (() => void) | null = null;
	/** Sockets accepted before `run()`; null once it has started */
	private pending: HeldSocket[] | null = [];
	private readonly config: Required<TcpServerConfig>;
	private readonly logger: Logger;
	private readonly codecs: MessageCodecs;
	private readonly dispatch: RequestDispatcher;
	private readonly running: RunningFlag;
	private readonly contexts = new Set<Promise<void>>();

	constructor(options: TcpServerOptions = {}) {
		this.config = resolveServerConfig(options);
		this.logger = options.logger ?? createLogger({ level: this.config.logLevel });
		this.codecs = options.codecs ?? createMessageCodecs();
		this.dispatch = options.dispatch ?? dispatch;
		this.running = options.running ?? new RunningFlag();
	}

	get isRunning(): boolean {
		return this.running.isRunning;
	}

	/** Number of live connection contexts */
	get connectionCount(): number {
		return this.contexts.size;
	}

	address(): AddressInfo | null {
		const address = this.server?.address();
		return address && typeof address === "object" ? address : null;
	}

	/**
	 * Bind the listening socket.
	 *
	 * @throws the bind error (address in use, permission denied)
	 */
	listen(): Promise<AddressInfo> {
		if (this.server) throw new Error("server is already listening");

		const server = net.createServer((socket) => this.accept(socket));
		this.server = server;
		this.pending = [];
		this.stopped = new Promise<void>((resolve) => {
			this.signalStopped = resolve;
		});

		return new Promise((resolve, reject) => {
			const onError = (err: Error) => {
				this.server = null;
				this.stopped = null;
				this.signalStopped = null;
				reject(err);
			};
			server.once("error", onError);

			server.listen(this.config.port, this.config.host, () => {
				server.off("error", onError);
				server.on("error", (err: Error) => this.logger.error({ err }, "Error accepting connection"));

				const address = this.address();
				if (!address) {
					reject(new Error("listening socket has no address"));
					return;
				}
				resolve(address);
			});
		});
	}

	/**
	 * Accept connections until `stop()` is called.
	 *
	 * Binds first if `listen()` has not been called. Resolves once `stop()`
	 * has closed the listener; connections still open are left to finish on
	 * their own (see `drained()`).
	 */
	async run(): Promise<void> {
		const address = this.address() ?? (await this.listen());

		this.running.set();
		this.logger.info(`Server is running on ${address.address}:${address.port}`);

		const held = this.pending ?? [];
		this.pending = null;
		for (const { socket, release } of held) {
			release();
			this.start(socket);
		}

		await this.stopped;

		this.server = null;
		this.stopped = null;
		this.logger.info("Server stopped.");
	}

	/**
	 * Resolves when every connection context live at call time has finished
	 */
	async drained(): Promise<void> {
		await Promise.all(this.contexts);
	}

	/**
	 * Clear the running flag and stop accepting new connections.
	 */
	stop(): void {
		if (!this.running.clear()) {
			this.logger.warn("Server was already stopped or not running.");
			return;
		}
		this.logger.info("Shutdown signal sent.");
		// Stops accepting now; the "close" event itself waits for open connections
		this.server?.close();
		this.signalStopped?.();
		this.signalStopped = null;
	}

	private accept(socket: net.Socket): void {
		if (!this.pending) {
			this.start(socket);
			return;
		}

		const onError = (err: Error) => this.logger.warn({ err }, "Held connection failed before run");
		socket.once("error", onError);
		this.pending.push({ socket, release: () => socket.off("error", onError) });
	}

	private start(socket: net.Socket): void {
		// Captured up front: the peer address is gone once the socket is destroyed
		const remote = `${socket.remoteAddress ?? ""}:${socket.remotePort ?? 0}`;
		const logger = this.logger.child({ remote });
		logger.info("New client connected");

		const handler = new ConnectionHandler(socket, {
			codecs: this.codecs,
			dispatch: this.dispatch,
			logger,
			lengthFieldLength: this.config.lengthFieldLength,
			maxFrameSize: this.config.maxFrameSize,
			drainMode: this.config.drainMode,
		});

		const context = this.serve(handler, logger, remote);
		this.contexts.add(context);
		void context.finally(() => this.contexts.delete(context));
	}

	/**
	 * Connection context. Never rejects.
	 */
	private async serve(handler: ConnectionHandler, logger: Logger, remote: string): Promise<void> {
		try {
			while (this.running.isRunning) {
				await handler.handle();
			}
		} catch (error) {
			if (isConnectionClosed(error)) {
				logger.info("Client disconnected");
			} else {
				logger.error({ err: error }, "Error handling client");
			}
		} finally {
			handler.close();
			logger.info(`Client at ${remote} disconnected`);
		}
	}
}
