/**
 * Connection-fatal error kinds
 *
 * - closed: the peer ended the stream (zero-byte read)
 * - io: the socket reported an error, or a write failed
 * - timeout: no frame arrived in time (client side)
 * - protocol: the peer sent a frame the receiver cannot accept
 */
export type ConnectionErrorKind = "closed" | "io" | "timeout" | "protocol";

/**
 * Error that ends a connection.
 *
 * Raised by the frame reader and connection handler; absorbed at the
 * connection context boundary, so it never reaches the accept path or
 * another connection.
 */
export class ConnectionError extends Error {
	readonly kind: ConnectionErrorKind;

	cause?: Error;

	constructor(kind: ConnectionErrorKind, message: string, cause?: Error) {
		super(message);
		this.name = "ConnectionError";
		this.kind = kind;
		if (cause) {
			this.cause = cause;
		}
	}

	static closed(): ConnectionError {
		return new ConnectionError("closed", "Connection closed by peer");
	}

	static io(cause: Error): ConnectionError {
		return new ConnectionError("io", `Socket I/O failed: ${cause.message}`, cause);
	}

	static timeout(timeoutMs: number): ConnectionError {
		return new ConnectionError("timeout", `No message received within ${timeoutMs}ms`);
	}

	static frameTooLarge(length: number, maxFrameSize: number): ConnectionError {
		return new ConnectionError("protocol", `Frame of ${length} bytes exceeds limit of ${maxFrameSize} bytes`);
	}

	static lengthOverflow(length: bigint): ConnectionError {
		return new ConnectionError("protocol", `Frame length ${length} is not a safe integer`);
	}
}

export function isConnectionClosed(error: unknown): boolean {
	return error instanceof ConnectionError && error.kind === "closed";
}
