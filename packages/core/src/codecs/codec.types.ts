/**
 * Codec Types
 *
 * Defines the interface for message encoding/decoding.
 * Codecs convert between typed messages and the binary envelope on the wire.
 */

/**
 * Wire format type - indicates the encoded data format
 */
export type WireFormat = "binary";

/**
 * Codec interface for message serialization/deserialization.
 *
 * The transport treats a codec as opaque: `encode(message) -> bytes` and
 * `decode(bytes) -> message`, throwing `CodecError` when either fails.
 *
 * @template T - Message type being encoded/decoded
 *
 * @example
 * ```typescript
 * const { client } = createMessageCodecs();
 * const wire = client.encode(addRequest(2, 3));
 * const message = client.decode(wire);
 * // { type: "addRequest", payload: { a: 2, b: 3 } }
 * ```
 */
export interface Codec<T> {
	/**
	 * Human-readable codec name for error messages and debugging.
	 * @example "protobuf"
	 */
	readonly name: string;

	readonly wireFormat: WireFormat;

	/**
	 * @throws CodecError if encoding fails
	 */
	encode(message: T): Uint8Array;

	/**
	 * @throws CodecError if the bytes are not a valid envelope
	 */
	decode(wire: Uint8Array): T;
}

/**
 * Codec operation type
 */
export type CodecOperation = "encode" | "decode";

/**
 * Error thrown when codec encoding or decoding fails.
 *
 * @example
 * ```typescript
 * try {
 *   const message = codec.decode(invalidData);
 * } catch (error) {
 *   if (error instanceof CodecError) {
 *     logger.warn({ codec: error.codecName, op: error.operation }, error.message);
 *   }
 * }
 * ```
 */
export class CodecError extends Error {
	/**
	 * Name of the codec that failed
	 */
	readonly codecName: string;

	/**
	 * Operation that failed ("encode" or "decode")
	 */
	readonly operation: CodecOperation;

	/**
	 * The data that caused the error (for debugging)
	 * Binary input is summarized, never copied
	 */
	readonly data?: unknown;

	/**
	 * The original error that caused this error
	 */
	cause?: Error;

	constructor(
		message: string,
		codecName: string,
		operation: CodecOperation,
		options?: {
			cause?: Error;
			data?: unknown;
		},
	) {
		super(message);
		this.name = "CodecError";
		this.codecName = codecName;
		this.operation = operation;
		this.data = options?.data;
		if (options?.cause) {
			this.cause = options.cause;
		}
	}

	/**
	 * Create a CodecError for an encode operation failure
	 */
	static encodeError(codecName: string, cause: Error, data?: unknown): CodecError {
		return new CodecError(`Failed to encode message with ${codecName} codec: ${cause.message}`, codecName, "encode", {
			cause,
			data,
		});
	}

	/**
	 * Create a CodecError for a decode operation failure
	 */
	static decodeError(codecName: string, cause: Error, data?: unknown): CodecError {
		return new CodecError(`Failed to decode message with ${codecName} codec: ${cause.message}`, codecName, "decode", {
			cause,
			data,
		});
	}
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
