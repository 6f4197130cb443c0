/**
 * Protocol Buffers Codec
 *
 * Encodes the client and server message catalogs as protobuf envelopes.
 * The schema is read from `proto/messages.proto` at run time; no code is
 * generated from it.
 *
 * Envelope layout:
 * ```proto
 * message ClientMessage {
 *   oneof message {
 *     EchoMessage echo_message = 1;
 *     AddRequest add_request = 2;
 *   }
 * }
 * ```
 */

import { fileURLToPath } from "node:url";
import protobuf, { type IConversionOptions, type Root, type Type } from "protobufjs";
import {
	type ClientMessage,
	type ServerMessage,
	addRequest,
	addResponse,
	echoRequest,
	echoResponse,
	UNKNOWN_CLIENT_MESSAGE,
} from "../messages/message.types";
import { type Codec, CodecError, type WireFormat, toError } from "./codec.types";

/**
 * Path of the bundled message schema
 */
export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL("../proto/messages.proto", import.meta.url));

/** Package declared in the bundled schema */
export const SCHEMA_PACKAGE = "sumwire";

/**
 * Conversion used when turning decoded protobuf messages into plain objects.
 * `oneofs` exposes the set variant as a virtual `message` field, `defaults`
 * fills proto3 zero values that are never sent on the wire.
 */
const CONVERSION: IConversionOptions = { oneofs: true, defaults: true };

/**
 * Protobuf codec options
 */
export interface ProtobufCodecOptions<T> {
	/** Loaded protobuf Root */
	root: Root;

	/** Fully qualified envelope type, e.g. "sumwire.ClientMessage" */
	typeName: string;

	/** Map a typed message to the protobufjs object form of the envelope */
	toObject(message: T): Record<string, unknown>;

	/** Map a decoded envelope object back to a typed message */
	fromObject(object: Record<string, unknown>): T;
}

/**
 * Protocol Buffers codec for one envelope type.
 *
 * @example
 * ```typescript
 * const root = loadMessageSchema();
 * const codec = new ProtobufCodec<ServerMessage>({
 *   root,
 *   typeName: "sumwire.ServerMessage",
 *   toObject: serverMessageToObject,
 *   fromObject: serverMessageFromObject,
 * });
 * ```
 */
export class ProtobufCodec<T> implements Codec<T> {
	readonly name = "protobuf";
	readonly wireFormat: WireFormat = "binary";

	private readonly type: Type;
	private readonly toObject: (message: T) => Record<string, unknown>;
	private readonly fromObject: (object: Record<string, unknown>) => T;

	constructor(options: ProtobufCodecOptions<T>) {
		this.type = options.root.lookupType(options.typeName);
		this.toObject = options.toObject;
		this.fromObject = options.fromObject;
	}

	encode(message: T): Uint8Array {
		try {
			const wire = this.type.fromObject(this.toObject(message));
			return this.type.encode(wire).finish();
		} catch (error) {
			throw CodecError.encodeError(this.name, toError(error), message);
		}
	}

	decode(wire: Uint8Array): T {
		try {
			const decoded = this.type.decode(wire);
			return this.fromObject(this.type.toObject(decoded, CONVERSION));
		} catch (error) {
			if (error instanceof CodecError) {
				throw error;
			}
			throw CodecError.decodeError(this.name, toError(error), `[${wire.length} bytes]`);
		}
	}
}

// =============================================================================
// Schema
// =============================================================================

let defaultRoot: Root | undefined;

/**
 * Load the message schema. The bundled schema is parsed once and reused.
 */
export function loadMessageSchema(path: string = DEFAULT_SCHEMA_PATH): Root {
	if (path !== DEFAULT_SCHEMA_PATH) {
		return protobuf.loadSync(path);
	}
	if (!defaultRoot) {
		defaultRoot = protobuf.loadSync(DEFAULT_SCHEMA_PATH);
	}
	return defaultRoot;
}

// =============================================================================
// Envelope mapping
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

function field(object: Record<string, unknown>, key: string): Record<string, unknown> {
	const value = object[key];
	return isRecord(value) ? value : {};
}

function int32(object: Record<string, unknown>, key: string): number {
	const value = object[key];
	return typeof value === "number" ? value | 0 : 0;
}

function text(object: Record<string, unknown>, key: string): string {
	const value = object[key];
	return typeof value === "string" ? value : "";
}

export function clientMessageToObject(message: ClientMessage): Record<string, unknown> {
	switch (message.type) {
		case "addRequest":
			return { addRequest: { a: message.payload.a, b: message.payload.b } };
		case "echo":
			return { echoMessage: { content: message.payload.content } };
		case "unknown":
			return {};
	}
}

export function clientMessageFromObject(object: Record<string, unknown>): ClientMessage {
	switch (object.message) {
		case "addRequest": {
			const request = field(object, "addRequest");
			return addRequest(int32(request, "a"), int32(request, "b"));
		}
		case "echoMessage":
			return echoRequest(text(field(object, "echoMessage"), "content"));
		default:
			return UNKNOWN_CLIENT_MESSAGE;
	}
}

export function serverMessageToObject(message: ServerMessage): Record<string, unknown> {
	switch (message.type) {
		case "addResponse":
			return { addResponse: { result: message.payload.result } };
		case "echo":
			return { echoMessage: { content: message.payload.content } };
	}
}

export function serverMessageFromObject(object: Record<string, unknown>): ServerMessage {
	switch (object.message) {
		case "addResponse":
			return addResponse(int32(field(object, "addResponse"), "result"));
		case "echoMessage":
			return echoResponse(text(field(object, "echoMessage"), "content"));
		default:
			throw new Error(`Server envelope carries no known variant: ${String(object.message)}`);
	}
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Codecs for both directions of a connection
 */
export interface MessageCodecs {
	/** Requests: decoded by the server, encoded by clients */
	client: Codec<ClientMessage>;

	/** Responses: encoded by the server, decoded by clients */
	server: Codec<ServerMessage>;
}

/**
 * Create the client and server envelope codecs from a schema root
 */
export function createMessageCodecs(root: Root = loadMessageSchema()): MessageCodecs {
	return {
		client: new ProtobufCodec<ClientMessage>({
			root,
			typeName: `${SCHEMA_PACKAGE}.ClientMessage`,
			toObject: clientMessageToObject,
			fromObject: clientMessageFromObject,
		}),
		server: new ProtobufCodec<ServerMessage>({
			root,
			typeName: `${SCHEMA_PACKAGE}.ServerMessage`,
			toObject: serverMessageToObject,
			fromObject: serverMessageFromObject,
		}),
	};
}
