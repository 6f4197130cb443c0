/**
 * sumwire core
 *
 * Message catalog, protobuf codec and request dispatcher shared by the
 * server and its clients. Transport lives in `@sumwire/protocol-tcp`.
 *
 * @example
 * ```typescript
 * import { addRequest, createMessageCodecs, dispatch } from 'sumwire';
 *
 * const { client, server } = createMessageCodecs();
 * const request = client.decode(client.encode(addRequest(2, 3)));
 * const response = dispatch(request);
 * // { type: 'addResponse', payload: { result: 5 } }
 * ```
 */

// Messages
export * from "./messages/message.types";

// Codecs
export { CodecError, toError } from "./codecs/codec.types";
export type { Codec, CodecOperation, WireFormat } from "./codecs/codec.types";
export {
	ProtobufCodec,
	createMessageCodecs,
	loadMessageSchema,
	clientMessageFromObject,
	clientMessageToObject,
	serverMessageFromObject,
	serverMessageToObject,
	DEFAULT_SCHEMA_PATH,
	SCHEMA_PACKAGE,
} from "./codecs/protobuf.codec";
export type { MessageCodecs, ProtobufCodecOptions } from "./codecs/protobuf.codec";

// Dispatch
export { dispatch, addInt32 } from "./dispatch/dispatcher";
export type { RequestDispatcher } from "./dispatch/dispatcher";

// Logging
export { createLogger, createSilentLogger } from "./logging/logger";
export type { LevelWithSilent, Logger, LoggerOptions } from "./logging/logger";

// Shutdown signal
export { RunningFlag } from "./running-flag";
