/**
 * Request Dispatcher
 *
 * Maps a decoded client message to the server's response.
 */

import {
	type ClientMessage,
	type ServerMessage,
	addResponse,
	echoResponse,
} from "../messages/message.types";

/**
 * Dispatch function accepted by the connection handler.
 * `null` means the request is answered with nothing.
 */
export type RequestDispatcher = (message: ClientMessage) => ServerMessage | null;

/**
 * Add two int32 values with two's-complement wraparound.
 *
 * `2147483647 + 1` is `-2147483648`, matching the int32 fields on the wire.
 */
export function addInt32(a: number, b: number): number {
	return (a + b) | 0;
}

/**
 * Default dispatcher. Pure: no I/O, no shared state.
 *
 * - `addRequest{a, b}` -> `addResponse{a + b}`
 * - `echo{content}` -> `echo{content}`
 * - anything else -> `null`
 */
export const dispatch: RequestDispatcher = (message) => {
	switch (message.type) {
		case "addRequest":
			return addResponse(addInt32(message.payload.a, message.payload.b));
		case "echo":
			return echoResponse(message.payload.content);
		default:
			return null;
	}
};
