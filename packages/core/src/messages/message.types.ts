/**
 * Message Types
 *
 * Tagged unions for the client and server message catalogs.
 * Every message is a `{ type, payload }` envelope; `type` is the discriminant.
 */

/**
 * Generic message envelope
 */
export interface Message<K extends string = string, P = unknown> {
	/** Message variant */
	readonly type: K;

	/** Variant payload */
	readonly payload: P;
}

// =============================================================================
// Payloads
// =============================================================================

/**
 * Add two 32-bit signed integers
 */
export interface AddRequest {
	a: number;
	b: number;
}

export interface AddResponse {
	result: number;
}

/**
 * Raw text echoed back to the sender
 */
export interface EchoPayload {
	content: string;
}

// =============================================================================
// Client Messages
// =============================================================================

export type AddRequestMessage = Message<"addRequest", AddRequest>;

export type EchoRequestMessage = Message<"echo", EchoPayload>;

/**
 * Envelope that decoded cleanly but carries no variant this server knows
 * (no variant set, or a field number from a newer schema).
 */
export type UnknownClientMessage = Message<"unknown", null>;

export type ClientMessage = AddRequestMessage | EchoRequestMessage | UnknownClientMessage;

export type ClientMessageType = ClientMessage["type"];

// =============================================================================
// Server Messages
// =============================================================================

export type AddResponseMessage = Message<"addResponse", AddResponse>;

export type EchoResponseMessage = Message<"echo", EchoPayload>;

export type ServerMessage = AddResponseMessage | EchoResponseMessage;

export type ServerMessageType = ServerMessage["type"];

// =============================================================================
// Constructors
// =============================================================================

export function addRequest(a: number, b: number): AddRequestMessage {
	return { type: "addRequest", payload: { a, b } };
}

export function addResponse(result: number): AddResponseMessage {
	return { type: "addResponse", payload: { result } };
}

export function echoRequest(content: string): EchoRequestMessage {
	return { type: "echo", payload: { content } };
}

export function echoResponse(content: string): EchoResponseMessage {
	return { type: "echo", payload: { content } };
}

export const UNKNOWN_CLIENT_MESSAGE: UnknownClientMessage = { type: "unknown", payload: null };
