import { ConnectionError } from "./errors";
import type { LengthFieldLength } from "./types";

/**
 * Result of looking for one frame at the head of a buffer
 */
export type FrameExtraction =
	| { type: "incomplete" }
	| { type: "frame"; payload: Uint8Array; remaining: Buffer }
	/** Header consumed, body still pending; `remaining` starts at the body */
	| { type: "oversized"; length: number; remaining: Buffer };

/** Largest length an 8-byte header may declare and still be a safe integer */
const MAX_SAFE_LENGTH = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Decode the big-endian length header at the start of `buffer`.
 *
 * @throws ConnectionError "protocol" when an 8-byte header exceeds `Number.MAX_SAFE_INTEGER`
 */
export function readLength(buffer: Buffer, lengthFieldLength: LengthFieldLength): number {
	switch (lengthFieldLength) {
		case 1:
			return buffer.readUInt8(0);
		case 2:
			return buffer.readUInt16BE(0);
		case 4:
			return buffer.readUInt32BE(0);
		case 8: {
			const length = buffer.readBigUInt64BE(0);
			if (length > MAX_SAFE_LENGTH) throw ConnectionError.lengthOverflow(length);
			return Number(length);
		}
	}
}

/**
 * Encode `length` as a big-endian header of `lengthFieldLength` bytes
 */
export function writeLength(length: number, lengthFieldLength: LengthFieldLength): Buffer {
	const header = Buffer.alloc(lengthFieldLength);
	switch (lengthFieldLength) {
		case 1:
			header.writeUInt8(length, 0);
			break;
		case 2:
			header.writeUInt16BE(length, 0);
			break;
		case 4:
			header.writeUInt32BE(length, 0);
			break;
		case 8:
			header.writeBigUInt64BE(BigInt(length), 0);
			break;
	}
	return header;
}

/**
 * Frame a payload for sending: length header followed by the payload bytes
 */
export function frameMessage(payload: Uint8Array, lengthFieldLength: LengthFieldLength): Buffer {
	return Buffer.concat([writeLength(payload.length, lengthFieldLength), payload]);
}

/**
 * Take the first frame off the head of `buffer`.
 *
 * A header that declares more than `maxFrameSize` bytes is reported as
 * `oversized` as soon as the header is complete, without waiting for the body.
 */
export function extractFrame(
	buffer: Buffer,
	lengthFieldLength: LengthFieldLength,
	maxFrameSize: number,
): FrameExtraction {
	if (buffer.length < lengthFieldLength) return { type: "incomplete" };

	const length = readLength(buffer, lengthFieldLength);
	if (length > maxFrameSize) {
		return { type: "oversized", length, remaining: buffer.subarray(lengthFieldLength) };
	}

	const end = lengthFieldLength + length;
	if (buffer.length < end) return { type: "incomplete" };

	return {
		type: "frame",
		payload: new Uint8Array(buffer.subarray(lengthFieldLength, end)),
		remaining: buffer.subarray(end),
	};
}
