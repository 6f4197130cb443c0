/**
 * TCP Transport Types
 */

/**
 * Size in bytes of the big-endian length header in front of every frame
 */
export type LengthFieldLength = 1 | 2 | 4 | 8;

/**
 * What the drain phase discards before each read.
 * - "stale": body bytes of a refused oversized frame only
 * - "all": everything buffered at that instant, including pipelined requests
 */
export type DrainMode = "stale" | "all";

export const LENGTH_FIELD_LENGTHS: readonly LengthFieldLength[] = [1, 2, 4, 8];

export const DRAIN_MODES: readonly DrainMode[] = ["stale", "all"];

/**
 * A frame handed to the connection handler by the frame reader
 */
export type ReadFrame =
	| { type: "frame"; payload: Uint8Array }
	/** Declared length exceeded the limit; the body is discarded by the drain phase */
	| { type: "oversized"; length: number };
