import type { Readable } from "node:stream";
import { ConnectionError } from "./errors";
import { extractFrame } from "./framing";
import type { DrainMode, LengthFieldLength, ReadFrame } from "./types";

export interface FrameReaderConfig {
	lengthFieldLength: LengthFieldLength;
	maxFrameSize: number;
	/** Buffered bytes at which the source is paused */
	highWaterMark?: number;
}

const MIN_HIGH_WATER_MARK = 64 * 1024;

export function defaultHighWaterMark(lengthFieldLength: LengthFieldLength, maxFrameSize: number): number {
	return Math.max(4 * (lengthFieldLength + maxFrameSize), MIN_HIGH_WATER_MARK);
}

/**
 * Pull-based frame reader over a byte stream.
 *
 * Bytes are buffered as the socket delivers them; `read()` hands out one
 * frame at a time and suspends while none is complete. A single consumer is
 * assumed: only the most recent pending `read()` is woken.
 *
 * The source is paused while `highWaterMark` or more bytes are buffered, so a
 * peer that keeps sending without reading responses is held back by TCP flow
 * control rather than by memory.
 */
export class FrameReader {
	private readonly config: FrameReaderConfig;
	private readonly source: Readable;
	private readonly highWaterMark: number;
	private paused = false;
	private buffer: Buffer = Buffer.alloc(0);
	private staleBytes = 0;
	private ended = false;
	private error: Error | null = null;
	private wake: (() => void) | null = null;

	constructor(source: Readable, config: FrameReaderConfig) {
		this.config = config;
		this.source = source;
		this.highWaterMark =
			config.highWaterMark ?? defaultHighWaterMark(config.lengthFieldLength, config.maxFrameSize);
		// A socket held before its reader existed may already be gone
		this.ended = source.destroyed || source.readableEnded;

		source.on("data", (chunk: Buffer) => {
			this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
			if (!this.paused && this.buffer.length >= this.highWaterMark) {
				this.paused = true;
				source.pause();
			}
			this.notify();
		});

		source.on("end", () => {
			this.ended = true;
			this.notify();
		});

		source.on("close", () => {
			this.ended = true;
			this.notify();
		});

		source.on("error", (err: Error) => {
			this.error = err;
			this.notify();
		});
	}

	/** Bytes received and not yet handed out or discarded */
	get bufferedBytes(): number {
		return this.buffer.length;
	}

	/** Whether the source is paused because the buffer is full */
	get isPaused(): boolean {
		return this.paused;
	}

	/** Body bytes of a refused frame still to be discarded */
	get pendingStaleBytes(): number {
		return this.staleBytes;
	}

	/**
	 * Discard stale bytes that are already buffered. Never suspends.
	 *
	 * @returns number of bytes discarded
	 */
	drain(mode: DrainMode = "stale"): number {
		let discarded = 0;

		if (this.staleBytes > 0) {
			const count = Math.min(this.staleBytes, this.buffer.length);
			this.buffer = this.buffer.subarray(count);
			this.staleBytes -= count;
			discarded += count;
		}

		if (mode === "all" && this.buffer.length > 0) {
			discarded += this.buffer.length;
			this.buffer = Buffer.alloc(0);
		}

		this.resumeBelowMark();
		return discarded;
	}

	/**
	 * Wait for the next frame.
	 *
	 * @throws ConnectionError "closed" when the peer ends the stream before a
	 *   complete frame, "io" on a socket error; the signal's reason on abort
	 */
	async read(signal?: AbortSignal): Promise<ReadFrame> {
		for (;;) {
			signal?.throwIfAborted();

			const frame = this.takeFrame();
			if (frame) return frame;

			if (this.error) throw ConnectionError.io(this.error);
			if (this.ended) throw ConnectionError.closed();

			await this.waitForData(signal);
		}
	}

	private takeFrame(): ReadFrame | null {
		this.drain("stale");
		if (this.staleBytes > 0) return null;

		const result = extractFrame(this.buffer, this.config.lengthFieldLength, this.config.maxFrameSize);
		switch (result.type) {
			case "incomplete":
				return null;
			case "frame":
				this.buffer = result.remaining;
				this.resumeBelowMark();
				return { type: "frame", payload: result.payload };
			case "oversized":
				this.buffer = result.remaining;
				this.staleBytes = result.length;
				this.resumeBelowMark();
				return { type: "oversized", length: result.length };
		}
	}

	private resumeBelowMark(): void {
		if (this.paused && this.buffer.length < this.highWaterMark) {
			this.paused = false;
			this.source.resume();
		}
	}

	private waitForData(signal?: AbortSignal): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const onAbort = () => {
				this.wake = null;
				reject(signal?.reason);
			};
			signal?.addEventListener("abort", onAbort, { once: true });

			this.wake = () => {
				signal?.removeEventListener("abort", onAbort);
				resolve();
			};
		});
	}

	private notify(): void {
		const wake = this.wake;
		this.wake = null;
		wake?.();
	}
}
