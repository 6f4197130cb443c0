/**
 * Running Flag
 *
 * The one piece of state shared by the accept path and every connection
 * context. Written by the server on run/stop, polled by connection loops
 * between iterations. All contexts share one event loop, so reads and writes
 * are atomic without further synchronization.
 *
 * Polling is cooperative: a context suspended in a socket read or write only
 * observes a cleared flag after that call returns.
 */
export class RunningFlag {
	private running = false;

	get isRunning(): boolean {
		return this.running;
	}

	set(): void {
		this.running = true;
	}

	/**
	 * Clear the flag.
	 * @returns whether the flag was set before the call
	 */
	clear(): boolean {
		const wasRunning = this.running;
		this.running = false;
		return wasRunning;
	}
}
