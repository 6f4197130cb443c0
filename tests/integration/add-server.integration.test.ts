/**
 * Add Server Integration Tests
 *
 * Real server, real sockets, loopback only.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import {
	addRequest,
	addResponse,
	createMessageCodecs,
	createSilentLogger,
	echoRequest,
	echoResponse,
} from "sumwire";
import { type TcpClient, TcpServer, frameMessage, writeLength } from "@sumwire/protocol-tcp";
import {
	HOST,
	type RunningServer,
	connectClient,
	createCaptureLogger,
	messages,
	shutdown,
	sleep,
	startServer,
} from "../helpers/test-helpers";

const codecs = createMessageCodecs();

const requestFrame = (a: number, b: number) => frameMessage(codecs.client.encode(addRequest(a, b)), 4);

describe("Add Server Integration Tests", () => {
	let running: RunningServer | undefined;
	let clients: TcpClient[] = [];

	const connect = async () => {
		if (!running) throw new Error("server not started");
		const client = await connectClient(running.port);
		clients.push(client);
		return client;
	};

	afterEach(async () => {
		if (running) await shutdown(running, clients);
		running = undefined;
		clients = [];
	});

	describe("Request/response", () => {
		it("should answer an add request", async () => {
			running = await startServer();
			const client = await connect();

			expect(await client.request(addRequest(2, 3))).toEqual(addResponse(5));
			expect(await client.request(addRequest(-1, 1))).toEqual(addResponse(0));
		});

		it("should wrap int32 overflow", async () => {
			running = await startServer();
			const client = await connect();

			expect(await client.request(addRequest(2147483647, 1))).toEqual(addResponse(-2147483648));
		});

		it("should echo content", async () => {
			running = await startServer();
			const client = await connect();

			expect(await client.request(echoRequest("hello"))).toEqual(echoResponse("hello"));
		});

		it("should answer back-to-back requests in order", async () => {
			running = await startServer();
			const client = await connect();

			await client.write(Buffer.concat([requestFrame(2, 3), requestFrame(10, 20)]));

			expect(await client.receive()).toEqual(addResponse(5));
			expect(await client.receive()).toEqual(addResponse(30));
		});
	});

	describe("Dropped input", () => {
		it("should ignore undecodable bytes and keep the connection open", async () => {
			running = await startServer();
			const client = await connect();

			await client.write(frameMessage(new Uint8Array([0x0a, 0x05, 0x01]), 4));

			await expect(client.receive(200)).rejects.toMatchObject({ kind: "timeout" });
			expect(client.connected).toBe(true);
			expect(await client.request(addRequest(2, 3))).toEqual(addResponse(5));
		});

		it("should send nothing for an envelope without a variant", async () => {
			running = await startServer();
			const client = await connect();

			await client.write(frameMessage(new Uint8Array(0), 4));

			await expect(client.receive(200)).rejects.toMatchObject({ kind: "timeout" });
			expect(await client.request(addRequest(1, 1))).toEqual(addResponse(2));
		});

		it("should skip an oversized frame without losing sync", async () => {
			running = await startServer({ maxFrameSize: 16 });
			const client = await connect();

			await client.write(Buffer.concat([writeLength(100, 4), Buffer.alloc(100, 0xab)]));

			expect(await client.request(addRequest(2, 3))).toEqual(addResponse(5));
		});

		it("should discard pipelined requests in 'all' drain mode", async () => {
			running = await startServer({ drainMode: "all" });
			const client = await connect();

			await client.write(Buffer.concat([requestFrame(1, 1), requestFrame(2, 2)]));

			expect(await client.receive()).toEqual(addResponse(2));
			await expect(client.receive(200)).rejects.toMatchObject({ kind: "timeout" });
			expect(await client.request(addRequest(3, 3))).toEqual(addResponse(6));
		});
	});

	describe("Connection isolation", () => {
		it("should route each response to its own connection", async () => {
			running = await startServer();
			const group = await Promise.all(Array.from({ length: 8 }, () => connect()));

			const responses = await Promise.all(group.map((client, i) => client.request(addRequest(i, i * 100))));

			expect(responses).toEqual(group.map((_, i) => addResponse(i * 101)));
		});

		it("should keep serving other connections after one disconnects", async () => {
			running = await startServer();
			const server = running.server;
			const first = await connect();
			const second = await connect();

			expect(await first.request(addRequest(1, 2))).toEqual(addResponse(3));
			await vi.waitFor(() => expect(server.connectionCount).toBe(2));

			first.close();
			await first.closed;
			await vi.waitFor(() => expect(server.connectionCount).toBe(1));

			expect(await second.request(addRequest(4, 5))).toEqual(addResponse(9));

			const third = await connect();
			expect(await third.request(addRequest(6, 7))).toEqual(addResponse(13));
		});
	});

	describe("Lifecycle", () => {
		it("should reject run when the address is taken", async () => {
			running = await startServer();

			const other = new TcpServer({ host: HOST, port: running.port, logLevel: "silent" });

			await expect(other.run()).rejects.toMatchObject({ code: "EADDRINUSE" });
		});

		it("should finish the in-flight request after stop, then close", async () => {
			running = await startServer();
			const { server, port, done } = running;
			const client = await connect();

			expect(await client.request(addRequest(1, 1))).toEqual(addResponse(2));

			server.stop();
			expect(server.isRunning).toBe(false);

			// The connection context is suspended in a read; it serves one more cycle
			expect(await client.request(addRequest(2, 2))).toEqual(addResponse(4));
			await client.closed;
			await done;

			await expect(connectClient(port)).rejects.toMatchObject({ code: "ECONNREFUSED" });
		});

		it("should return from run while an idle client is still connected", async () => {
			running = await startServer();
			const { server, done } = running;
			const client = await connect();
			await vi.waitFor(() => expect(server.connectionCount).toBe(1));

			server.stop();
			const outcome = await Promise.race([done.then(() => "returned"), sleep(1000).then(() => "pending")]);

			expect(outcome).toBe("returned");
			expect(client.connected).toBe(true);
			expect(server.connectionCount).toBe(1);

			client.close();
			await server.drained();
			expect(server.connectionCount).toBe(0);
		});

		it("should serve a connection accepted before run", async () => {
			const server = new TcpServer({ host: HOST, port: 0, logger: createSilentLogger() });
			const { port } = await server.listen();
			const client = await connectClient(port);
			clients.push(client);

			await client.send(addRequest(2, 3));
			await sleep(50);
			expect(server.connectionCount).toBe(0);

			running = { server, port, done: server.run() };

			expect(await client.receive()).toEqual(addResponse(5));
			expect(server.connectionCount).toBe(1);
		});

		it("should log the lifecycle", async () => {
			const { logger, records } = createCaptureLogger();
			running = await startServer({ logger });
			const { server, port, done } = running;

			const client = await connect();
			expect(await client.request(addRequest(1, 1))).toEqual(addResponse(2));
			client.close();
			await vi.waitFor(() => expect(server.connectionCount).toBe(0));

			server.stop();
			server.stop();
			await done;

			expect(messages(records)).toEqual([
				`Server is running on ${HOST}:${port}`,
				"New client connected",
				"Client disconnected",
				expect.stringMatching(/^Client at 127\.0\.0\.1:\d+ disconnected$/),
				"Shutdown signal sent.",
				"Server was already stopped or not running.",
				"Server stopped.",
			]);
		});
	});
});
