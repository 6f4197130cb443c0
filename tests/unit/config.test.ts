/**
 * TCP Transport Configuration Tests
 */

import { describe, expect, it } from "vitest";
import { loadServerConfigFromEnv, resolveClientConfig, resolveServerConfig } from "@sumwire/protocol-tcp";

describe("resolveServerConfig", () => {
	it("should apply defaults", () => {
		expect(resolveServerConfig()).toEqual({
			host: "127.0.0.1",
			port: 7878,
			lengthFieldLength: 4,
			maxFrameSize: 512,
			drainMode: "stale",
			logLevel: "info",
		});
	});

	it("should keep explicit values, including port 0", () => {
		const config = resolveServerConfig({ host: "0.0.0.0", port: 0, drainMode: "all" });

		expect(config.host).toBe("0.0.0.0");
		expect(config.port).toBe(0);
		expect(config.drainMode).toBe("all");
	});
});

describe("resolveClientConfig", () => {
	it("should apply defaults", () => {
		expect(resolveClientConfig()).toEqual({ timeout: 5000, lengthFieldLength: 4, maxFrameSize: 65536 });
	});
});

describe("loadServerConfigFromEnv", () => {
	it("should return an empty config when nothing is set", () => {
		expect(loadServerConfigFromEnv({})).toEqual({});
	});

	it("should read every supported variable", () => {
		const config = loadServerConfigFromEnv({
			SUMWIRE_HOST: "0.0.0.0",
			SUMWIRE_PORT: "9000",
			SUMWIRE_LENGTH_FIELD: "2",
			SUMWIRE_MAX_FRAME_SIZE: "1024",
			SUMWIRE_DRAIN_MODE: "all",
			SUMWIRE_LOG_LEVEL: "debug",
		});

		expect(config).toEqual({
			host: "0.0.0.0",
			port: 9000,
			lengthFieldLength: 2,
			maxFrameSize: 1024,
			drainMode: "all",
			logLevel: "debug",
		});
	});

	it("should ignore empty variables", () => {
		expect(loadServerConfigFromEnv({ SUMWIRE_PORT: "" })).toEqual({});
	});

	it("should reject a port out of range", () => {
		expect(() => loadServerConfigFromEnv({ SUMWIRE_PORT: "70000" })).toThrow(
			"invalid SUMWIRE_PORT: 70000 (expected an integer from 0 to 65535)",
		);
	});

	it("should reject a non-numeric port", () => {
		expect(() => loadServerConfigFromEnv({ SUMWIRE_PORT: "http" })).toThrow("invalid SUMWIRE_PORT: http");
	});

	it("should reject an unsupported header size", () => {
		expect(() => loadServerConfigFromEnv({ SUMWIRE_LENGTH_FIELD: "3" })).toThrow(
			"invalid SUMWIRE_LENGTH_FIELD: 3 (expected one of 1, 2, 4, 8)",
		);
	});

	it("should reject an unknown drain mode", () => {
		expect(() => loadServerConfigFromEnv({ SUMWIRE_DRAIN_MODE: "some" })).toThrow(
			"invalid SUMWIRE_DRAIN_MODE: some (expected one of stale, all)",
		);
	});
});
