/**
 * Request Dispatcher Tests
 */

import { describe, expect, it } from "vitest";
import {
	RunningFlag,
	UNKNOWN_CLIENT_MESSAGE,
	addInt32,
	addRequest,
	addResponse,
	dispatch,
	echoRequest,
	echoResponse,
} from "sumwire";

describe("dispatch", () => {
	it("should add two numbers", () => {
		expect(dispatch(addRequest(2, 3))).toEqual(addResponse(5));
	});

	it("should add a negative and a positive number", () => {
		expect(dispatch(addRequest(-1, 1))).toEqual(addResponse(0));
	});

	it("should echo content back", () => {
		expect(dispatch(echoRequest("ping"))).toEqual(echoResponse("ping"));
	});

	it("should return null for unknown messages", () => {
		expect(dispatch(UNKNOWN_CLIENT_MESSAGE)).toBeNull();
	});
});

describe("addInt32", () => {
	it("should wrap on positive overflow", () => {
		expect(addInt32(2147483647, 1)).toBe(-2147483648);
	});

	it("should wrap on negative overflow", () => {
		expect(addInt32(-2147483648, -1)).toBe(2147483647);
	});

	it("should leave in-range sums alone", () => {
		expect(addInt32(-40, 2)).toBe(-38);
	});
});

describe("RunningFlag", () => {
	it("should start cleared", () => {
		expect(new RunningFlag().isRunning).toBe(false);
	});

	it("should report whether it was set when cleared", () => {
		const flag = new RunningFlag();
		flag.set();

		expect(flag.isRunning).toBe(true);
		expect(flag.clear()).toBe(true);
		expect(flag.isRunning).toBe(false);
		expect(flag.clear()).toBe(false);
	});
});
