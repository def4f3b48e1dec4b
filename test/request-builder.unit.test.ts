import { describe, expect, test } from "vitest";
import {
	addBytes,
	addInt,
	addParameter,
	addString,
	addStringArray,
	addUint,
	buildRequest,
	jobIdFromString,
} from "../src/request/builder";
import { catchError } from "./helpers/errors";

const JOB_ID = `0x${"ab".repeat(32)}` as const;
const CALLBACK = "0x00000000000000000000000000000000000000c1";
const SELECTOR = "0xABCDEF01";

describe("buildRequest", () => {
	test("starts with no parameters and no nonce", () => {
		const request = buildRequest(JOB_ID, CALLBACK, SELECTOR);

		expect(request.jobId).toBe(JOB_ID);
		expect(request.callbackTarget.toLowerCase()).toBe(CALLBACK);
		expect(request.callbackSelector).toBe("0xabcdef01");
		expect(request.nonce).toBeUndefined();
		expect(request.parameters).toEqual([]);
	});

	test("rejects a job id that is not 32 bytes", () => {
		const error = catchError(() => buildRequest("0x1234", CALLBACK, SELECTOR));
		expect(error.reason).toBe("invalid_request");
	});

	test("rejects an invalid callback target", () => {
		expect(catchError(() => buildRequest(JOB_ID, "0x1234", SELECTOR)).reason).toBe("invalid_request");
	});

	test("rejects a selector that is not 4 bytes", () => {
		expect(catchError(() => buildRequest(JOB_ID, CALLBACK, "0x123456")).reason).toBe("invalid_request");
	});
});

describe("jobIdFromString", () => {
	test("right-pads ASCII job ids to 32 bytes", () => {
		expect(jobIdFromString("abc")).toBe(`0x616263${"00".repeat(29)}`);
	});

	test("rejects job ids longer than 32 bytes", () => {
		expect(catchError(() => jobIdFromString("x".repeat(33))).reason).toBe("invalid_request");
	});
});

describe("addParameter", () => {
	test("appends entries in call order", () => {
		const request = buildRequest(JOB_ID, CALLBACK, SELECTOR);
		addString(request, "get", "https://x");
		addUint(request, "times", 100n);
		addBytes(request, "blob", "0x00ff");

		expect(request.parameters.map((entry) => entry.key)).toEqual(["get", "times", "blob"]);
		expect(request.parameters[1].encoded).toBe("0x6574696d65731864");
	});

	test("rejects a duplicate key and keeps the first value", () => {
		const request = buildRequest(JOB_ID, CALLBACK, SELECTOR);
		addString(request, "path", "USD");

		const error = catchError(() => addString(request, "path", "EUR"));

		expect(error.reason).toBe("duplicate_parameter");
		expect(error.message).toBe('Parameter "path" was already added to this request');
		expect(request.parameters).toHaveLength(1);
		expect(request.parameters[0].value).toEqual({ type: "string", value: "USD" });
	});

	test("rejects an empty key", () => {
		const request = buildRequest(JOB_ID, CALLBACK, SELECTOR);
		expect(catchError(() => addString(request, "", "x")).reason).toBe("invalid_parameter");
	});

	test("enforces the 256-bit integer ranges", () => {
		const request = buildRequest(JOB_ID, CALLBACK, SELECTOR);

		expect(catchError(() => addUint(request, "a", -1n)).reason).toBe("invalid_parameter");
		expect(catchError(() => addUint(request, "b", 2n ** 256n)).reason).toBe("invalid_parameter");
		expect(catchError(() => addInt(request, "c", 2n ** 255n)).reason).toBe("invalid_parameter");
		expect(catchError(() => addInt(request, "d", -(2n ** 255n) - 1n)).reason).toBe("invalid_parameter");

		addUint(request, "max", 2n ** 256n - 1n);
		addInt(request, "min", -(2n ** 255n));
		expect(request.parameters.map((entry) => entry.key)).toEqual(["max", "min"]);
	});

	test("rejects odd-length bytes", () => {
		const request = buildRequest(JOB_ID, CALLBACK, SELECTOR);
		expect(catchError(() => addBytes(request, "blob", "0xabc")).reason).toBe("invalid_parameter");
	});

	test("copies string arrays", () => {
		const request = buildRequest(JOB_ID, CALLBACK, SELECTOR);
		const path = ["data", "price"];
		addStringArray(request, "path", path);
		path.push("extra");

		expect(request.parameters[0].value).toEqual({ type: "string[]", value: ["data", "price"] });
	});

	test("refuses parameters once the request carries a nonce", () => {
		const request = buildRequest(JOB_ID, CALLBACK, SELECTOR);
		request.nonce = 1n;

		const error = catchError(() => addParameter(request, "late", { type: "string", value: "x" }));
		expect(error.reason).toBe("invalid_request");
	});
});
