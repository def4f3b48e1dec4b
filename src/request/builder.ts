import { getAddress, type Hex, isAddress, isHex, size, stringToHex } from "viem";
import { OracleClientError } from "../errors";
import type { OracleRequest, ParameterEntry, ParameterValue } from "../types";
import { encodeParameter } from "./params";

const MAX_UINT256 = 2n ** 256n - 1n;
const MIN_INT256 = -(2n ** 255n);
const MAX_INT256 = 2n ** 255n - 1n;

export function buildRequest(jobId: Hex, callbackTarget: string, callbackSelector: Hex): OracleRequest {
	if (!isHex(jobId, { strict: true }) || size(jobId) !== 32) {
		throw invalidRequest(`Job id must be 32 bytes of hex, got ${jobId}`);
	}
	if (!isAddress(callbackTarget, { strict: false })) {
		throw invalidRequest(`Invalid callback target ${callbackTarget}`);
	}
	if (!isHex(callbackSelector, { strict: true }) || size(callbackSelector) !== 4) {
		throw invalidRequest(`Callback selector must be 4 bytes of hex, got ${callbackSelector}`);
	}
	return {
		jobId: lowercaseHex(jobId),
		callbackTarget: getAddress(callbackTarget),
		callbackSelector: lowercaseHex(callbackSelector),
		parameters: [],
	};
}

/** Right-pad a short ASCII job id (e.g. an external job id without dashes) to 32 bytes. */
export function jobIdFromString(value: string): Hex {
	if (value.length === 0) {
		throw invalidRequest("Job id must not be empty");
	}
	const encoded = stringToHex(value);
	if (size(encoded) > 32) {
		throw invalidRequest(`Job id "${value}" is longer than 32 bytes`);
	}
	return stringToHex(value, { size: 32 });
}

export function addParameter(request: OracleRequest, key: string, value: ParameterValue): void {
	if (request.nonce !== undefined) {
		throw invalidRequest("Cannot add parameters to a request that was already dispatched");
	}
	appendParameter(request.parameters, key, value);
}

/** Validate and encode one key/value pair onto an ordered parameter list. */
export function appendParameter(parameters: ParameterEntry[], key: string, value: ParameterValue): void {
	if (key.length === 0) {
		throw invalidParameter("Parameter key must not be empty", value);
	}
	if (parameters.some((entry) => entry.key === key)) {
		throw new OracleClientError({
			message: `Parameter "${key}" was already added to this request`,
			reason: "duplicate_parameter",
		});
	}
	validateValue(key, value);
	parameters.push({ key, value, encoded: encodeParameter(key, value) });
}

export function addString(request: OracleRequest, key: string, value: string): void {
	addParameter(request, key, { type: "string", value });
}

export function addBytes(request: OracleRequest, key: string, value: Hex): void {
	addParameter(request, key, { type: "bytes", value });
}

export function addInt(request: OracleRequest, key: string, value: bigint): void {
	addParameter(request, key, { type: "int", value });
}

export function addUint(request: OracleRequest, key: string, value: bigint): void {
	addParameter(request, key, { type: "uint", value });
}

export function addStringArray(request: OracleRequest, key: string, values: readonly string[]): void {
	addParameter(request, key, { type: "string[]", value: [...values] });
}

export function isDispatched(request: OracleRequest): boolean {
	return request.nonce !== undefined;
}

function validateValue(key: string, value: ParameterValue): void {
	switch (value.type) {
		case "bytes":
			if (!isHex(value.value, { strict: true }) || (value.value.length - 2) % 2 !== 0) {
				throw invalidParameter(`Parameter "${key}" must be even-length hex bytes`, value);
			}
			return;
		case "int":
			if (value.value < MIN_INT256 || value.value > MAX_INT256) {
				throw invalidParameter(`Parameter "${key}" is outside the int256 range`, value);
			}
			return;
		case "uint":
			if (value.value < 0n || value.value > MAX_UINT256) {
				throw invalidParameter(`Parameter "${key}" is outside the uint256 range`, value);
			}
			return;
		case "string":
		case "string[]":
			return;
	}
}

export function lowercaseHex(value: Hex): Hex {
	return `0x${value.slice(2).toLowerCase()}`;
}

function invalidRequest(message: string): OracleClientError {
	return new OracleClientError({ message, reason: "invalid_request" });
}

function invalidParameter(message: string, value: ParameterValue): OracleClientError {
	return new OracleClientError({ message: `${message} (${value.type})`, reason: "invalid_parameter" });
}
