import {
	type Address,
	encodeFunctionData,
	encodePacked,
	type Hex,
	keccak256,
	toFunctionSelector,
	zeroAddress,
} from "viem";
import { ORACLE_ABI, ORACLE_REQUEST_SIGNATURE } from "./contracts/abis";
import { encodeParameters } from "./request/params";
import type { OracleRequest } from "./types";

/** Version tag of the argument layout the oracle expects. */
export const ARGS_VERSION = 1n;

// The token contract supplies the real sender and amount when it forwards the call.
export const SENDER_OVERRIDE: Address = zeroAddress;
export const AMOUNT_OVERRIDE = 0n;

export const ORACLE_REQUEST_SELECTOR = toFunctionSelector(ORACLE_REQUEST_SIGNATURE);

export function computeRequestId(consumer: Address, nonce: bigint): Hex {
	return keccak256(encodePacked(["address", "uint256"], [consumer, nonce]));
}

export interface OracleRequestPayloadInput {
	requestId: Hex;
	request: OracleRequest;
	nonce: bigint;
}

export function encodeOracleRequest(input: OracleRequestPayloadInput): Hex {
	return encodeFunctionData({
		abi: ORACLE_ABI,
		functionName: "oracleRequest",
		args: [
			SENDER_OVERRIDE,
			AMOUNT_OVERRIDE,
			input.requestId,
			input.request.callbackTarget,
			input.request.callbackSelector,
			input.nonce,
			ARGS_VERSION,
			encodeParameters(input.request.parameters),
		],
	});
}
