import type { Hex } from "viem";

export type OracleClientErrorReason =
	| "duplicate_request"
	| "unauthorized"
	| "transfer_failed"
	| "resolution_failed"
	| "cancel_failed"
	| "duplicate_parameter"
	| "invalid_parameter"
	| "invalid_request"
	| "not_configured";

export class OracleClientError extends Error {
	reason: OracleClientErrorReason;
	requestId?: Hex;

	constructor(options: {
		message: string;
		reason: OracleClientErrorReason;
		requestId?: Hex;
		cause?: unknown;
	}) {
		super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = "OracleClientError";
		this.reason = options.reason;
		this.requestId = options.requestId;
	}
}

export function isOracleClientError(error: unknown): error is OracleClientError {
	return error instanceof OracleClientError;
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
