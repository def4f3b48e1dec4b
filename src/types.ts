import type { Address, Hex } from "viem";

export type Chain = "ethereum" | "sepolia";

export type ParameterValue =
	| { type: "string"; value: string }
	| { type: "bytes"; value: Hex }
	| { type: "int"; value: bigint }
	| { type: "uint"; value: bigint }
	| { type: "string[]"; value: readonly string[] };

export type ParameterType = ParameterValue["type"];

export interface ParameterEntry {
	key: string;
	value: ParameterValue;
	/** CBOR items for the key followed by the value. */
	encoded: Hex;
}

export interface DecodedParameter {
	key: string;
	value: ParameterValue;
}

export interface OracleRequest {
	readonly jobId: Hex;
	readonly callbackTarget: Address;
	readonly callbackSelector: Hex;
	/** Assigned when the request is dispatched. */
	nonce?: bigint;
	readonly parameters: ParameterEntry[];
}

export interface CancellationNotice {
	requestId: Hex;
	payment: bigint;
	callbackSelector: Hex;
	expiration: bigint;
}

// Collaborator interfaces
export interface TokenTransport {
	transferAndCall(target: Address, amount: bigint, payload: Hex): Promise<boolean>;
}

export interface OracleRequestGateway {
	cancelOracleRequest(oracle: Address, notice: CancellationNotice): Promise<void>;
}

export interface AddressResolver {
	resolveAddress(node: Hex): Promise<Address>;
}

export interface ResolverHandle {
	addressOf(node: Hex): Promise<Address>;
}

export interface NameService {
	resolver(node: Hex): Promise<ResolverHandle | null>;
}

export interface NameServiceConfig {
	registry?: Address;
	name?: string;
}

export interface Config {
	/** Default consumer address for the CLI's `request-id` and `payload`. */
	consumer?: Address;
	nameService?: NameServiceConfig;
	rpcUrls?: Partial<Record<Chain, string>>;
}
