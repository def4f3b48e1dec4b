import type { Address, Hex } from "viem";

export interface CallRequest {
	to: Address;
	data: Hex;
	account?: Address;
}

/** The slice of a viem public client used for read-only contract calls. */
export interface CallClient {
	call: (args: CallRequest) => Promise<{ data?: Hex }>;
}

/** Adds sending and confirming a transaction; a viem wallet client extended with public actions fits. */
export interface TransactionClient extends CallClient {
	sendTransaction: (args: { to: Address; data: Hex }) => Promise<Hex>;
	waitForTransactionReceipt: (args: { hash: Hex }) => Promise<{ status: "success" | "reverted" }>;
}
