import { type Address, decodeFunctionResult, encodeFunctionData, type Hex } from "viem";
import type { TokenTransport } from "../types";
import { TOKEN_ABI } from "./abis";
import type { TransactionClient } from "./client";

export interface ContractTokenTransportOptions {
	client: TransactionClient;
	token: Address;
	/** Sender used when simulating; normally the consumer's own address. */
	account?: Address;
}

/**
 * Pay an oracle through the token's `transferAndCall`. The call is simulated
 * first so a `false` return is seen before anything is sent; a mined but
 * reverted transaction also counts as failure.
 */
export function createContractTokenTransport(options: ContractTokenTransportOptions): TokenTransport {
	return {
		async transferAndCall(target: Address, amount: bigint, payload: Hex): Promise<boolean> {
			const data = encodeFunctionData({
				abi: TOKEN_ABI,
				functionName: "transferAndCall",
				args: [target, amount, payload],
			});
			const simulated = await options.client.call({ to: options.token, data, account: options.account });
			if (!simulated.data || simulated.data === "0x") return false;
			const success = decodeFunctionResult({
				abi: TOKEN_ABI,
				functionName: "transferAndCall",
				data: simulated.data,
			});
			if (!success) return false;
			const hash = await options.client.sendTransaction({ to: options.token, data });
			const receipt = await options.client.waitForTransactionReceipt({ hash });
			return receipt.status === "success";
		},
	};
}
