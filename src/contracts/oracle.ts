import { type Address, encodeFunctionData } from "viem";
import type { CancellationNotice, OracleRequestGateway } from "../types";
import { ORACLE_ABI } from "./abis";
import type { TransactionClient } from "./client";

export function createContractOracleGateway(options: { client: TransactionClient }): OracleRequestGateway {
	return {
		async cancelOracleRequest(oracle: Address, notice: CancellationNotice): Promise<void> {
			const data = encodeFunctionData({
				abi: ORACLE_ABI,
				functionName: "cancelOracleRequest",
				args: [notice.requestId, notice.payment, notice.callbackSelector, notice.expiration],
			});
			const hash = await options.client.sendTransaction({ to: oracle, data });
			const receipt = await options.client.waitForTransactionReceipt({ hash });
			if (receipt.status !== "success") {
				throw new Error(`cancelOracleRequest reverted in transaction ${hash}`);
			}
		},
	};
}
