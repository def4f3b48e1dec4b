import { type Address, decodeFunctionResult, encodeFunctionData, getAddress, type Hex, zeroAddress } from "viem";
import type { NameService, ResolverHandle } from "../types";
import { ADDRESS_RESOLVER_ABI, NAME_REGISTRY_ABI } from "./abis";
import type { CallClient } from "./client";

export interface EnsNameServiceOptions {
	client: CallClient;
	registry: Address;
}

export function createEnsNameService(options: EnsNameServiceOptions): NameService {
	return {
		async resolver(node: Hex): Promise<ResolverHandle | null> {
			const result = await options.client.call({
				to: options.registry,
				data: encodeFunctionData({ abi: NAME_REGISTRY_ABI, functionName: "resolver", args: [node] }),
			});
			if (!result.data || result.data === "0x") return null;
			const resolverAddress = getAddress(
				decodeFunctionResult({ abi: NAME_REGISTRY_ABI, functionName: "resolver", data: result.data }),
			);
			if (resolverAddress === zeroAddress) return null;
			return {
				async addressOf(subject: Hex): Promise<Address> {
					const answer = await options.client.call({
						to: resolverAddress,
						data: encodeFunctionData({ abi: ADDRESS_RESOLVER_ABI, functionName: "addr", args: [subject] }),
					});
					if (!answer.data || answer.data === "0x") return zeroAddress;
					return getAddress(
						decodeFunctionResult({ abi: ADDRESS_RESOLVER_ABI, functionName: "addr", data: answer.data }),
					);
				},
			};
		},
	};
}
