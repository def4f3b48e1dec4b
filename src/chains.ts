import type { Address, Chain as ViemChain } from "viem";
import { mainnet, sepolia } from "viem/chains";
import type { Chain } from "./types";

export interface ChainConfig {
	chainId: number;
	name: string;
	rpcUrl: string;
	nameRegistry: Address;
	viemChain: ViemChain;
}

// ENS registry, deployed at the same address on mainnet and Sepolia.
const ENS_REGISTRY: Address = "0x00000000000C2E074eC69A0dFb2997BA6C7d2e1e";

export const CHAINS: Record<Chain, ChainConfig> = {
	ethereum: {
		chainId: 1,
		name: "Ethereum",
		rpcUrl: "https://ethereum.publicnode.com",
		nameRegistry: ENS_REGISTRY,
		viemChain: mainnet,
	},
	sepolia: {
		chainId: 11155111,
		name: "Sepolia",
		rpcUrl: "https://ethereum-sepolia.publicnode.com",
		nameRegistry: ENS_REGISTRY,
		viemChain: sepolia,
	},
};

export const VALID_CHAINS: Chain[] = ["ethereum", "sepolia"];

export function getChainConfig(chain: Chain): ChainConfig {
	return CHAINS[chain];
}

export function isChain(value: string | undefined): value is Chain {
	return value === "ethereum" || value === "sepolia";
}
