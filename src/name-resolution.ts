import {
	type Address,
	encodePacked,
	getAddress,
	type Hex,
	isAddress,
	keccak256,
	stringToHex,
	zeroAddress,
} from "viem";
import { describeError, OracleClientError } from "./errors";
import type { AddressResolver, NameService } from "./types";

export const TOKEN_SUBNAME = keccak256(stringToHex("link"));
export const ORACLE_SUBNAME = keccak256(stringToHex("oracle"));

export function subnode(node: Hex, label: Hex): Hex {
	return keccak256(encodePacked(["bytes32", "bytes32"], [node, label]));
}

export function tokenSubnode(node: Hex): Hex {
	return subnode(node, TOKEN_SUBNAME);
}

export function oracleSubnode(node: Hex): Hex {
	return subnode(node, ORACLE_SUBNAME);
}

/** Look up addresses through a name service: the registry names a resolver, the resolver names the address. */
export function createNameServiceResolver(nameService: NameService): AddressResolver {
	return {
		async resolveAddress(node) {
			const handle = await nameService.resolver(node);
			if (!handle) {
				throw new OracleClientError({
					message: `No resolver is registered for node ${node}`,
					reason: "resolution_failed",
				});
			}
			return await handle.addressOf(node);
		},
	};
}

/** Fixed node -> address bindings, for deployments that configure addresses directly. */
export function createStaticAddressResolver(bindings: Record<Hex, Address>): AddressResolver {
	const normalized = new Map<string, Address>();
	for (const [node, address] of Object.entries(bindings)) {
		normalized.set(node.toLowerCase(), address);
	}
	return {
		async resolveAddress(node) {
			return normalized.get(node.toLowerCase()) ?? zeroAddress;
		},
	};
}

/**
 * Resolve `node` and insist on a usable address. A thrown lookup, a
 * malformed answer and the zero address all fail with `resolution_failed`.
 */
export async function resolveRequiredAddress(resolver: AddressResolver, node: Hex): Promise<Address> {
	let resolved: string;
	try {
		resolved = await resolver.resolveAddress(node);
	} catch (error) {
		if (error instanceof OracleClientError && error.reason === "resolution_failed") {
			throw error;
		}
		throw new OracleClientError({
			message: `Name resolution failed for node ${node}: ${describeError(error)}`,
			reason: "resolution_failed",
			cause: error,
		});
	}
	if (!isAddress(resolved, { strict: false }) || resolved.toLowerCase() === zeroAddress) {
		throw new OracleClientError({
			message: `Node ${node} resolved to an unusable address (${resolved})`,
			reason: "resolution_failed",
		});
	}
	return getAddress(resolved);
}
