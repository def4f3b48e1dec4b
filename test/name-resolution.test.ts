import { concat, encodeFunctionResult, getAddress, type Hex, keccak256, namehash, stringToHex, zeroAddress } from "viem";
import { describe, expect, test } from "vitest";
import { OracleClient } from "../src/client";
import { ADDRESS_RESOLVER_ABI, NAME_REGISTRY_ABI } from "../src/contracts/abis";
import type { CallRequest } from "../src/contracts/client";
import { createEnsNameService } from "../src/contracts/name-service";
import { isOracleClientError } from "../src/errors";
import {
	createNameServiceResolver,
	createStaticAddressResolver,
	ORACLE_SUBNAME,
	oracleSubnode,
	resolveRequiredAddress,
	TOKEN_SUBNAME,
	tokenSubnode,
} from "../src/name-resolution";
import type { AddressResolver } from "../src/types";
import { createOracleGateway, InMemoryToken } from "./helpers/in-memory-network";

const NODE = namehash("oracle.eth");
const CONSUMER = getAddress("0x00000000000000000000000000000000000000c0");
const TOKEN = getAddress("0x00000000000000000000000000000000000000b1");
const ORACLE = getAddress("0x00000000000000000000000000000000000000a1");
const NEXT_ORACLE = getAddress("0x00000000000000000000000000000000000000a2");
const REGISTRY = getAddress("0x00000000000000000000000000000000000000e0");
const RESOLVER = getAddress("0x00000000000000000000000000000000000000e1");

async function rejectionOf(promise: Promise<unknown>) {
	try {
		await promise;
	} catch (error) {
		if (isOracleClientError(error)) return error;
		throw error;
	}
	throw new Error("Expected the operation to be rejected");
}

function newClient() {
	return new OracleClient({
		address: CONSUMER,
		transport: new InMemoryToken().transportFor(CONSUMER),
		oracleRequests: createOracleGateway([]),
	});
}

describe("subnodes", () => {
	test("hash the node with the label hash", () => {
		expect(TOKEN_SUBNAME).toBe(keccak256(stringToHex("link")));
		expect(ORACLE_SUBNAME).toBe(keccak256(stringToHex("oracle")));
		expect(tokenSubnode(NODE)).toBe(keccak256(concat([NODE, TOKEN_SUBNAME])));
		expect(oracleSubnode(NODE)).toBe(keccak256(concat([NODE, ORACLE_SUBNAME])));
	});

	test("match the namehash of the child names", () => {
		expect(tokenSubnode(NODE)).toBe(namehash("link.oracle.eth"));
		expect(oracleSubnode(NODE)).toBe(namehash("oracle.oracle.eth"));
	});
});

describe("resolveRequiredAddress", () => {
	test("returns the checksummed address", async () => {
		const resolver = createStaticAddressResolver({ [NODE]: "0x00000000000000000000000000000000000000a1" });
		await expect(resolveRequiredAddress(resolver, NODE)).resolves.toBe(ORACLE);
	});

	test("treats an unbound node as a failure", async () => {
		const resolver = createStaticAddressResolver({});
		const error = await rejectionOf(resolveRequiredAddress(resolver, NODE));
		expect(error.reason).toBe("resolution_failed");
		expect(error.message).toBe(`Node ${NODE} resolved to an unusable address (${zeroAddress})`);
	});

	test("wraps a throwing lookup", async () => {
		const resolver: AddressResolver = {
			async resolveAddress() {
				throw new Error("rpc timeout");
			},
		};
		const error = await rejectionOf(resolveRequiredAddress(resolver, NODE));
		expect(error.reason).toBe("resolution_failed");
		expect(error.message).toBe(`Name resolution failed for node ${NODE}: rpc timeout`);
	});

	test("rejects a malformed answer", async () => {
		const resolver: AddressResolver = {
			async resolveAddress() {
				return "0x1234";
			},
		};
		expect((await rejectionOf(resolveRequiredAddress(resolver, NODE))).reason).toBe("resolution_failed");
	});

	test("fails when the name service has no resolver for the node", async () => {
		const resolver = createNameServiceResolver({
			async resolver() {
				return null;
			},
		});
		const error = await rejectionOf(resolveRequiredAddress(resolver, NODE));
		expect(error.reason).toBe("resolution_failed");
		expect(error.message).toBe(`No resolver is registered for node ${NODE}`);
	});
});

describe("OracleClient name-service configuration", () => {
	test("resolves the token and oracle from subnodes", async () => {
		const client = newClient();
		const resolver = createStaticAddressResolver({
			[tokenSubnode(NODE)]: TOKEN,
			[oracleSubnode(NODE)]: ORACLE,
		});

		await expect(client.useNameService(resolver, NODE)).resolves.toEqual({ token: TOKEN, oracle: ORACLE });
		expect(client.tokenAddress).toBe(TOKEN);
		expect(client.oracleAddress).toBe(ORACLE);
	});

	test("sets neither address unless both resolve", async () => {
		const client = newClient();
		client.setOracle(NEXT_ORACLE);
		const resolver = createStaticAddressResolver({ [tokenSubnode(NODE)]: TOKEN });

		const error = await rejectionOf(client.useNameService(resolver, NODE));

		expect(error.reason).toBe("resolution_failed");
		expect(client.tokenAddress).toBeUndefined();
		expect(client.oracleAddress).toBe(NEXT_ORACLE);
	});

	test("resolves each address on its own", async () => {
		const client = newClient();
		const resolver = createStaticAddressResolver({
			[tokenSubnode(NODE)]: TOKEN,
			[oracleSubnode(NODE)]: ORACLE,
		});

		await expect(client.resolveAndSetToken(resolver, NODE)).resolves.toBe(TOKEN);
		expect(client.oracleAddress).toBeUndefined();
		await expect(client.resolveAndSetOracle(resolver, NODE)).resolves.toBe(ORACLE);
	});

	test("refreshOracle picks up a rebound oracle", async () => {
		const client = newClient();
		const bindings: Record<Hex, `0x${string}`> = {
			[tokenSubnode(NODE)]: TOKEN,
			[oracleSubnode(NODE)]: ORACLE,
		};
		const resolver: AddressResolver = {
			async resolveAddress(node) {
				return bindings[node] ?? zeroAddress;
			},
		};
		await client.useNameService(resolver, NODE);

		bindings[oracleSubnode(NODE)] = NEXT_ORACLE;

		await expect(client.refreshOracle()).resolves.toBe(NEXT_ORACLE);
		expect(client.oracleAddress).toBe(NEXT_ORACLE);
		expect(client.tokenAddress).toBe(TOKEN);
	});

	test("refreshOracle needs a bound name service", async () => {
		const error = await rejectionOf(newClient().refreshOracle());
		expect(error.reason).toBe("not_configured");
	});
});

describe("createEnsNameService", () => {
	function fakeClient(answers: Map<string, Hex>) {
		const calls: CallRequest[] = [];
		return {
			calls,
			client: {
				async call(args: CallRequest) {
					calls.push(args);
					return { data: answers.get(`${args.to}:${args.data.slice(0, 10)}`) };
				},
			},
		};
	}

	test("reads the resolver from the registry and the address from the resolver", async () => {
		const answers = new Map<string, Hex>([
			[`${REGISTRY}:0x0178b8bf`, encodeFunctionResult({ abi: NAME_REGISTRY_ABI, functionName: "resolver", result: RESOLVER })],
			[`${RESOLVER}:0x3b3b57de`, encodeFunctionResult({ abi: ADDRESS_RESOLVER_ABI, functionName: "addr", result: ORACLE })],
		]);
		const { calls, client } = fakeClient(answers);
		const resolver = createNameServiceResolver(createEnsNameService({ client, registry: REGISTRY }));

		await expect(resolveRequiredAddress(resolver, oracleSubnode(NODE))).resolves.toBe(ORACLE);
		expect(calls.map((call) => call.to)).toEqual([REGISTRY, RESOLVER]);
	});

	test("reports no resolver when the registry answers the zero address", async () => {
		const answers = new Map<string, Hex>([
			[`${REGISTRY}:0x0178b8bf`, encodeFunctionResult({ abi: NAME_REGISTRY_ABI, functionName: "resolver", result: zeroAddress })],
		]);
		const nameService = createEnsNameService({ client: fakeClient(answers).client, registry: REGISTRY });
		await expect(nameService.resolver(NODE)).resolves.toBeNull();
	});

	test("reports no resolver when the registry returns nothing", async () => {
		const nameService = createEnsNameService({ client: fakeClient(new Map()).client, registry: REGISTRY });
		await expect(nameService.resolver(NODE)).resolves.toBeNull();
	});
});
