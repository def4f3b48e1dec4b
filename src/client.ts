import { type Address, getAddress, type Hex, isAddress, isHex, size } from "viem";
import { createExclusiveQueue, type ExclusiveQueue } from "./concurrency";
import { debugLog } from "./debug";
import { computeRequestId, encodeOracleRequest } from "./dispatcher";
import { describeError, OracleClientError } from "./errors";
import type { EventSink } from "./events";
import { oracleSubnode, resolveRequiredAddress, tokenSubnode } from "./name-resolution";
import { type RegistryTransaction, RequestRegistry } from "./registry";
import { buildRequest, isDispatched, lowercaseHex } from "./request/builder";
import type { AddressResolver, OracleRequest, OracleRequestGateway, TokenTransport } from "./types";

export interface OracleClientOptions {
	/** The consumer's own address; request ids are derived from it. */
	address: Address;
	transport: TokenTransport;
	oracleRequests: OracleRequestGateway;
	token?: Address;
	oracle?: Address;
	events?: EventSink;
	env?: NodeJS.ProcessEnv;
}

const LOG_SCOPE = "oracle-client";

/** Rejects handlers that return a promise; they would run inside the queue. */
type SyncResult<T> = T extends PromiseLike<unknown> ? never : T;

/**
 * Request lifecycle for one consumer: dispatching paid requests, accepting
 * fulfillments from the oracle each request was routed to, and cancelling.
 *
 * Operations run one at a time. Each stages its registry changes and events
 * and commits them only once every step, including the calls out to the
 * token and oracle contracts, has succeeded.
 */
export class OracleClient {
	readonly address: Address;
	readonly #registry: RequestRegistry;
	readonly #queue: ExclusiveQueue = createExclusiveQueue();
	readonly #transport: TokenTransport;
	readonly #oracleRequests: OracleRequestGateway;
	readonly #env?: NodeJS.ProcessEnv;
	#token?: Address;
	#oracle?: Address;
	#nameService?: { resolver: AddressResolver; node: Hex };

	constructor(options: OracleClientOptions) {
		this.address = requireAddress(options.address, "consumer address");
		this.#registry = new RequestRegistry({ events: options.events, env: options.env });
		this.#transport = options.transport;
		this.#oracleRequests = options.oracleRequests;
		this.#env = options.env;
		this.#token = options.token === undefined ? undefined : requireAddress(options.token, "token address");
		this.#oracle = options.oracle === undefined ? undefined : requireAddress(options.oracle, "oracle address");
	}

	get nonce(): bigint {
		return this.#registry.nonce;
	}

	get tokenAddress(): Address | undefined {
		return this.#token;
	}

	get oracleAddress(): Address | undefined {
		return this.#oracle;
	}

	get pendingCount(): number {
		return this.#registry.size;
	}

	pendingOracle(requestId: Hex): Address | undefined {
		return this.#registry.oracleOf(requestId);
	}

	isPending(requestId: Hex): boolean {
		return this.#registry.oracleOf(requestId) !== undefined;
	}

	setToken(token: Address): void {
		this.#token = requireAddress(token, "token address");
	}

	setOracle(oracle: Address): void {
		this.#oracle = requireAddress(oracle, "oracle address");
	}

	buildRequest(jobId: Hex, callbackTarget: Address, callbackSelector: Hex): OracleRequest {
		return buildRequest(jobId, callbackTarget, callbackSelector);
	}

	/** Dispatch to the active oracle. */
	async sendRequest(request: OracleRequest, payment: bigint): Promise<Hex> {
		const oracle = this.#oracle;
		if (!oracle) {
			throw new OracleClientError({
				message: "No oracle is configured; call setOracle or useNameService first",
				reason: "not_configured",
			});
		}
		return await this.sendRequestTo(oracle, request, payment);
	}

	async sendRequestTo(oracle: Address, request: OracleRequest, payment: bigint): Promise<Hex> {
		const target = requireAddress(oracle, "oracle address");
		if (payment < 0n) {
			throw new OracleClientError({
				message: `Payment must not be negative, got ${payment}`,
				reason: "invalid_request",
			});
		}
		if (isDispatched(request)) {
			throw new OracleClientError({
				message: `Request was already dispatched with nonce ${request.nonce}`,
				reason: "invalid_request",
			});
		}

		return await this.#transaction(async (tx) => {
			const nonce = tx.nonce;
			const requestId = computeRequestId(this.address, nonce);
			tx.insert(requestId, target);
			tx.emit({ event: "Requested", requestId });
			request.nonce = nonce;

			try {
				const payload = encodeOracleRequest({ requestId, request, nonce });
				await this.#transfer(target, payment, payload, requestId);
			} catch (error) {
				request.nonce = undefined;
				throw error;
			}

			tx.advanceNonce();
			this.#log(`requested ${requestId} from ${target} (nonce ${nonce}, payment ${payment})`);
			return requestId;
		});
	}

	/** Track a request that was dispatched elsewhere, so its fulfillment is accepted here. */
	async addExternalRequest(oracle: Address, requestId: Hex): Promise<void> {
		const target = requireAddress(oracle, "oracle address");
		const id = requireRequestId(requestId);
		await this.#transaction(async (tx) => {
			tx.insert(id, target);
			this.#log(`registered external request ${id} for ${target}`);
		});
	}

	async cancelRequest(requestId: Hex, payment: bigint, callbackSelector: Hex, expiration: bigint): Promise<void> {
		const id = requireRequestId(requestId);
		if (!isHex(callbackSelector, { strict: true }) || size(callbackSelector) !== 4) {
			throw new OracleClientError({
				message: `Callback selector must be 4 bytes of hex, got ${callbackSelector}`,
				reason: "invalid_request",
				requestId: id,
			});
		}
		await this.#transaction(async (tx) => {
			const registered = tx.remove(id);
			const oracle = registered ?? this.#oracle;
			if (!oracle) {
				throw new OracleClientError({
					message: `Request ${id} is not pending and no oracle is configured to notify`,
					reason: "not_configured",
					requestId: id,
				});
			}
			tx.emit({ event: "Cancelled", requestId: id });
			try {
				await this.#oracleRequests.cancelOracleRequest(oracle, {
					requestId: id,
					payment,
					callbackSelector: lowercaseHex(callbackSelector),
					expiration,
				});
			} catch (error) {
				throw new OracleClientError({
					message: `Oracle ${oracle} rejected cancellation of ${id}: ${describeError(error)}`,
					reason: "cancel_failed",
					requestId: id,
					cause: error,
				});
			}
			this.#log(
				registered
					? `cancelled ${id} at ${oracle}`
					: `cancel notice for ${id} sent to ${oracle}; no pending entry was held`,
			);
		});
	}

	/** Accept a fulfillment: the caller must be the oracle the request was routed to. */
	async validateAndClear(requestId: Hex, caller: Address): Promise<void> {
		await this.fulfill(requestId, caller, () => undefined);
	}

	/**
	 * Validate and clear `requestId`, then run `handler` in the same
	 * transaction. If the handler throws, the entry stays pending and no
	 * Fulfilled event is recorded. The handler must be synchronous; follow-up
	 * calls into this client are started after the returned promise settles.
	 */
	async fulfill<T>(requestId: Hex, caller: Address, handler: () => SyncResult<T>): Promise<T> {
		const id = requireRequestId(requestId);
		return await this.#transaction(async (tx) => {
			tx.validateAndClear(id, caller);
			const result = handler();
			if (isPromiseLike(result)) {
				throw new OracleClientError({
					message: "Fulfillment handler must be synchronous",
					reason: "invalid_request",
					requestId: id,
				});
			}
			this.#log(`fulfilled ${id} by ${caller}`);
			return result;
		});
	}

	async resolveAndSetToken(resolver: AddressResolver, node: Hex): Promise<Address> {
		return await this.#queue.run(async () => {
			const token = await resolveRequiredAddress(resolver, tokenSubnode(node));
			this.#token = token;
			this.#log(`token resolved to ${token}`);
			return token;
		});
	}

	async resolveAndSetOracle(resolver: AddressResolver, node: Hex): Promise<Address> {
		return await this.#queue.run(async () => {
			const oracle = await resolveRequiredAddress(resolver, oracleSubnode(node));
			this.#oracle = oracle;
			this.#log(`oracle resolved to ${oracle}`);
			return oracle;
		});
	}

	/**
	 * Bind to a name-service node and resolve both the token and the oracle
	 * from it. Neither address changes unless both resolve.
	 */
	async useNameService(resolver: AddressResolver, node: Hex): Promise<{ token: Address; oracle: Address }> {
		return await this.#queue.run(async () => {
			const token = await resolveRequiredAddress(resolver, tokenSubnode(node));
			const oracle = await resolveRequiredAddress(resolver, oracleSubnode(node));
			this.#token = token;
			this.#oracle = oracle;
			this.#nameService = { resolver, node };
			this.#log(`bound to node ${node}: token ${token}, oracle ${oracle}`);
			return { token, oracle };
		});
	}

	/** Re-resolve the oracle from the node given to useNameService. */
	async refreshOracle(): Promise<Address> {
		const nameService = this.#nameService;
		if (!nameService) {
			throw new OracleClientError({
				message: "No name service is bound; call useNameService first",
				reason: "not_configured",
			});
		}
		return await this.resolveAndSetOracle(nameService.resolver, nameService.node);
	}

	async #transfer(target: Address, payment: bigint, payload: Hex, requestId: Hex): Promise<void> {
		let success: boolean;
		try {
			success = await this.#transport.transferAndCall(target, payment, payload);
		} catch (error) {
			throw new OracleClientError({
				message: `Unable to transferAndCall to oracle: ${describeError(error)}`,
				reason: "transfer_failed",
				requestId,
				cause: error,
			});
		}
		if (!success) {
			throw new OracleClientError({
				message: "Unable to transferAndCall to oracle",
				reason: "transfer_failed",
				requestId,
			});
		}
	}

	#transaction<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
		return this.#queue.run(async () => {
			const tx = this.#registry.begin();
			try {
				const result = await work(tx);
				tx.commit();
				return result;
			} catch (error) {
				tx.rollback();
				this.#log(`rolled back: ${describeError(error)}`);
				throw error;
			}
		});
	}

	#log(message: string): void {
		debugLog(LOG_SCOPE, message, this.#env);
	}
}

function requireAddress(value: string, label: string): Address {
	if (!isAddress(value, { strict: false })) {
		throw new OracleClientError({ message: `Invalid ${label}: ${value}`, reason: "invalid_request" });
	}
	return getAddress(value);
}

function requireRequestId(value: Hex): Hex {
	if (!isHex(value, { strict: true }) || size(value) !== 32) {
		throw new OracleClientError({
			message: `Request id must be 32 bytes of hex, got ${value}`,
			reason: "invalid_request",
		});
	}
	return lowercaseHex(value);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
	return (
		typeof value === "object" && value !== null && "then" in value && typeof value.then === "function"
	);
}
