import { type Address, type Hex, toFunctionSelector } from "viem";
import type { OracleClient } from "../client";
import { addInt, addString } from "../request/builder";

export const FULFILL_SELECTOR = toFunctionSelector("fulfill(bytes32,uint256)");

export const DEFAULT_PRICE_URL = "https://min-api.cryptocompare.com/data/price?fsym=ETH&tsyms=USD,EUR,JPY";

// Prices come back as integers scaled by this factor.
export const PRICE_TIMES = 100n;

export interface PriceConsumerOptions {
	client: OracleClient;
	jobId: Hex;
	url?: string;
}

/**
 * Minimal consumer: asks the oracle for a price quote and accepts the answer
 * only through the validated fulfillment entry point.
 */
export class PriceConsumer {
	readonly #client: OracleClient;
	readonly #jobId: Hex;
	readonly #url: string;
	#currentPrice?: bigint;
	#lastRequestId?: Hex;

	constructor(options: PriceConsumerOptions) {
		this.#client = options.client;
		this.#jobId = options.jobId;
		this.#url = options.url ?? DEFAULT_PRICE_URL;
	}

	get currentPrice(): bigint | undefined {
		return this.#currentPrice;
	}

	get lastRequestId(): Hex | undefined {
		return this.#lastRequestId;
	}

	async requestPrice(currency: string, payment: bigint): Promise<Hex> {
		const request = this.#client.buildRequest(this.#jobId, this.#client.address, FULFILL_SELECTOR);
		addString(request, "get", this.#url);
		addString(request, "path", currency);
		addInt(request, "times", PRICE_TIMES);
		const requestId = await this.#client.sendRequest(request, payment);
		this.#lastRequestId = requestId;
		return requestId;
	}

	async fulfill(requestId: Hex, caller: Address, price: bigint): Promise<void> {
		await this.#client.fulfill(requestId, caller, () => {
			this.#currentPrice = price;
		});
	}

	async cancel(requestId: Hex, payment: bigint, expiration: bigint): Promise<void> {
		await this.#client.cancelRequest(requestId, payment, FULFILL_SELECTOR, expiration);
	}
}
