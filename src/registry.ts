import { type Address, getAddress, type Hex, isAddress, isAddressEqual } from "viem";
import { debugLog } from "./debug";
import { describeError, OracleClientError } from "./errors";
import type { EventSink, RequestEvent } from "./events";

interface StagedChanges {
	writes: Map<Hex, Address | null>;
	nonceAdvance: bigint;
	events: RequestEvent[];
}

type TransactionState = "open" | "committed" | "rolled_back";

interface TransactionHooks {
	apply: (changes: StagedChanges) => void;
	release: () => void;
}

/**
 * Pending request bookkeeping for one consumer: the nonce counter and the
 * request id -> authorized oracle map. State only changes through a
 * transaction, which applies all of its writes, nonce advances and events
 * together on commit or none of them on rollback. Only one transaction may
 * be open at a time.
 */
export class RequestRegistry {
	#nonce = 1n;
	readonly #pending = new Map<Hex, Address>();
	readonly #events?: EventSink;
	readonly #env?: NodeJS.ProcessEnv;
	#active?: RegistryTransaction;

	constructor(options: { events?: EventSink; env?: NodeJS.ProcessEnv } = {}) {
		this.#events = options.events;
		this.#env = options.env;
	}

	get nonce(): bigint {
		return this.#nonce;
	}

	get size(): number {
		return this.#pending.size;
	}

	oracleOf(requestId: Hex): Address | undefined {
		return this.#pending.get(requestKey(requestId));
	}

	get inTransaction(): boolean {
		return this.#active !== undefined;
	}

	begin(): RegistryTransaction {
		if (this.#active) {
			throw new Error("Another registry transaction is still open; commit or roll it back first");
		}
		const tx = new RegistryTransaction(this, {
			apply: (changes) => this.#apply(changes),
			release: () => {
				this.#active = undefined;
			},
		});
		this.#active = tx;
		return tx;
	}

	// Applied state is final; a failing sink is only logged.
	#apply(changes: StagedChanges): void {
		for (const [requestId, oracle] of changes.writes) {
			if (oracle === null) {
				this.#pending.delete(requestId);
			} else {
				this.#pending.set(requestId, oracle);
			}
		}
		this.#nonce += changes.nonceAdvance;
		for (const event of changes.events) {
			try {
				this.#events?.emit(event);
			} catch (error) {
				debugLog(
					"registry",
					`event sink failed on ${event.event} ${event.requestId}: ${describeError(error)}`,
					this.#env,
				);
			}
		}
	}
}

export class RegistryTransaction {
	#state: TransactionState = "open";
	readonly #registry: RequestRegistry;
	readonly #hooks: TransactionHooks;
	readonly #changes: StagedChanges = { writes: new Map(), nonceAdvance: 0n, events: [] };

	constructor(registry: RequestRegistry, hooks: TransactionHooks) {
		this.#registry = registry;
		this.#hooks = hooks;
	}

	get state(): TransactionState {
		return this.#state;
	}

	get nonce(): bigint {
		return this.#registry.nonce + this.#changes.nonceAdvance;
	}

	oracleOf(requestId: Hex): Address | undefined {
		const key = requestKey(requestId);
		const staged = this.#changes.writes.get(key);
		if (staged === null) return undefined;
		return staged ?? this.#registry.oracleOf(key);
	}

	insert(requestId: Hex, oracle: Address): void {
		this.#assertOpen();
		if (this.oracleOf(requestId) !== undefined) {
			throw new OracleClientError({
				message: `Request ${requestId} is already pending`,
				reason: "duplicate_request",
				requestId,
			});
		}
		this.#changes.writes.set(requestKey(requestId), getAddress(oracle));
	}

	/** Stage removal of an entry; returns the oracle it named, if any. */
	remove(requestId: Hex): Address | undefined {
		this.#assertOpen();
		const oracle = this.oracleOf(requestId);
		if (oracle !== undefined) {
			this.#changes.writes.set(requestKey(requestId), null);
		}
		return oracle;
	}

	validateAndClear(requestId: Hex, caller: Address): void {
		this.#assertOpen();
		const oracle = this.oracleOf(requestId);
		const authorized =
			oracle !== undefined && isAddress(caller, { strict: false }) && isAddressEqual(oracle, caller);
		if (!authorized) {
			throw new OracleClientError({
				message: "Source must be the oracle of the request",
				reason: "unauthorized",
				requestId,
			});
		}
		this.#changes.writes.set(requestKey(requestId), null);
		this.emit({ event: "Fulfilled", requestId });
	}

	advanceNonce(): void {
		this.#assertOpen();
		this.#changes.nonceAdvance += 1n;
	}

	emit(event: RequestEvent): void {
		this.#assertOpen();
		this.#changes.events.push(event);
	}

	commit(): void {
		this.#assertOpen();
		this.#state = "committed";
		this.#hooks.release();
		this.#hooks.apply(this.#changes);
	}

	rollback(): void {
		if (this.#state !== "open") return;
		this.#state = "rolled_back";
		this.#hooks.release();
		this.#changes.writes.clear();
		this.#changes.events.length = 0;
		this.#changes.nonceAdvance = 0n;
	}

	#assertOpen(): void {
		if (this.#state !== "open") {
			throw new Error(`Registry transaction is already ${this.#state.replace("_", " ")}`);
		}
	}
}

function requestKey(requestId: Hex): Hex {
	return `0x${requestId.slice(2).toLowerCase()}`;
}
