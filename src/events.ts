import { type Hex, parseAbi, toEventSelector } from "viem";

export const REQUEST_EVENTS_ABI = parseAbi([
	"event Requested(bytes32 indexed id)",
	"event Fulfilled(bytes32 indexed id)",
	"event Cancelled(bytes32 indexed id)",
]);

export type RequestEventName = "Requested" | "Fulfilled" | "Cancelled";

export interface RequestEvent {
	event: RequestEventName;
	requestId: Hex;
}

export interface EventSink {
	emit(event: RequestEvent): void;
}

export interface EventLogRecord {
	event: RequestEventName;
	requestId: Hex;
	topics: [signature: Hex, id: Hex];
}

const EVENT_NAMES: readonly RequestEventName[] = ["Requested", "Fulfilled", "Cancelled"];

const EVENT_SELECTORS: Record<RequestEventName, Hex> = {
	Requested: toEventSelector("Requested(bytes32)"),
	Fulfilled: toEventSelector("Fulfilled(bytes32)"),
	Cancelled: toEventSelector("Cancelled(bytes32)"),
};

export function eventSelector(name: RequestEventName): Hex {
	return EVENT_SELECTORS[name];
}

export function toEventLog(event: RequestEvent): EventLogRecord {
	return {
		event: event.event,
		requestId: event.requestId,
		topics: [EVENT_SELECTORS[event.event], event.requestId],
	};
}

/** Match a raw log back to the lifecycle event it records, or null for foreign logs. */
export function parseEventLog(log: { topics: readonly Hex[] }): RequestEvent | null {
	const [signature, id] = log.topics;
	if (!signature || !id) return null;
	for (const name of EVENT_NAMES) {
		if (EVENT_SELECTORS[name] === signature.toLowerCase()) {
			return { event: name, requestId: id };
		}
	}
	return null;
}

export interface EventLog extends EventSink {
	readonly records: readonly EventLogRecord[];
	byRequest(requestId: Hex): EventLogRecord[];
	clear(): void;
}

export function createEventLog(): EventLog {
	const records: EventLogRecord[] = [];
	return {
		records,
		emit(event) {
			records.push(toEventLog(event));
		},
		byRequest(requestId) {
			const needle = requestId.toLowerCase();
			return records.filter((record) => record.requestId.toLowerCase() === needle);
		},
		clear() {
			records.length = 0;
		},
	};
}
