export { CHAINS, getChainConfig } from "./chains";
export { OracleClient, type OracleClientOptions } from "./client";
export { loadConfig } from "./config";
export { ADDRESS_RESOLVER_ABI, NAME_REGISTRY_ABI, ORACLE_ABI, TOKEN_ABI } from "./contracts/abis";
export type { CallClient, CallRequest, TransactionClient } from "./contracts/client";
export { createEnsNameService, type EnsNameServiceOptions } from "./contracts/name-service";
export { createContractOracleGateway } from "./contracts/oracle";
export { type ContractTokenTransportOptions, createContractTokenTransport } from "./contracts/token";
export { FULFILL_SELECTOR, PriceConsumer, type PriceConsumerOptions } from "./consumer/price-consumer";
export {
	AMOUNT_OVERRIDE,
	ARGS_VERSION,
	computeRequestId,
	encodeOracleRequest,
	ORACLE_REQUEST_SELECTOR,
	SENDER_OVERRIDE,
} from "./dispatcher";
export { isOracleClientError, OracleClientError, type OracleClientErrorReason } from "./errors";
export {
	createEventLog,
	type EventLog,
	type EventLogRecord,
	type EventSink,
	eventSelector,
	parseEventLog,
	REQUEST_EVENTS_ABI,
	type RequestEvent,
	type RequestEventName,
	toEventLog,
} from "./events";
export {
	createNameServiceResolver,
	createStaticAddressResolver,
	ORACLE_SUBNAME,
	oracleSubnode,
	resolveRequiredAddress,
	TOKEN_SUBNAME,
	tokenSubnode,
} from "./name-resolution";
export { RegistryTransaction, RequestRegistry } from "./registry";
export {
	addBytes,
	addInt,
	addParameter,
	addString,
	addStringArray,
	addUint,
	buildRequest,
	jobIdFromString,
} from "./request/builder";
export { decodeParameters, encodeParameters } from "./request/params";
export type {
	AddressResolver,
	CancellationNotice,
	Chain,
	Config,
	DecodedParameter,
	NameService,
	OracleRequest,
	OracleRequestGateway,
	ParameterEntry,
	ParameterValue,
	ResolverHandle,
	TokenTransport,
} from "./types";
