import { parseAbi } from "viem";

export const ORACLE_REQUEST_SIGNATURE =
	"oracleRequest(address,uint256,bytes32,address,bytes4,uint256,uint256,bytes)";

export const ORACLE_ABI = parseAbi([
	"function oracleRequest(address sender, uint256 payment, bytes32 specId, address callbackAddress, bytes4 callbackFunctionId, uint256 nonce, uint256 dataVersion, bytes data)",
	"function cancelOracleRequest(bytes32 requestId, uint256 payment, bytes4 callbackFunctionId, uint256 expiration)",
]);

export const TOKEN_ABI = parseAbi([
	"function transferAndCall(address to, uint256 value, bytes data) returns (bool success)",
]);

export const NAME_REGISTRY_ABI = parseAbi(["function resolver(bytes32 node) view returns (address)"]);

export const ADDRESS_RESOLVER_ABI = parseAbi(["function addr(bytes32 node) view returns (address)"]);
