import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { type Address, getAddress, isAddress } from "viem";
import { VALID_CHAINS } from "./chains";
import type { Chain, Config, NameServiceConfig } from "./types";

export const DEFAULT_USER_CONFIG_PATH = path.join(os.homedir(), ".config", "oracle-client", "config.json");

const RPC_URL_ENV: Record<Chain, string> = {
	ethereum: "ETHEREUM_RPC_URL",
	sepolia: "SEPOLIA_RPC_URL",
};

function defaultConfigPaths(): string[] {
	return [path.resolve(process.cwd(), "oracle-client.config.json"), DEFAULT_USER_CONFIG_PATH];
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Config> {
	const configPath = resolveConfigPath(env);
	const fileConfig = configPath ? await readConfigFile(configPath) : {};
	const envConfig = loadEnvConfig(env);
	return mergeConfig(fileConfig, envConfig);
}

function resolveConfigPath(env: NodeJS.ProcessEnv): string | undefined {
	const explicitPath = env.ORACLE_CLIENT_CONFIG;
	if (explicitPath) {
		if (!existsSync(explicitPath)) {
			throw new Error(`Config file not found at ${explicitPath}`);
		}
		return explicitPath;
	}
	for (const candidate of defaultConfigPaths()) {
		if (existsSync(candidate)) {
			return candidate;
		}
	}
	return undefined;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): Config {
	const rpcUrls: Partial<Record<Chain, string>> = {};
	for (const chain of VALID_CHAINS) {
		const value = env[RPC_URL_ENV[chain]];
		if (isNonEmptyString(value)) {
			rpcUrls[chain] = value.trim();
		}
	}
	const ensName = env.ORACLE_CLIENT_ENS_NAME;
	return {
		consumer: parseAddress(env.ORACLE_CLIENT_CONSUMER),
		nameService: isNonEmptyString(ensName) ? { name: ensName.trim() } : undefined,
		rpcUrls,
	};
}

async function readConfigFile(configPath: string): Promise<Config> {
	const raw = await readFile(configPath, "utf-8");
	const parsed = safeJsonParse(raw);
	if (!parsed) {
		throw new Error(`Invalid JSON in config file: ${configPath}`);
	}
	return parseConfig(parsed);
}

function safeJsonParse(raw: string): unknown | null {
	try {
		return JSON.parse(raw);
	} catch {
		return null;
	}
}

export function parseConfig(value: unknown): Config {
	if (!isRecord(value)) {
		return {};
	}
	const config: Config = {};
	const consumer = parseAddress(value.consumer);
	if (consumer) {
		config.consumer = consumer;
	}
	const nameService = parseNameServiceConfig(value.nameService);
	if (nameService) {
		config.nameService = nameService;
	}
	const rpcUrls = parseChainStringMap(value.rpcUrls);
	if (rpcUrls) {
		config.rpcUrls = rpcUrls;
	}
	return config;
}

function parseNameServiceConfig(value: unknown): NameServiceConfig | undefined {
	if (!isRecord(value)) return undefined;
	const nameService: NameServiceConfig = {};
	const registry = parseAddress(value.registry);
	if (registry) {
		nameService.registry = registry;
	}
	if (isNonEmptyString(value.name)) {
		nameService.name = value.name.trim();
	}
	return Object.keys(nameService).length > 0 ? nameService : undefined;
}

function parseChainStringMap(value: unknown): Partial<Record<Chain, string>> | undefined {
	if (!isRecord(value)) return undefined;
	const map: Partial<Record<Chain, string>> = {};
	let hasValue = false;
	for (const chain of VALID_CHAINS) {
		const candidate = value[chain];
		if (isNonEmptyString(candidate)) {
			map[chain] = candidate;
			hasValue = true;
		}
	}
	return hasValue ? map : undefined;
}

function parseAddress(value: unknown): Address | undefined {
	if (!isNonEmptyString(value)) return undefined;
	const trimmed = value.trim();
	if (!isAddress(trimmed, { strict: false })) return undefined;
	return getAddress(trimmed);
}

function mergeConfig(base: Config, override: Config): Config {
	return {
		consumer: override.consumer ?? base.consumer,
		nameService: mergeNameServiceConfig(base.nameService, override.nameService),
		rpcUrls: {
			...base.rpcUrls,
			...override.rpcUrls,
		},
	};
}

function mergeNameServiceConfig(
	base?: NameServiceConfig,
	override?: NameServiceConfig,
): NameServiceConfig | undefined {
	if (!base && !override) return undefined;
	return {
		registry: override?.registry ?? base?.registry,
		name: override?.name ?? base?.name,
	};
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

function isNonEmptyString(value: unknown): value is string {
	return typeof value === "string" && value.trim().length > 0;
}
