#!/usr/bin/env tsx
import { pathToFileURL } from "node:url";
import { createPublicClient, http, isHex, namehash } from "viem";
import { getChainConfig, isChain, VALID_CHAINS } from "../chains";
import { loadConfig } from "../config";
import type { CallClient } from "../contracts/client";
import { createEnsNameService } from "../contracts/name-service";
import { computeRequestId, encodeOracleRequest } from "../dispatcher";
import { describeError, isOracleClientError } from "../errors";
import {
	createNameServiceResolver,
	oracleSubnode,
	resolveRequiredAddress,
	tokenSubnode,
} from "../name-resolution";
import { appendParameter, buildRequest, jobIdFromString } from "../request/builder";
import { decodeParameters, encodeParameters } from "../request/params";
import { formatIssues, payloadInputSchema, requestIdInputSchema } from "../schema";
import type { Chain, ParameterEntry, ParameterValue } from "../types";
import { renderError, renderFields, renderHeading, renderParameters, toJsonParameters } from "./ui";

export interface CliIo {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	env?: NodeJS.ProcessEnv;
}

type OptionSpec = { takesValue: boolean };

type CommandOptionSpecs = Record<string, OptionSpec>;

const PARAMETER_OPTIONS: CommandOptionSpecs = {
	"--string": { takesValue: true },
	"--uint": { takesValue: true },
	"--int": { takesValue: true },
	"--bytes": { takesValue: true },
	"--strings": { takesValue: true },
};

const OPTION_SPECS: Record<string, CommandOptionSpecs> = {
	"request-id": {
		"--consumer": { takesValue: true },
		"--nonce": { takesValue: true },
		"--json": { takesValue: false },
	},
	"encode-params": {
		...PARAMETER_OPTIONS,
	},
	"decode-params": {
		"--json": { takesValue: false },
	},
	payload: {
		"--job": { takesValue: true },
		"--callback": { takesValue: true },
		"--selector": { takesValue: true },
		"--consumer": { takesValue: true },
		"--nonce": { takesValue: true },
		"--json": { takesValue: false },
		...PARAMETER_OPTIONS,
	},
	subnodes: {
		"--json": { takesValue: false },
	},
	resolve: {
		"--chain": { takesValue: true },
		"-c": { takesValue: true },
		"--json": { takesValue: false },
	},
};

class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

interface ParsedArgs {
	positionals: string[];
	/** Value options in the order they were given. */
	options: Array<{ name: string; value: string }>;
	flags: Set<string>;
}

function parseCommandArgs(command: string, args: string[]): ParsedArgs {
	const specs = OPTION_SPECS[command] ?? {};
	const parsed: ParsedArgs = { positionals: [], options: [], flags: new Set() };
	for (let i = 0; i < args.length; i += 1) {
		const arg = args[i];
		if (arg === "--") {
			parsed.positionals.push(...args.slice(i + 1));
			break;
		}
		if (!arg.startsWith("-") || /^-[0-9]/.test(arg)) {
			parsed.positionals.push(arg);
			continue;
		}
		const spec = specs[arg];
		if (!spec) {
			throw new UsageError(`Unknown option ${arg}`);
		}
		if (!spec.takesValue) {
			parsed.flags.add(arg);
			continue;
		}
		if (i + 1 >= args.length) {
			throw new UsageError(`Missing value for ${arg}`);
		}
		parsed.options.push({ name: arg, value: args[i + 1] });
		i += 1;
	}
	return parsed;
}

function optionValue(parsed: ParsedArgs, ...names: string[]): string | undefined {
	let value: string | undefined;
	for (const option of parsed.options) {
		if (names.includes(option.name)) value = option.value;
	}
	return value;
}

function usage(): string {
	return `
oracle-client - Build, inspect and resolve token-paid oracle requests

Usage:
  oracle-client request-id [--consumer <address>] --nonce <n> [--json]
  oracle-client encode-params [parameter options]
  oracle-client decode-params <hex> [--json]
  oracle-client payload --job <id> --callback <address> --selector <0x........> [--consumer <address>] --nonce <n> [parameter options] [--json]
  oracle-client subnodes <name> [--json]
  oracle-client resolve [name] [--chain <chain>] [--json]

Parameter options (repeatable, kept in the order given):
  --string <key=value>     Text value
  --uint <key=value>       Unsigned integer (decimal or 0x hex)
  --int <key=value>        Signed integer
  --bytes <key=0x...>      Raw bytes
  --strings <key=a,b,c>    Array of text values

Options:
  --job          32-byte hex job id, or a short ASCII job id padded to 32 bytes
  --chain, -c    Chain for name resolution (default: ethereum)
                 Valid: ${VALID_CHAINS.join(", ")}
  --json         Machine-readable output

Environment:
  ORACLE_CLIENT_CONFIG     Config file path (default: ./oracle-client.config.json)
  ORACLE_CLIENT_CONSUMER   Default --consumer for request-id and payload
  ORACLE_CLIENT_ENS_NAME   Default name for resolve
  ETHEREUM_RPC_URL         RPC URL for ethereum
  SEPOLIA_RPC_URL          RPC URL for sepolia
  ORACLE_CLIENT_DEBUG      Set to 1 for debug logging on stderr
`;
}

export async function runCli(argv: string[], io: CliIo = defaultIo()): Promise<number> {
	if (argv.length === 0 || argv.includes("--help") || argv.includes("-h") || argv[0] === "help") {
		io.stdout(usage());
		return 0;
	}

	const [command, ...rest] = argv;
	if (!OPTION_SPECS[command]) {
		io.stderr(renderError(`Unknown command: ${command}`));
		io.stderr(usage());
		return 1;
	}

	try {
		const parsed = parseCommandArgs(command, rest);
		switch (command) {
			case "request-id":
				return await runRequestId(parsed, io);
			case "encode-params":
				return runEncodeParams(parsed, io);
			case "decode-params":
				return runDecodeParams(parsed, io);
			case "payload":
				return await runPayload(parsed, io);
			case "subnodes":
				return runSubnodes(parsed, io);
			case "resolve":
				return await runResolve(parsed, io);
			default:
				throw new UsageError(`Unknown command: ${command}`);
		}
	} catch (error) {
		if (error instanceof UsageError || isOracleClientError(error)) {
			io.stderr(renderError(`Error: ${error.message}`));
			return 1;
		}
		io.stderr(renderError(`${command} failed: ${describeError(error)}`));
		return 1;
	}
}

async function runRequestId(parsed: ParsedArgs, io: CliIo): Promise<number> {
	const input = requestIdInputSchema.safeParse({
		consumer: await consumerOption(parsed, io),
		nonce: optionValue(parsed, "--nonce"),
	});
	if (!input.success) {
		throw new UsageError(formatIssues(input.error));
	}
	const requestId = computeRequestId(input.data.consumer, input.data.nonce);
	if (parsed.flags.has("--json")) {
		io.stdout(JSON.stringify({ requestId }));
		return 0;
	}
	io.stdout(requestId);
	return 0;
}

function runEncodeParams(parsed: ParsedArgs, io: CliIo): number {
	io.stdout(encodeParameters(collectParameters(parsed)));
	return 0;
}

function runDecodeParams(parsed: ParsedArgs, io: CliIo): number {
	const data = parsed.positionals[0];
	if (!data || !isHex(data, { strict: true })) {
		throw new UsageError("Provide the parameter buffer as 0x-prefixed hex");
	}
	const parameters = decodeParameters(data);
	if (parsed.flags.has("--json")) {
		io.stdout(JSON.stringify(toJsonParameters(parameters)));
		return 0;
	}
	io.stdout(renderParameters(parameters));
	return 0;
}

async function runPayload(parsed: ParsedArgs, io: CliIo): Promise<number> {
	const input = payloadInputSchema.safeParse({
		job: optionValue(parsed, "--job"),
		callback: optionValue(parsed, "--callback"),
		selector: optionValue(parsed, "--selector"),
		consumer: await consumerOption(parsed, io),
		nonce: optionValue(parsed, "--nonce"),
	});
	if (!input.success) {
		throw new UsageError(formatIssues(input.error));
	}
	const { job, callback, selector, consumer, nonce } = input.data;
	const jobId = isHex(job, { strict: true }) ? job : jobIdFromString(job);
	const request = buildRequest(jobId, callback, selector);
	request.parameters.push(...collectParameters(parsed));
	const requestId = computeRequestId(consumer, nonce);
	const payload = encodeOracleRequest({ requestId, request, nonce });

	if (parsed.flags.has("--json")) {
		io.stdout(JSON.stringify({ requestId, jobId: request.jobId, nonce: nonce.toString(), payload }));
		return 0;
	}
	io.stdout(
		renderFields([
			["Request id", requestId],
			["Job id", request.jobId],
			["Nonce", nonce.toString()],
			["Payload", payload],
		]),
	);
	return 0;
}

function runSubnodes(parsed: ParsedArgs, io: CliIo): number {
	const name = parsed.positionals[0];
	if (!name) {
		throw new UsageError("Provide a name, e.g. oracle-client subnodes example.eth");
	}
	const node = namehash(name);
	const result = { name, node, token: tokenSubnode(node), oracle: oracleSubnode(node) };
	if (parsed.flags.has("--json")) {
		io.stdout(JSON.stringify(result));
		return 0;
	}
	io.stdout(
		renderFields([
			["Node", result.node],
			["Token subnode", result.token],
			["Oracle subnode", result.oracle],
		]),
	);
	return 0;
}

async function runResolve(parsed: ParsedArgs, io: CliIo): Promise<number> {
	const config = await loadConfig(io.env ?? process.env);
	const chainValue = optionValue(parsed, "--chain", "-c") ?? "ethereum";
	if (!isChain(chainValue)) {
		throw new UsageError(`Invalid chain "${chainValue}". Valid chains: ${VALID_CHAINS.join(", ")}`);
	}
	const name = parsed.positionals[0] ?? config.nameService?.name;
	if (!name) {
		throw new UsageError("Provide a name or set nameService.name / ORACLE_CLIENT_ENS_NAME");
	}
	const chain: Chain = chainValue;
	const chainConfig = getChainConfig(chain);
	const publicClient = createPublicClient({
		chain: chainConfig.viemChain,
		transport: http(config.rpcUrls?.[chain] ?? chainConfig.rpcUrl),
	});
	const reader: CallClient = {
		call: (args) => publicClient.call(args),
	};
	const resolver = createNameServiceResolver(
		createEnsNameService({
			client: reader,
			registry: config.nameService?.registry ?? chainConfig.nameRegistry,
		}),
	);

	if (!parsed.flags.has("--json")) {
		io.stderr(renderHeading(`Resolving ${name} on ${chain}...`));
	}
	const node = namehash(name);
	const token = await resolveRequiredAddress(resolver, tokenSubnode(node));
	const oracle = await resolveRequiredAddress(resolver, oracleSubnode(node));

	if (parsed.flags.has("--json")) {
		io.stdout(JSON.stringify({ name, chain, token, oracle }));
		return 0;
	}
	io.stdout(
		renderFields([
			["Token", token],
			["Oracle", oracle],
		]),
	);
	return 0;
}

// --consumer wins; otherwise the configured consumer, if any.
async function consumerOption(parsed: ParsedArgs, io: CliIo): Promise<string | undefined> {
	const explicit = optionValue(parsed, "--consumer");
	if (explicit !== undefined) return explicit;
	const config = await loadConfig(io.env ?? process.env);
	return config.consumer;
}

function collectParameters(parsed: ParsedArgs): ParameterEntry[] {
	const parameters: ParameterEntry[] = [];
	for (const option of parsed.options) {
		if (!(option.name in PARAMETER_OPTIONS)) continue;
		const { key, value } = parseParameterOption(option.name, option.value);
		appendParameter(parameters, key, value);
	}
	return parameters;
}

function parseParameterOption(name: string, raw: string): { key: string; value: ParameterValue } {
	const separator = raw.indexOf("=");
	if (separator <= 0) {
		throw new UsageError(`${name} expects key=value, got "${raw}"`);
	}
	const key = raw.slice(0, separator);
	const text = raw.slice(separator + 1);
	switch (name) {
		case "--string":
			return { key, value: { type: "string", value: text } };
		case "--uint":
			return { key, value: { type: "uint", value: parseInteger(name, text, false) } };
		case "--int":
			return { key, value: { type: "int", value: parseInteger(name, text, true) } };
		case "--bytes":
			if (!isHex(text, { strict: true })) {
				throw new UsageError(`${name} expects 0x-prefixed hex for "${key}"`);
			}
			return { key, value: { type: "bytes", value: text } };
		case "--strings":
			return { key, value: { type: "string[]", value: text.length === 0 ? [] : text.split(",") } };
		default:
			throw new UsageError(`Unknown parameter option ${name}`);
	}
}

function parseInteger(name: string, text: string, signed: boolean): bigint {
	const pattern = signed ? /^-?([0-9]+|0x[0-9a-fA-F]+)$/ : /^([0-9]+|0x[0-9a-fA-F]+)$/;
	if (!pattern.test(text)) {
		throw new UsageError(`${name} expects an integer, got "${text}"`);
	}
	return text.startsWith("-") ? -BigInt(text.slice(1)) : BigInt(text);
}

function defaultIo(): CliIo {
	return {
		stdout: (text) => process.stdout.write(`${text}\n`),
		stderr: (text) => process.stderr.write(`${text}\n`),
	};
}

function isEntrypoint(): boolean {
	const entry = process.argv[1];
	return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isEntrypoint()) {
	runCli(process.argv.slice(2)).then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			process.stderr.write(`${renderError(describeError(error))}\n`);
			process.exitCode = 1;
		},
	);
}

