import { bytesToBigInt, bytesToHex, concat, type Hex, hexToBytes, isHex } from "viem";
import { OracleClientError } from "../errors";
import type { DecodedParameter, ParameterEntry, ParameterValue } from "../types";
import {
	encodeBytes,
	encodeInt,
	encodeString,
	encodeUint,
	endSequence,
	MAJOR_TYPE_ARRAY,
	MAJOR_TYPE_BYTES,
	MAJOR_TYPE_CONTENT_FREE,
	MAJOR_TYPE_INT,
	MAJOR_TYPE_NEGATIVE_INT,
	MAJOR_TYPE_STRING,
	MAJOR_TYPE_TAG,
	startArray,
	TAG_TYPE_BIGNUM,
	TAG_TYPE_NEGATIVE_BIGNUM,
} from "./cbor";

export function encodeParameterValue(value: ParameterValue): Hex {
	switch (value.type) {
		case "string":
			return encodeString(value.value);
		case "bytes":
			return encodeBytes(value.value);
		case "int":
			return encodeInt(value.value);
		case "uint":
			return encodeUint(value.value);
		case "string[]":
			return concat([startArray(), ...value.value.map((item) => encodeString(item)), endSequence()]);
	}
}

export function encodeParameter(key: string, value: ParameterValue): Hex {
	return concat([encodeString(key), encodeParameterValue(value)]);
}

/**
 * Serialize the parameter list exactly as the oracle node reads it: the
 * CBOR items of every entry in insertion order, with no enclosing map header.
 */
export function encodeParameters(parameters: readonly ParameterEntry[]): Hex {
	if (parameters.length === 0) return "0x";
	return concat(parameters.map((entry) => entry.encoded));
}

const BREAK = 0xff;

type CborItem =
	| { kind: "uint"; value: bigint }
	| { kind: "int"; value: bigint }
	| { kind: "bytes"; value: Uint8Array }
	| { kind: "text"; value: string }
	| { kind: "array"; items: CborItem[] };

class CborReader {
	#offset = 0;
	readonly #bytes: Uint8Array;
	readonly #decoder = new TextDecoder("utf-8", { fatal: true });

	constructor(bytes: Uint8Array) {
		this.#bytes = bytes;
	}

	get done(): boolean {
		return this.#offset >= this.#bytes.length;
	}

	peek(): number {
		this.#ensure(1);
		return this.#bytes[this.#offset];
	}

	/** Array elements are read with `nested` set; values never hold arrays of arrays. */
	readItem(nested = false): CborItem {
		const initial = this.#take(1)[0];
		const major = initial >> 5;
		const info = initial & 0x1f;

		if (major === MAJOR_TYPE_ARRAY && nested) {
			throw malformed("nested arrays are not supported");
		}

		if (major === MAJOR_TYPE_ARRAY && info === 31) {
			const items: CborItem[] = [];
			while (this.peek() !== BREAK) {
				items.push(this.readItem(true));
			}
			this.#take(1);
			return { kind: "array", items };
		}

		const argument = this.#readArgument(info);
		switch (major) {
			case MAJOR_TYPE_INT:
				return { kind: "uint", value: argument };
			case MAJOR_TYPE_NEGATIVE_INT:
				return { kind: "int", value: -1n - argument };
			case MAJOR_TYPE_BYTES:
				return { kind: "bytes", value: this.#take(toLength(argument)) };
			case MAJOR_TYPE_STRING:
				return { kind: "text", value: this.#readText(toLength(argument)) };
			case MAJOR_TYPE_ARRAY: {
				const items: CborItem[] = [];
				for (let index = 0n; index < argument; index++) {
					items.push(this.readItem(true));
				}
				return { kind: "array", items };
			}
			case MAJOR_TYPE_TAG:
				return this.#readBigNum(argument);
			default:
				throw malformed(`unsupported CBOR major type ${major}`);
		}
	}

	#readBigNum(tag: bigint): CborItem {
		if (this.peek() >> 5 !== MAJOR_TYPE_BYTES) {
			throw malformed("bignum tag must wrap a byte string");
		}
		const payload = this.readItem(true);
		if (payload.kind !== "bytes") {
			throw malformed("bignum tag must wrap a byte string");
		}
		const magnitude = payload.value.length === 0 ? 0n : bytesToBigInt(payload.value);
		if (tag === TAG_TYPE_BIGNUM) return { kind: "uint", value: magnitude };
		if (tag === TAG_TYPE_NEGATIVE_BIGNUM) return { kind: "int", value: -1n - magnitude };
		throw malformed(`unsupported CBOR tag ${tag}`);
	}

	#readArgument(info: number): bigint {
		if (info <= 23) return BigInt(info);
		const widths: Record<number, number> = { 24: 1, 25: 2, 26: 4, 27: 8 };
		const width = widths[info];
		if (width === undefined) {
			throw malformed(`unsupported CBOR additional info ${info}`);
		}
		return bytesToBigInt(this.#take(width));
	}

	#readText(length: number): string {
		const bytes = this.#take(length);
		try {
			return this.#decoder.decode(bytes);
		} catch (error) {
			throw malformed("text string is not valid UTF-8", error);
		}
	}

	#take(length: number): Uint8Array {
		this.#ensure(length);
		const slice = this.#bytes.slice(this.#offset, this.#offset + length);
		this.#offset += length;
		return slice;
	}

	#ensure(length: number): void {
		if (this.#offset + length > this.#bytes.length) {
			throw malformed("unexpected end of parameter buffer");
		}
	}
}

/**
 * Parse a parameter buffer back into key/value pairs. Non-negative integers
 * come back as `uint` whichever helper added them.
 */
export function decodeParameters(data: Hex): DecodedParameter[] {
	if (!isHex(data)) {
		throw malformed("parameter buffer must be hex");
	}
	const reader = new CborReader(hexToBytes(data));
	const parameters: DecodedParameter[] = [];
	while (!reader.done) {
		const key = reader.readItem();
		if (key.kind !== "text") {
			throw malformed(`expected a text key, found ${key.kind}`);
		}
		if (reader.done) {
			throw malformed(`missing value for key "${key.value}"`);
		}
		parameters.push({ key: key.value, value: toParameterValue(key.value, reader.readItem()) });
	}
	return parameters;
}

function toParameterValue(key: string, item: CborItem): ParameterValue {
	switch (item.kind) {
		case "uint":
			return { type: "uint", value: item.value };
		case "int":
			return { type: "int", value: item.value };
		case "bytes":
			return { type: "bytes", value: bytesToHex(item.value) };
		case "text":
			return { type: "string", value: item.value };
		case "array": {
			const values: string[] = [];
			for (const entry of item.items) {
				if (entry.kind !== "text") {
					throw malformed(`array for key "${key}" must contain only text strings`);
				}
				values.push(entry.value);
			}
			return { type: "string[]", value: values };
		}
	}
}

function toLength(argument: bigint): number {
	if (argument > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw malformed("length exceeds buffer");
	}
	return Number(argument);
}

function malformed(message: string, cause?: unknown): OracleClientError {
	return new OracleClientError({
		message: `Malformed parameter buffer: ${message}`,
		reason: "invalid_parameter",
		cause,
	});
}
