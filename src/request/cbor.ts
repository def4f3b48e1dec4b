import { concat, type Hex, numberToHex, stringToHex } from "viem";

export const MAJOR_TYPE_INT = 0;
export const MAJOR_TYPE_NEGATIVE_INT = 1;
export const MAJOR_TYPE_BYTES = 2;
export const MAJOR_TYPE_STRING = 3;
export const MAJOR_TYPE_ARRAY = 4;
export const MAJOR_TYPE_TAG = 6;
export const MAJOR_TYPE_CONTENT_FREE = 7;

export const TAG_TYPE_BIGNUM = 2n;
export const TAG_TYPE_NEGATIVE_BIGNUM = 3n;

const MAX_UINT64 = 0xffffffffffffffffn;
const INDEFINITE_LENGTH = 31;

export function encodeHead(major: number, value: bigint): Hex {
	const prefix = major << 5;
	if (value < 0n) {
		throw new RangeError(`CBOR head argument must be non-negative, got ${value}`);
	}
	if (value <= 23n) {
		return numberToHex(prefix | Number(value), { size: 1 });
	}
	if (value <= 0xffn) {
		return concat([numberToHex(prefix | 24, { size: 1 }), numberToHex(value, { size: 1 })]);
	}
	if (value <= 0xffffn) {
		return concat([numberToHex(prefix | 25, { size: 1 }), numberToHex(value, { size: 2 })]);
	}
	if (value <= 0xffffffffn) {
		return concat([numberToHex(prefix | 26, { size: 1 }), numberToHex(value, { size: 4 })]);
	}
	if (value <= MAX_UINT64) {
		return concat([numberToHex(prefix | 27, { size: 1 }), numberToHex(value, { size: 8 })]);
	}
	throw new RangeError(`CBOR head argument exceeds 64 bits: ${value}`);
}

export function encodeIndefiniteLengthType(major: number): Hex {
	return numberToHex((major << 5) | INDEFINITE_LENGTH, { size: 1 });
}

export function encodeUint(value: bigint): Hex {
	if (value > MAX_UINT64) {
		return encodeBigNum(TAG_TYPE_BIGNUM, value);
	}
	return encodeHead(MAJOR_TYPE_INT, value);
}

export function encodeInt(value: bigint): Hex {
	if (value >= 0n) {
		return encodeUint(value);
	}
	const magnitude = -1n - value;
	if (magnitude > MAX_UINT64) {
		return encodeBigNum(TAG_TYPE_NEGATIVE_BIGNUM, magnitude);
	}
	return encodeHead(MAJOR_TYPE_NEGATIVE_INT, magnitude);
}

export function encodeBytes(value: Hex): Hex {
	const length = BigInt((value.length - 2) / 2);
	return concat([encodeHead(MAJOR_TYPE_BYTES, length), value]);
}

export function encodeString(value: string): Hex {
	const data = stringToHex(value);
	const length = BigInt((data.length - 2) / 2);
	return concat([encodeHead(MAJOR_TYPE_STRING, length), data]);
}

export function startArray(): Hex {
	return encodeIndefiniteLengthType(MAJOR_TYPE_ARRAY);
}

export function endSequence(): Hex {
	return encodeIndefiniteLengthType(MAJOR_TYPE_CONTENT_FREE);
}

// Bignums carry a 32-byte big-endian magnitude.
function encodeBigNum(tag: bigint, magnitude: bigint): Hex {
	return concat([encodeHead(MAJOR_TYPE_TAG, tag), encodeBytes(numberToHex(magnitude, { size: 32 }))]);
}
