import { getAddress, type Hex, isAddress, isHex } from "viem";
import { z } from "zod";

export const addressSchema = z
	.string()
	.trim()
	.refine((value) => isAddress(value, { strict: false }), { message: "Invalid address" })
	.transform((value) => getAddress(value));

export const hexDataSchema = z
	.string()
	.trim()
	.refine((value): value is Hex => isHex(value, { strict: true }) && value.length % 2 === 0, {
		message: "Invalid hex data",
	});

export const bytes32Schema = hexDataSchema.refine((value) => value.length === 66, {
	message: "Expected 32 bytes of hex",
});

export const selectorSchema = hexDataSchema.refine((value) => value.length === 10, {
	message: "Expected a 4-byte selector",
});

export const quantitySchema = z
	.string()
	.trim()
	.refine((value) => /^[0-9]+$/.test(value) || /^0x[0-9a-fA-F]+$/.test(value), {
		message: "Expected a decimal or 0x-prefixed quantity",
	})
	.transform((value) => BigInt(value));

export const payloadInputSchema = z
	.object({
		job: z.string().min(1),
		callback: addressSchema,
		selector: selectorSchema,
		consumer: addressSchema,
		nonce: quantitySchema,
	})
	.strict();

export type PayloadInput = z.infer<typeof payloadInputSchema>;

export const requestIdInputSchema = payloadInputSchema.pick({ consumer: true, nonce: true });

export type RequestIdInput = z.infer<typeof requestIdInputSchema>;

export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}
