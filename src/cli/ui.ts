import pc from "picocolors";
import type { DecodedParameter, ParameterValue } from "../types";

const COLORS = {
	label: pc.cyan,
	ok: pc.green,
	danger: pc.red,
	dim: pc.white,
};

export function renderHeading(text: string): string {
	return COLORS.dim(text);
}

export function renderError(text: string): string {
	return COLORS.danger(text);
}

export function renderFields(fields: Array<[label: string, value: string]>): string {
	const width = Math.max(...fields.map(([label]) => label.length));
	return fields.map(([label, value]) => `${COLORS.label(`${label.padEnd(width)}:`)} ${value}`).join("\n");
}

export function formatParameterValue(value: ParameterValue): string {
	switch (value.type) {
		case "string":
			return JSON.stringify(value.value);
		case "bytes":
			return value.value;
		case "int":
		case "uint":
			return value.value.toString();
		case "string[]":
			return `[${value.value.map((item) => JSON.stringify(item)).join(", ")}]`;
	}
}

export function renderParameters(parameters: readonly DecodedParameter[]): string {
	if (parameters.length === 0) {
		return renderHeading("(no parameters)");
	}
	return parameters
		.map(
			(parameter, index) =>
				`${index + 1}. ${COLORS.label(parameter.key)} ${pc.dim(`(${parameter.value.type})`)} ${formatParameterValue(parameter.value)}`,
		)
		.join("\n");
}

export function toJsonParameters(parameters: readonly DecodedParameter[]): Array<Record<string, unknown>> {
	return parameters.map((parameter) => ({
		key: parameter.key,
		type: parameter.value.type,
		value:
			typeof parameter.value.value === "bigint" ? parameter.value.value.toString() : parameter.value.value,
	}));
}
