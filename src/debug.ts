import pc from "picocolors";

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
	const value = env.ORACLE_CLIENT_DEBUG?.trim().toLowerCase();
	return value === "1" || value === "true";
}

export function debugLog(scope: string, message: string, env?: NodeJS.ProcessEnv): void {
	if (!isDebugEnabled(env)) return;
	process.stderr.write(`${pc.dim(`[${scope}]`)} ${message}\n`);
}
