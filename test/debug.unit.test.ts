import { afterEach, describe, expect, test, vi } from "vitest";
import { debugLog, isDebugEnabled } from "../src/debug";

describe("debug logging", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("is enabled by 1 or true", () => {
		expect(isDebugEnabled({ ORACLE_CLIENT_DEBUG: "1" })).toBe(true);
		expect(isDebugEnabled({ ORACLE_CLIENT_DEBUG: " TRUE " })).toBe(true);
		expect(isDebugEnabled({ ORACLE_CLIENT_DEBUG: "0" })).toBe(false);
		expect(isDebugEnabled({})).toBe(false);
	});

	test("writes scoped lines to stderr only when enabled", () => {
		const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

		debugLog("oracle-client", "quiet", {});
		expect(write).not.toHaveBeenCalled();

		debugLog("oracle-client", "requested", { ORACLE_CLIENT_DEBUG: "1" });
		expect(write).toHaveBeenCalledTimes(1);
		expect(String(write.mock.calls[0]?.[0]).replace(/\u001b\[[0-9;]*m/g, "")).toBe("[oracle-client] requested\n");
	});
});
