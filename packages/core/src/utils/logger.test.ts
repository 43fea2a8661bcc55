import { describe, expect, it } from "vitest";
import { normalizeLevel, sanitizeValue } from "./logger";

describe("normalizeLevel", () => {
	it("accepts known levels case-insensitively", () => {
		expect(normalizeLevel("WARN")).toBe("warn");
		expect(normalizeLevel("debug")).toBe("debug");
	});

	it("falls back to info", () => {
		expect(normalizeLevel(undefined)).toBe("info");
		expect(normalizeLevel("verbose")).toBe("info");
	});
});

describe("sanitizeValue", () => {
	it("converts values JSON cannot carry", () => {
		const when = new Date(Date.UTC(2024, 0, 2));
		expect(
			sanitizeValue({ big: 10n, when, fn: () => 1, nested: [1, "a"] })
		).toEqual({
			big: "10",
			when: "2024-01-02T00:00:00.000Z",
			fn: "[function]",
			nested: [1, "a"],
		});
	});

	it("marks circular references", () => {
		const node: Record<string, unknown> = { name: "root" };
		node.self = node;
		expect(sanitizeValue(node)).toEqual({ name: "root", self: "[circular]" });
	});
});
