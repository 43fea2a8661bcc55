import { describe, expect, it } from "vitest";
import { PriceTableError } from "./errors";
import { formatDay, pluckColumn, validatePriceTable } from "./priceTable";
import type { PriceBar } from "./types";

const baseTimestamp = Date.UTC(2024, 0, 1);
const DAY_MS = 86_400_000;

const buildBar = (index: number, close: number): PriceBar => ({
	timestamp: baseTimestamp + index * DAY_MS,
	open: close - 1,
	high: close + 1,
	low: close - 2,
	close,
	volume: 1_000 + index,
});

describe("validatePriceTable", () => {
	it("accepts strictly increasing rows", () => {
		const table = [buildBar(0, 10), buildBar(1, 11), buildBar(2, 12)];
		expect(validatePriceTable(table)).toBe(table);
	});

	it("accepts an empty table", () => {
		expect(validatePriceTable([])).toEqual([]);
	});

	it("rejects duplicate timestamps with the offending row", () => {
		const table = [buildBar(0, 10), buildBar(1, 11), buildBar(1, 12)];
		try {
			validatePriceTable(table);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(PriceTableError);
			expect(error).toMatchObject({
				index: 2,
				message: "Duplicate timestamp 2024-01-02 at row 2",
			});
		}
	});

	it("rejects decreasing timestamps", () => {
		expect(() =>
			validatePriceTable([buildBar(1, 10), buildBar(0, 11)])
		).toThrowError("Timestamps must increase; row 1 is earlier than row 0");
	});

	it("rejects non-finite prices", () => {
		const broken = { ...buildBar(1, 11), volume: Number.NaN };
		expect(() => validatePriceTable([buildBar(0, 10), broken])).toThrowError(
			"Row 1 has a non-finite volume value"
		);
	});
});

describe("pluckColumn", () => {
	it("projects a single column in row order", () => {
		const table = [buildBar(0, 10), buildBar(1, 11)];
		expect(pluckColumn(table, "close")).toEqual([10, 11]);
		expect(pluckColumn(table, "volume")).toEqual([1_000, 1_001]);
	});
});

describe("formatDay", () => {
	it("renders the UTC calendar day", () => {
		expect(formatDay(baseTimestamp + 3 * DAY_MS)).toBe("2024-01-04");
	});
});
