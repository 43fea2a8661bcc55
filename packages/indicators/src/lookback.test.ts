import { describe, expect, it } from "vitest";
import { changeSeries, percentChangeSeries, shiftSeries } from "./lookback";

describe("shiftSeries", () => {
	it("moves values forward by the lag", () => {
		expect(shiftSeries([1, 2, 3, 4], 1)).toEqual([undefined, 1, 2, 3]);
	});

	it("is entirely undefined when the lag exceeds the history", () => {
		expect(shiftSeries([1, 2, 3, 4], 7)).toEqual([
			undefined,
			undefined,
			undefined,
			undefined,
		]);
	});

	it("rejects a zero lag", () => {
		expect(() => shiftSeries([1], 0)).toThrowError(
			"Lag must be a positive integer, got 0"
		);
	});
});

describe("changeSeries", () => {
	it("subtracts the value lag rows back", () => {
		expect(changeSeries([10, 12, 15], 2)).toEqual([undefined, undefined, 5]);
	});

	it("propagates missing inputs", () => {
		expect(changeSeries([undefined, 12, 15], 1)).toEqual([
			undefined,
			undefined,
			3,
		]);
	});
});

describe("percentChangeSeries", () => {
	it("expresses the change in percent of the base", () => {
		expect(percentChangeSeries([1_000, 1_400], 1)).toEqual([undefined, 40]);
	});

	it("is undefined on a zero base", () => {
		expect(percentChangeSeries([0, 5, 10], 1)).toEqual([
			undefined,
			undefined,
			100,
		]);
	});
});
