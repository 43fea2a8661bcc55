import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { rsiSeries } from "./rsi";

const leadingUndefined = (series: ReadonlyArray<number | undefined>): number => {
	const first = series.findIndex((value) => value !== undefined);
	return first === -1 ? series.length : first;
};

const pricesArb = fc.array(fc.integer({ min: 1, max: 10_000 }), {
	minLength: 0,
	maxLength: 80,
});
const periodArb = fc.integer({ min: 1, max: 30 });

describe("rsiSeries", () => {
	it("reports 100 when there are no losses", () => {
		expect(rsiSeries([1, 2, 3, 4, 5, 6], 3)).toEqual([
			undefined,
			undefined,
			undefined,
			100,
			100,
			100,
		]);
	});

	it("applies Wilder smoothing after the first average", () => {
		const result = rsiSeries([10, 11, 10, 12, 11], 2);
		expect(result.slice(0, 2)).toEqual([undefined, undefined]);
		expect(result[2]).toBeCloseTo(50, 10);
		expect(result[3]).toBeCloseTo(83.333333, 5);
		expect(result[4]).toBeCloseTo(50, 10);
	});

	it("defaults to a 14 row period", () => {
		const prices = Array.from({ length: 16 }, (_, i) => 100 + i);
		const result = rsiSeries(prices);
		expect(leadingUndefined(result)).toBe(14);
		expect(result[14]).toBe(100);
	});

	it("leaves exactly period warm-up rows and stays within 0..100", () => {
		fc.assert(
			fc.property(pricesArb, periodArb, (prices, period) => {
				const result = rsiSeries(prices, period);
				const warmup = Math.min(prices.length, period);
				expect(leadingUndefined(result)).toBe(warmup);
				for (const value of result.slice(warmup)) {
					expect(value).toBeGreaterThanOrEqual(0);
					expect(value).toBeLessThanOrEqual(100);
				}
			})
		);
	});
});
