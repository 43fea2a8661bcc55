import { describe, expect, it } from "vitest";
import {
	calculatePerformance,
	computeMaxDrawdown,
	computeSharpe,
	equityReturns,
	standardDeviation,
} from "./calcPerformance";
import type { EquityPoint } from "./metricsSchema";

const curveOf = (equities: number[], held: boolean[] = []): EquityPoint[] =>
	equities.map((equity, index) => ({
		index,
		timestamp: Date.UTC(2024, 0, 1 + index),
		equity,
		inPosition: held[index] ?? false,
	}));

describe("equity helpers", () => {
	it("computes a population standard deviation", () => {
		expect(standardDeviation([1, 3])).toBe(1);
		expect(standardDeviation([5])).toBe(0);
	});

	it("returns 0 for a row whose previous equity is zero", () => {
		expect(equityReturns([100, 110, 0, 5])).toEqual([0.1, -1, 0]);
	});

	it("annualizes the mean over the deviation of returns", () => {
		expect(computeSharpe([0.01, 0.03], 4)).toBeCloseTo(4, 10);
	});

	it("reports 0 Sharpe for flat or too-short return series", () => {
		expect(computeSharpe([0, 0, 0], 252)).toBe(0);
		expect(computeSharpe([0.05], 252)).toBe(0);
	});

	it("finds the deepest drawdown as a fraction of its peak", () => {
		expect(computeMaxDrawdown([100, 120, 90, 130, 117])).toEqual({
			maxDrawdown: 0.25,
			peakIndex: 1,
			troughIndex: 2,
		});
		expect(computeMaxDrawdown([1, 2, 3])).toEqual({
			maxDrawdown: 0,
			peakIndex: null,
			troughIndex: null,
		});
	});
});

describe("calculatePerformance", () => {
	it("summarizes closed trades and the equity curve", () => {
		const metrics = calculatePerformance({
			initialCapital: 1000,
			equityCurve: curveOf([1000, 1100, 1050, 1200], [false, true, true, false]),
			trades: [
				{ returnFraction: 0.2, pnl: 200 },
				{ returnFraction: -0.1, pnl: -50 },
			],
			annualizationFactor: 252,
		});

		expect(metrics.totalReturnPct).toBeCloseTo(20, 10);
		expect(metrics.numTrades).toBe(2);
		expect(metrics.winRate).toBe(0.5);
		expect(metrics.avgReturn).toBeCloseTo(0.05, 10);
		expect(metrics.maxDrawdown).toBeCloseTo(50 / 1100, 10);
		expect(metrics.netProfit).toBe(150);
		expect(metrics.grossProfit).toBe(200);
		expect(metrics.grossLoss).toBe(50);
		expect(metrics.profitFactor).toBe(4);
		expect(metrics.bestTrade).toBe(0.2);
		expect(metrics.worstTrade).toBe(-0.1);
		expect(metrics.exposurePct).toBe(50);
		expect(metrics.sharpeRatio).toBeGreaterThan(0);
	});

	it("defaults trade statistics to 0 without trades", () => {
		const metrics = calculatePerformance({
			initialCapital: 500,
			equityCurve: curveOf([500, 500, 500]),
			trades: [],
			annualizationFactor: 252,
		});

		expect(metrics).toEqual({
			totalReturnPct: 0,
			numTrades: 0,
			winRate: 0,
			avgReturn: 0,
			maxDrawdown: 0,
			sharpeRatio: 0,
			netProfit: 0,
			grossProfit: 0,
			grossLoss: 0,
			profitFactor: 0,
			bestTrade: 0,
			worstTrade: 0,
			exposurePct: 0,
		});
	});

	it("reports an infinite profit factor when nothing lost", () => {
		const metrics = calculatePerformance({
			initialCapital: 100,
			equityCurve: curveOf([100, 110]),
			trades: [{ returnFraction: 0.1, pnl: 10 }],
			annualizationFactor: 252,
		});
		expect(metrics.profitFactor).toBe(Infinity);
	});

	it("falls back to the initial capital for an empty curve", () => {
		const metrics = calculatePerformance({
			initialCapital: 100,
			equityCurve: [],
			trades: [],
			annualizationFactor: 252,
		});
		expect(metrics.totalReturnPct).toBe(0);
		expect(metrics.exposurePct).toBe(0);
	});
});
