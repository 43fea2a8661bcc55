import type { BacktestDefaults } from "@rulecraft/core";
import type { EquityPoint, PerformanceMetrics } from "@rulecraft/metrics";

export type ExitReason = "signal" | "end_of_data";

export interface Trade {
	entryIndex: number;
	entryTimestamp: number;
	/** `YYYY-MM-DD` of the entry row (UTC). */
	entryDate: string;
	entryPrice: number;
	exitIndex: number;
	exitTimestamp: number;
	exitDate: string;
	exitPrice: number;
	units: number;
	pnl: number;
	returnFraction: number;
	exitReason: ExitReason;
}

/** A position still held on the last row under the `exclude` policy. */
export interface OpenPosition {
	entryIndex: number;
	entryTimestamp: number;
	entryDate: string;
	entryPrice: number;
	units: number;
	markPrice: number;
	unrealizedReturn: number;
}

export type BacktestOptions = Partial<BacktestDefaults>;

export interface BacktestResult {
	initialCapital: number;
	finalEquity: number;
	trades: readonly Trade[];
	openPosition: OpenPosition | null;
	equityCurve: readonly EquityPoint[];
	metrics: PerformanceMetrics;
}
