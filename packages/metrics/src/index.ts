/**
 * Performance metrics for finished backtests.
 */
export {
	calculatePerformance,
	computeMaxDrawdown,
	computeSharpe,
	equityReturns,
	standardDeviation,
} from "./calcPerformance";
export type {
	DrawdownSummary,
	EquityPoint,
	PerformanceInput,
	PerformanceMetrics,
	TradeOutcome,
} from "./metricsSchema";
