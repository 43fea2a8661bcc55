/**
 * Backtest core replays entry/exit signals over a price table and reports
 * trades, the equity curve and performance metrics.
 */
export { BacktestSimulator, resolveBacktestOptions, runBacktest, type SignalPair } from "./simulator";
export {
	createBacktestOptionsFromConfig,
	runDslBacktest,
	type DslBacktestOptions,
	type DslBacktestRun,
} from "./pipeline";
export type {
	BacktestOptions,
	BacktestResult,
	ExitReason,
	OpenPosition,
	Trade,
} from "./backtestTypes";
