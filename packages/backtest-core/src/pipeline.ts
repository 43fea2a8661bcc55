import {
	createLogger,
	validatePriceTable,
	type IndicatorDefaults,
	type PriceTable,
	type RulecraftConfig,
} from "@rulecraft/core";
import { parse, type StrategyNode } from "@rulecraft/dsl";
import { compile, type StrategySignals } from "@rulecraft/strategy-engine";
import type { BacktestOptions, BacktestResult } from "./backtestTypes";
import { runBacktest } from "./simulator";

const logger = createLogger("pipeline");

export interface DslBacktestOptions extends BacktestOptions {
	indicatorDefaults?: Partial<IndicatorDefaults>;
}

export interface DslBacktestRun {
	ast: StrategyNode;
	signals: StrategySignals;
	result: BacktestResult;
}

/** Maps loaded configuration onto compiler and simulator options. */
export const createBacktestOptionsFromConfig = (
	config: RulecraftConfig
): DslBacktestOptions => ({
	...config.backtest,
	indicatorDefaults: { ...config.indicators },
});

/**
 * Parses, compiles, evaluates and simulates a DSL strategy over one table.
 * Each stage's errors (`DslSyntaxError`, `CompileError`, `PriceTableError`)
 * propagate unchanged.
 */
export function runDslBacktest(
	text: string,
	table: PriceTable,
	options: DslBacktestOptions = {}
): DslBacktestRun {
	const { indicatorDefaults, ...backtestOptions } = options;
	validatePriceTable(table);

	const ast = parse(text);
	const signals = compile(ast, { indicatorDefaults })(table);
	const result = runBacktest(table, signals, backtestOptions);
	const { metrics } = result;

	logger.info("backtest_summary", {
		rows: table.length,
		initialCapital: result.initialCapital,
		finalEquity: result.finalEquity,
		totalReturnPct: metrics.totalReturnPct,
		numTrades: metrics.numTrades,
		winRate: metrics.winRate,
		maxDrawdown: metrics.maxDrawdown,
		sharpeRatio: metrics.sharpeRatio,
		openPosition: result.openPosition !== null,
	});

	return { ast, signals, result };
}
