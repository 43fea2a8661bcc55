import type {
	DrawdownSummary,
	EquityPoint,
	PerformanceInput,
	PerformanceMetrics,
} from "./metricsSchema";

const sum = (values: readonly number[]): number =>
	values.reduce((total, value) => total + value, 0);

const mean = (values: readonly number[]): number =>
	values.length ? sum(values) / values.length : 0;

/** Population standard deviation. */
export const standardDeviation = (values: readonly number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const average = mean(values);
	const variance =
		values.reduce((total, value) => total + (value - average) ** 2, 0) / values.length;
	return Math.sqrt(variance);
};

/** Row-over-row returns of an equity series; a zero base yields 0. */
export const equityReturns = (equities: readonly number[]): number[] => {
	const returns: number[] = [];
	for (let i = 1; i < equities.length; i += 1) {
		const previous = equities[i - 1];
		returns.push(previous !== 0 ? (equities[i] - previous) / previous : 0);
	}
	return returns;
};

/**
 * Annualized Sharpe ratio without a risk-free leg. Zero when there are fewer
 * than two returns or the returns do not vary.
 */
export const computeSharpe = (
	returns: readonly number[],
	annualizationFactor: number
): number => {
	if (returns.length < 2 || annualizationFactor <= 0) {
		return 0;
	}
	const std = standardDeviation(returns);
	return std === 0 ? 0 : (mean(returns) / std) * Math.sqrt(annualizationFactor);
};

export const computeMaxDrawdown = (equities: readonly number[]): DrawdownSummary => {
	if (!equities.length) {
		return { maxDrawdown: 0, peakIndex: null, troughIndex: null };
	}

	let peak = equities[0];
	let peakIndex = 0;
	const summary: DrawdownSummary = { maxDrawdown: 0, peakIndex: null, troughIndex: null };

	for (let i = 1; i < equities.length; i += 1) {
		const equity = equities[i];
		if (equity > peak) {
			peak = equity;
			peakIndex = i;
			continue;
		}
		const depthPct = peak > 0 ? (peak - equity) / peak : 0;
		if (depthPct > summary.maxDrawdown) {
			summary.maxDrawdown = depthPct;
			summary.peakIndex = peakIndex;
			summary.troughIndex = i;
		}
	}

	return summary;
};

const exposurePct = (curve: readonly EquityPoint[]): number => {
	if (!curve.length) {
		return 0;
	}
	const held = curve.filter((point) => point.inPosition).length;
	return (held / curve.length) * 100;
};

/**
 * Summarizes a finished run. Trade statistics cover closed trades only; the
 * equity statistics read the full marked-to-market curve.
 */
export const calculatePerformance = (input: PerformanceInput): PerformanceMetrics => {
	const { initialCapital, equityCurve, trades, annualizationFactor } = input;
	const equities = equityCurve.map((point) => point.equity);
	const finalEquity = equities.at(-1) ?? initialCapital;

	const returns = trades.map((trade) => trade.returnFraction);
	const pnls = trades.map((trade) => trade.pnl);
	const numTrades = trades.length;
	const wins = returns.filter((value) => value > 0).length;
	const grossProfit = sum(pnls.filter((pnl) => pnl > 0));
	const grossLoss = Math.abs(sum(pnls.filter((pnl) => pnl < 0)));

	let profitFactor = 0;
	if (grossLoss > 0) {
		profitFactor = grossProfit / grossLoss;
	} else if (grossProfit > 0) {
		profitFactor = Infinity;
	}

	return {
		totalReturnPct:
			initialCapital !== 0 ? ((finalEquity - initialCapital) / initialCapital) * 100 : 0,
		numTrades,
		winRate: numTrades ? wins / numTrades : 0,
		avgReturn: mean(returns),
		maxDrawdown: computeMaxDrawdown(equities).maxDrawdown,
		sharpeRatio: computeSharpe(equityReturns(equities), annualizationFactor),
		netProfit: sum(pnls),
		grossProfit,
		grossLoss,
		profitFactor,
		bestTrade: numTrades ? Math.max(...returns) : 0,
		worstTrade: numTrades ? Math.min(...returns) : 0,
		exposurePct: exposurePct(equityCurve),
	};
};
