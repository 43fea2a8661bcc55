export interface EquityPoint {
	index: number;
	timestamp: number;
	equity: number;
	/** Whether a position was held at the end of the row. */
	inPosition: boolean;
}

/** The parts of a closed trade the metrics read. */
export interface TradeOutcome {
	returnFraction: number;
	pnl: number;
}

export interface PerformanceInput {
	initialCapital: number;
	equityCurve: readonly EquityPoint[];
	trades: readonly TradeOutcome[];
	annualizationFactor: number;
}

export interface DrawdownSummary {
	/** Largest peak-to-trough fall as a fraction of the peak. */
	maxDrawdown: number;
	peakIndex: number | null;
	troughIndex: number | null;
}

export interface PerformanceMetrics {
	totalReturnPct: number;
	numTrades: number;
	winRate: number;
	avgReturn: number;
	maxDrawdown: number;
	sharpeRatio: number;
	netProfit: number;
	grossProfit: number;
	grossLoss: number;
	profitFactor: number;
	bestTrade: number;
	worstTrade: number;
	exposurePct: number;
}
