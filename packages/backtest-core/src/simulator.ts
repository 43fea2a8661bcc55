import {
	createLogger,
	formatDay,
	validatePriceTable,
	DEFAULT_BACKTEST_SETTINGS,
	OPEN_POSITION_POLICIES,
	PRICE_FIELDS,
	type BacktestDefaults,
	type PriceBar,
	type PriceTable,
	type SignalSeries,
} from "@rulecraft/core";
import { calculatePerformance, type EquityPoint } from "@rulecraft/metrics";
import type {
	BacktestOptions,
	BacktestResult,
	ExitReason,
	OpenPosition,
	Trade,
} from "./backtestTypes";

const logger = createLogger("backtest");

export interface SignalPair {
	entry: SignalSeries;
	exit: SignalSeries;
}

interface HeldPosition {
	entryIndex: number;
	entryTimestamp: number;
	entryPrice: number;
	units: number;
}

export const resolveBacktestOptions = (options: BacktestOptions = {}): BacktestDefaults => {
	const resolved: BacktestDefaults = {
		initialCapital: options.initialCapital ?? DEFAULT_BACKTEST_SETTINGS.initialCapital,
		annualizationFactor:
			options.annualizationFactor ?? DEFAULT_BACKTEST_SETTINGS.annualizationFactor,
		openPositionPolicy:
			options.openPositionPolicy ?? DEFAULT_BACKTEST_SETTINGS.openPositionPolicy,
		priceField: options.priceField ?? DEFAULT_BACKTEST_SETTINGS.priceField,
	};
	if (!Number.isFinite(resolved.initialCapital) || resolved.initialCapital <= 0) {
		throw new RangeError(
			`initialCapital must be a positive number, got ${resolved.initialCapital}`
		);
	}
	if (!Number.isFinite(resolved.annualizationFactor) || resolved.annualizationFactor <= 0) {
		throw new RangeError(
			`annualizationFactor must be a positive number, got ${resolved.annualizationFactor}`
		);
	}
	if (!OPEN_POSITION_POLICIES.includes(resolved.openPositionPolicy)) {
		throw new RangeError(
			`openPositionPolicy must be one of ${OPEN_POSITION_POLICIES.join(", ")}, got ${String(resolved.openPositionPolicy)}`
		);
	}
	if (!PRICE_FIELDS.includes(resolved.priceField)) {
		throw new RangeError(
			`priceField must be one of ${PRICE_FIELDS.join(", ")}, got ${String(resolved.priceField)}`
		);
	}
	return resolved;
};

const assertAligned = (label: string, signals: SignalSeries, rows: number): void => {
	if (signals.length !== rows) {
		throw new RangeError(
			`${label} signals have ${signals.length} rows but the price table has ${rows}`
		);
	}
};

/**
 * Long-only, all-in simulator. On every row an open position is closed first
 * when the exit signal is set, then a flat book opens when the entry signal
 * is set, so one row can close a trade and start the next.
 */
export class BacktestSimulator {
	readonly options: Readonly<BacktestDefaults>;

	constructor(options: BacktestOptions = {}) {
		this.options = Object.freeze(resolveBacktestOptions(options));
	}

	run(table: PriceTable, signals: SignalPair): BacktestResult {
		validatePriceTable(table);
		assertAligned("Entry", signals.entry, table.length);
		assertAligned("Exit", signals.exit, table.length);

		const { initialCapital, priceField, openPositionPolicy, annualizationFactor } = this.options;
		const trades: Trade[] = [];
		const equityCurve: EquityPoint[] = [];
		let cash = initialCapital;
		let position: HeldPosition | null = null;

		const close = (held: HeldPosition, index: number, reason: ExitReason): void => {
			const bar = table[index];
			const exitPrice = bar[priceField];
			const proceeds = held.units * exitPrice;
			const trade: Trade = Object.freeze({
				entryIndex: held.entryIndex,
				entryTimestamp: held.entryTimestamp,
				entryDate: formatDay(held.entryTimestamp),
				entryPrice: held.entryPrice,
				exitIndex: index,
				exitTimestamp: bar.timestamp,
				exitDate: formatDay(bar.timestamp),
				exitPrice,
				units: held.units,
				pnl: proceeds - held.units * held.entryPrice,
				returnFraction: (exitPrice - held.entryPrice) / held.entryPrice,
				exitReason: reason,
			});
			trades.push(trade);
			cash = proceeds;
			logger.debug("trade_closed", { ...trade });
		};

		const open = (bar: PriceBar, index: number): HeldPosition | null => {
			const entryPrice = bar[priceField];
			if (entryPrice <= 0) {
				logger.warn("entry_skipped", { index, priceField, price: entryPrice });
				return null;
			}
			const held: HeldPosition = {
				entryIndex: index,
				entryTimestamp: bar.timestamp,
				entryPrice,
				units: cash / entryPrice,
			};
			logger.debug("trade_opened", {
				entryIndex: index,
				entryDate: formatDay(bar.timestamp),
				entryPrice,
				units: held.units,
			});
			return held;
		};

		for (let index = 0; index < table.length; index += 1) {
			const bar = table[index];
			if (position && signals.exit[index]) {
				close(position, index, "signal");
				position = null;
			}
			if (!position && signals.entry[index]) {
				position = open(bar, index);
			}
			equityCurve.push({
				index,
				timestamp: bar.timestamp,
				equity: position ? position.units * bar[priceField] : cash,
				inPosition: position !== null,
			});
		}

		let openPosition: OpenPosition | null = null;
		const held = position;
		if (held) {
			const lastIndex = table.length - 1;
			if (openPositionPolicy === "close_at_end") {
				close(held, lastIndex, "end_of_data");
			} else {
				const markPrice = table[lastIndex][priceField];
				openPosition = Object.freeze({
					entryIndex: held.entryIndex,
					entryTimestamp: held.entryTimestamp,
					entryDate: formatDay(held.entryTimestamp),
					entryPrice: held.entryPrice,
					units: held.units,
					markPrice,
					unrealizedReturn: (markPrice - held.entryPrice) / held.entryPrice,
				});
			}
		}

		const metrics = calculatePerformance({
			initialCapital,
			equityCurve,
			trades,
			annualizationFactor,
		});
		const finalEquity = equityCurve.at(-1)?.equity ?? initialCapital;

		logger.info("backtest_complete", {
			rows: table.length,
			trades: trades.length,
			openPosition: openPosition !== null,
			finalEquity,
			totalReturnPct: metrics.totalReturnPct,
		});

		return Object.freeze({
			initialCapital,
			finalEquity,
			trades: Object.freeze(trades),
			openPosition,
			equityCurve: Object.freeze(equityCurve.map((point) => Object.freeze(point))),
			metrics: Object.freeze(metrics),
		});
	}
}

export const runBacktest = (
	table: PriceTable,
	signals: SignalPair,
	options: BacktestOptions = {}
): BacktestResult => new BacktestSimulator(options).run(table, signals);
